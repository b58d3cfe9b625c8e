// ============================================
// Run Errors
// ============================================

export type MonitorErrorCode = "CONFIG" | "NETWORK" | "PARSE" | "IO";

export const EXIT_CODES: Record<MonitorErrorCode, number> = {
  CONFIG: 2,
  NETWORK: 3,
  PARSE: 4,
  IO: 5,
};

/**
 * Base class for every failure that ends a run.
 */
export class MonitorError extends Error {
  readonly code: MonitorErrorCode;

  constructor(code: MonitorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MonitorError";
    this.code = code;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

export class ConfigError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG", message, options);
    this.name = "ConfigError";
  }
}

export class NetworkError extends MonitorError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super("NETWORK", message, options);
    this.name = "NetworkError";
    this.status = options?.status;
  }
}

export class ParseError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PARSE", message, options);
    this.name = "ParseError";
  }
}

export class IOError extends MonitorError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super("IO", message, options);
    this.name = "IOError";
    this.path = path;
  }
}

export function exitCodeFor(err: unknown): number {
  return err instanceof MonitorError ? err.exitCode : 1;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
