// ============================================
// Centralized Configuration
// ============================================

import path from "node:path";
import dotenv from "dotenv";
import {
  DEFAULT_APY_THRESHOLD,
  DEFAULT_EXPORTS_DIR,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_LOGS_DIR,
  DEFAULT_PROJECT_SLUG,
  DEFAULT_TARGET_CHAINS,
  DEFAULT_TARGET_PROJECTS,
  DEFAULT_TARGET_SYMBOLS,
  DEFILLAMA_YIELDS_URL,
} from "../constants/targets.js";
import { SYMBOL_MATCH_MODES, type PoolFilterCriteria, type SymbolMatchMode } from "../types/pool.js";
import { ConfigError } from "./errors.js";

dotenv.config();

export interface AppConfig {
  // Alerting
  apyThreshold: number;
  // Upstream
  source: {
    url: string;
    timeoutMs: number;
  };
  // Pool selection
  targets: PoolFilterCriteria;
  // Output files
  output: {
    projectSlug: string;
    logFile: string;
    snapshotFile: string;
  };
}

type Env = Record<string, string | undefined>;

function readList(value: string | undefined, fallback: readonly string[]): string[] {
  if (value === undefined) return [...fallback];
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`);
  }
  return n;
}

function readMatchMode(value: string | undefined): SymbolMatchMode {
  const raw = value?.trim().toLowerCase();
  if (!raw) return "token";
  const mode = SYMBOL_MATCH_MODES.find((m) => m === raw);
  if (!mode) {
    throw new ConfigError(`SYMBOL_MATCH must be one of ${SYMBOL_MATCH_MODES.join(", ")}, got "${value}"`);
  }
  return mode;
}

/**
 * Build the run configuration from the environment.
 * The result is frozen: the threshold cannot change mid-run.
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const apyThreshold = readNumber(env, "APY_THRESHOLD", DEFAULT_APY_THRESHOLD);

  const timeoutMs = readNumber(env, "FETCH_TIMEOUT_MS", DEFAULT_FETCH_TIMEOUT_MS);
  if (timeoutMs <= 0) {
    throw new ConfigError(`FETCH_TIMEOUT_MS must be positive, got ${timeoutMs}`);
  }

  const symbols = readList(env.TARGET_SYMBOLS, DEFAULT_TARGET_SYMBOLS);
  if (symbols.length === 0) {
    throw new ConfigError("TARGET_SYMBOLS must list at least one symbol");
  }

  const projectSlug = env.PROJECT_SLUG?.trim() || DEFAULT_PROJECT_SLUG;
  const logsDir = env.LOGS_DIR?.trim() || DEFAULT_LOGS_DIR;
  const exportsDir = env.EXPORTS_DIR?.trim() || DEFAULT_EXPORTS_DIR;

  const targets: PoolFilterCriteria = Object.freeze({
    symbols: Object.freeze(symbols),
    chains: Object.freeze(readList(env.TARGET_CHAINS, DEFAULT_TARGET_CHAINS)),
    projects: Object.freeze(readList(env.TARGET_PROJECTS, DEFAULT_TARGET_PROJECTS)),
    poolIds: Object.freeze(readList(env.TARGET_POOL_IDS, [])),
    symbolMatch: readMatchMode(env.SYMBOL_MATCH),
  });

  return Object.freeze({
    apyThreshold,
    source: Object.freeze({
      url: env.DEFILLAMA_YIELDS_URL?.trim() || DEFILLAMA_YIELDS_URL,
      timeoutMs,
    }),
    targets,
    output: Object.freeze({
      projectSlug,
      logFile: path.join(logsDir, `apy_log_${projectSlug}.csv`),
      snapshotFile: path.join(exportsDir, `apy_snapshot_${projectSlug}.json`),
    }),
  });
}
