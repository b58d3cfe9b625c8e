// ============================================
// DefiLlama Yields API Integration
// Docs: https://defillama.com/docs/api
// ============================================

import {
  createLogger,
  errorMessage,
  NetworkError,
  ParseError,
  type PoolRecord,
} from "@apy-watch/common";

const logger = createLogger("scanner:defillama");

// ---- Raw API Response Types ----

interface DefiLlamaPool {
  pool: string; // UUID
  chain: string;
  project: string;
  symbol: string;
  apy: number | null;
  apyBase?: number | null;
  apyReward?: number | null;
  tvlUsd?: number | null;
  stablecoin?: boolean;
}

export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface FetchYieldPoolsOptions {
  url: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// AbortSignal.timeout rejects with a DOMException named "TimeoutError"
function isTimeout(err: unknown): boolean {
  return typeof err === "object" && err !== null && "name" in err && err.name === "TimeoutError";
}

function optionalNumber(value: unknown): number | null | undefined {
  if (value === null) return null;
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function toRawPool(item: unknown): DefiLlamaPool | null {
  if (!isRecord(item)) return null;
  const { pool, chain, project, symbol } = item;
  if (
    typeof pool !== "string" ||
    typeof chain !== "string" ||
    typeof project !== "string" ||
    typeof symbol !== "string"
  ) {
    return null;
  }
  return {
    pool,
    chain,
    project,
    symbol,
    apy: optionalNumber(item.apy) ?? null,
    apyBase: optionalNumber(item.apyBase),
    apyReward: optionalNumber(item.apyReward),
    tvlUsd: optionalNumber(item.tvlUsd),
    stablecoin: typeof item.stablecoin === "boolean" ? item.stablecoin : undefined,
  };
}

function toPoolRecord(raw: DefiLlamaPool): PoolRecord {
  const record: PoolRecord = {
    poolId: raw.pool,
    chain: raw.chain,
    project: raw.project,
    symbol: raw.symbol,
    apy: raw.apy ?? 0,
  };
  if (raw.tvlUsd != null) record.tvlUsd = raw.tvlUsd;
  if (raw.apyBase !== undefined) record.apyBase = raw.apyBase;
  if (raw.apyReward !== undefined) record.apyReward = raw.apyReward;
  if (raw.stablecoin !== undefined) record.stablecoin = raw.stablecoin;
  return record;
}

/**
 * Turn a decoded `/pools` body into pool records.
 * Items missing an id, chain, project or symbol are dropped.
 */
export function parseYieldsResponse(body: unknown): PoolRecord[] {
  if (!isRecord(body) || !Array.isArray(body.data)) {
    throw new ParseError("DefiLlama response has no data array");
  }

  const pools: PoolRecord[] = [];
  let skipped = 0;

  for (const item of body.data) {
    const raw = toRawPool(item);
    if (!raw) {
      skipped++;
      continue;
    }
    pools.push(toPoolRecord(raw));
  }

  if (skipped > 0) {
    logger.warn(`Skipped ${skipped} malformed pool entries`, { skipped });
  }
  return pools;
}

// ---- Public API ----

/**
 * Fetch every yield pool from DefiLlama.
 */
export async function fetchYieldPools(options: FetchYieldPoolsOptions): Promise<PoolRecord[]> {
  const { url, timeoutMs } = options;
  const fetchImpl: FetchLike = options.fetchImpl ?? fetch;

  logger.info("Fetching pools from DefiLlama", { url, timeoutMs });

  let res: Response;
  try {
    res = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    const timedOut = isTimeout(err);
    throw new NetworkError(
      timedOut
        ? `DefiLlama request timed out after ${timeoutMs}ms`
        : `DefiLlama request failed: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  if (!res.ok) {
    const reason = res.statusText ? ` ${res.statusText}` : "";
    throw new NetworkError(`DefiLlama API error: ${res.status}${reason}`, {
      status: res.status,
    });
  }

  let text: string;
  try {
    text = await res.text();
  } catch (err) {
    throw new NetworkError(`DefiLlama response body could not be read: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (err) {
    throw new ParseError(`DefiLlama returned malformed JSON: ${errorMessage(err)}`, { cause: err });
  }

  const pools = parseYieldsResponse(body);
  logger.info(`Received ${pools.length} pools from DefiLlama`);
  return pools;
}
