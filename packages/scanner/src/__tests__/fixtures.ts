import type { PoolRecord } from "@apy-watch/common";
import type { FetchLike } from "../sources/defillama.js";

export function pool(overrides: Partial<PoolRecord> = {}): PoolRecord {
  return {
    poolId: "pool-usdc-eth",
    chain: "Ethereum",
    project: "aave-v3",
    symbol: "USDC",
    apy: 5.2,
    ...overrides,
  };
}

export function rawPool(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    pool: "pool-usdc-eth",
    chain: "Ethereum",
    project: "aave-v3",
    symbol: "USDC",
    apy: 5.2,
    apyBase: 4.9,
    apyReward: 0.3,
    tvlUsd: 1_250_000,
    stablecoin: true,
    ...overrides,
  };
}

export function respondWith(body: string, status = 200): FetchLike {
  return async () => new Response(body, { status, headers: { "Content-Type": "application/json" } });
}

export function respondWithPools(pools: Record<string, unknown>[]): FetchLike {
  return respondWith(JSON.stringify({ status: "success", data: pools }));
}
