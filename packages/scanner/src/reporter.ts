// ============================================
// Console Alert Reporter
// ============================================

import type { EvaluatedPool } from "@apy-watch/common";

export type LineWriter = (line: string) => void;

function describePool(pool: EvaluatedPool): string {
  return `${pool.poolId} (${pool.project}/${pool.chain} ${pool.symbol})`;
}

export function formatAlert(pool: EvaluatedPool): string {
  return (
    `ALERT: High yield detected! Pool: ${describePool(pool)} | ` +
    `APY: ${pool.apy.toFixed(2)}% >= Threshold: ${pool.threshold.toFixed(2)}%`
  );
}

export function formatBelow(pool: EvaluatedPool): string {
  return `Pool: ${describePool(pool)} | APY: ${pool.apy.toFixed(2)}% (below threshold)`;
}

/**
 * Print one line per pool and return how many alerts fired.
 */
export function reportResults(pools: readonly EvaluatedPool[], write: LineWriter = console.log): number {
  let alerts = 0;
  for (const pool of pools) {
    if (pool.alertTriggered) {
      alerts++;
      write(formatAlert(pool));
    } else {
      write(formatBelow(pool));
    }
  }
  return alerts;
}
