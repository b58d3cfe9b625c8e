import type { EvaluatedPool, PoolRecord } from "@apy-watch/common";

export function isAlert(apy: number, threshold: number): boolean {
  return apy >= threshold;
}

/**
 * Annotate each record with the threshold and whether it trips the alert.
 */
export function evaluatePools(records: readonly PoolRecord[], threshold: number): EvaluatedPool[] {
  return records.map((record) => ({
    ...record,
    threshold,
    alertTriggered: isAlert(record.apy, threshold),
  }));
}
