// ============================================
// Pool Selection
// ============================================

import type { PoolFilterCriteria, PoolRecord, SymbolMatchMode } from "@apy-watch/common";

const SYMBOL_SEPARATORS = /[-/.\s]+/;

function normalize(value: string): string {
  return value.trim().toUpperCase();
}

/**
 * Does `symbol` match one of `allowed`? Case is ignored in every mode.
 * - exact: whole symbol equals an allowed symbol
 * - token: one of the "-", "/", "." or space separated parts equals an allowed symbol
 *   (bridged "USDC.E" matches "USDC")
 * - substring: an allowed symbol occurs anywhere in the symbol
 */
export function matchesSymbol(
  symbol: string,
  allowed: readonly string[],
  mode: SymbolMatchMode
): boolean {
  const target = normalize(symbol);
  const wanted = allowed.map(normalize).filter((s) => s.length > 0);

  switch (mode) {
    case "exact":
      return wanted.includes(target);
    case "token": {
      const parts = target.split(SYMBOL_SEPARATORS);
      return parts.some((p) => wanted.includes(p));
    }
    case "substring":
      return wanted.some((w) => target.includes(w));
  }
}

function inList(value: string, list: readonly string[]): boolean {
  if (list.length === 0) return true;
  const v = normalize(value);
  return list.some((item) => normalize(item) === v);
}

/**
 * Keep the records the monitor watches. Input order is preserved, so
 * filtering an already filtered list gives the same list.
 */
export function filterPools(records: readonly PoolRecord[], criteria: PoolFilterCriteria): PoolRecord[] {
  const pinned = new Set(criteria.poolIds);

  return records.filter((record) => {
    if (pinned.has(record.poolId)) return true;
    return (
      inList(record.chain, criteria.chains) &&
      inList(record.project, criteria.projects) &&
      matchesSymbol(record.symbol, criteria.symbols, criteria.symbolMatch)
    );
  });
}

/**
 * Configured pool ids that upstream did not return this run.
 */
export function findMissingPoolIds(records: readonly PoolRecord[], poolIds: readonly string[]): string[] {
  const present = new Set(records.map((r) => r.poolId));
  return poolIds.filter((id) => !present.has(id));
}
