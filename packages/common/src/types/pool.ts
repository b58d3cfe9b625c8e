// ============================================
// Pool & Log Types
// ============================================

/**
 * One lending pool as reported by the yields API.
 * Mapped verbatim from upstream; the only identity is `poolId`.
 */
export interface PoolRecord {
  poolId: string;
  chain: string;
  project: string;
  symbol: string;
  apy: number;             // Total APY %
  tvlUsd?: number;
  apyBase?: number | null;
  apyReward?: number | null;
  stablecoin?: boolean;
}

export interface EvaluatedPool extends PoolRecord {
  threshold: number;
  alertTriggered: boolean;
}

// One CSV row
export interface LogEntry {
  timestamp: string;
  poolId: string;
  symbol: string;
  apy: number;
  threshold: number;
  alertTriggered: boolean;
}

export type SymbolMatchMode = "exact" | "token" | "substring";

export const SYMBOL_MATCH_MODES: readonly SymbolMatchMode[] = ["exact", "token", "substring"];

export interface PoolFilterCriteria {
  symbols: readonly string[];
  chains: readonly string[];     // empty = any chain
  projects: readonly string[];   // empty = any project
  poolIds: readonly string[];    // always kept when present upstream
  symbolMatch: SymbolMatchMode;
}

export interface PoolSnapshot {
  runId: string;
  generatedAt: string;
  threshold: number;
  pools: EvaluatedPool[];
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  fetched: number;
  matched: number;
  alerts: number;
  missingPoolIds: string[];
  logFile: string;
  snapshotFile: string;
}
