// ============================================
// Default Monitoring Targets
// ============================================

export const DEFILLAMA_YIELDS_URL = "https://yields.llama.fi/pools";

// Chain names as DefiLlama spells them
export const DEFAULT_TARGET_CHAINS = [
  "Ethereum",
  "Arbitrum",
  "Polygon",
  "Optimism",
  "Avalanche",
  "Base",
] as const;

export const DEFAULT_TARGET_PROJECTS = ["aave-v3", "aave-v2"] as const;

// Stablecoins plus BTC wrappers (cbBTC is "CBBTC" upstream)
export const DEFAULT_TARGET_SYMBOLS = ["USDC", "DAI", "WBTC", "CBBTC"] as const;

export const DEFAULT_APY_THRESHOLD = 5.0;
export const DEFAULT_FETCH_TIMEOUT_MS = 15_000;
export const DEFAULT_PROJECT_SLUG = "aave-all";
export const DEFAULT_LOGS_DIR = "data/logs";
export const DEFAULT_EXPORTS_DIR = "data/exports";

export const CSV_HEADER = ["timestamp", "pool_id", "symbol", "apy", "threshold", "alert_triggered"] as const;
