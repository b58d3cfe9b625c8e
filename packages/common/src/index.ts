// ============================================
// @apy-watch/common
// ============================================

export * from "./types/pool.js";
export * from "./constants/targets.js";
export * from "./utils/errors.js";
export * from "./utils/logger.js";
export * from "./utils/config.js";
