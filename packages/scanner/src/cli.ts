// ============================================
// Single-run entry logic
// ============================================

import { createLogger, errorMessage, exitCodeFor, loadConfig, MonitorError } from "@apy-watch/common";
import { runApyMonitor, type ApyMonitorDeps } from "./jobs/apy-monitor.js";

const logger = createLogger("scanner");

/**
 * Load config, run once, and return the process exit code.
 */
export async function runCli(
  env: Record<string, string | undefined> = process.env,
  deps: ApyMonitorDeps = {}
): Promise<number> {
  try {
    const config = loadConfig(env);
    const summary = await runApyMonitor(config, deps);
    logger.info("APY monitor run complete", { ...summary });
    return 0;
  } catch (err) {
    logger.error("APY monitor run failed", {
      error: errorMessage(err),
      kind: err instanceof MonitorError ? err.name : "UnexpectedError",
    });
    return exitCodeFor(err);
  }
}
