// ============================================
// APY Monitor Job
// ============================================

import { v4 as uuid } from "uuid";
import { createLogger, type AppConfig, type RunSummary } from "@apy-watch/common";
import { fetchYieldPools, type FetchLike } from "../sources/defillama.js";
import { filterPools, findMissingPoolIds } from "../filters/pool-filter.js";
import { evaluatePools } from "../evaluator.js";
import { appendCsvLog, toLogEntries } from "../persistence/csv-log.js";
import { writeSnapshot } from "../persistence/snapshot.js";
import { reportResults, type LineWriter } from "../reporter.js";

const logger = createLogger("scanner:apy-monitor");

export interface ApyMonitorDeps {
  fetchImpl?: FetchLike;
  now?: () => Date;
  write?: LineWriter;
  runId?: string;
}

/**
 * One monitoring pass: fetch → filter → evaluate → persist → report.
 * Any failure propagates; nothing is printed as an alert until both files are written.
 */
export async function runApyMonitor(
  config: Readonly<AppConfig>,
  deps: ApyMonitorDeps = {}
): Promise<RunSummary> {
  const runId = deps.runId ?? uuid();
  const startedAt = (deps.now ?? (() => new Date()))().toISOString();
  const { targets, output } = config;

  logger.info("Starting APY monitor run", {
    runId,
    threshold: config.apyThreshold,
    symbols: targets.symbols,
    symbolMatch: targets.symbolMatch,
  });

  // 1. Fetch
  const pools = await fetchYieldPools({
    url: config.source.url,
    timeoutMs: config.source.timeoutMs,
    fetchImpl: deps.fetchImpl,
  });

  // 2. Filter
  const matched = filterPools(pools, targets);
  const missingPoolIds = findMissingPoolIds(pools, targets.poolIds);
  for (const id of missingPoolIds) {
    logger.warn(`Pool ID ${id} not found upstream`, { poolId: id });
  }
  if (matched.length === 0) {
    logger.warn("No pools matched the configured targets", {
      chains: targets.chains,
      projects: targets.projects,
    });
  }

  // 3. Evaluate
  const evaluated = evaluatePools(matched, config.apyThreshold);

  // 4. Persist
  const logged = await appendCsvLog(output.logFile, toLogEntries(evaluated, startedAt));
  logger.info(`Logged ${logged} pool entries`, { file: output.logFile });

  await writeSnapshot(output.snapshotFile, {
    runId,
    generatedAt: startedAt,
    threshold: config.apyThreshold,
    pools: evaluated,
  });
  logger.info(`Exported latest data for ${evaluated.length} pools`, { file: output.snapshotFile });

  // 5. Report
  const alerts = reportResults(evaluated, deps.write);

  return {
    runId,
    startedAt,
    fetched: pools.length,
    matched: matched.length,
    alerts,
    missingPoolIds,
    logFile: output.logFile,
    snapshotFile: output.snapshotFile,
  };
}
