// ============================================
// APY History Log (append-only CSV)
// ============================================

import fs from "node:fs";
import path from "node:path";
import { CSV_HEADER, IOError, errorMessage, type EvaluatedPool, type LogEntry } from "@apy-watch/common";

export function toLogEntries(pools: readonly EvaluatedPool[], timestamp: string): LogEntry[] {
  return pools.map((p) => ({
    timestamp,
    poolId: p.poolId,
    symbol: p.symbol,
    apy: p.apy,
    threshold: p.threshold,
    alertTriggered: p.alertTriggered,
  }));
}

function escapeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(entry: LogEntry): string {
  return [
    entry.timestamp,
    entry.poolId,
    entry.symbol,
    String(entry.apy),
    String(entry.threshold),
    String(entry.alertTriggered),
  ]
    .map(escapeField)
    .join(",");
}

type LogFileState = "empty" | "terminated" | "unterminated";

// An interrupted append or a hand edit can leave the last row without its newline
async function inspectLogFile(file: string): Promise<LogFileState> {
  let handle: fs.promises.FileHandle;
  try {
    handle = await fs.promises.open(file, "r");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return "empty";
    throw err;
  }
  try {
    const { size } = await handle.stat();
    if (size === 0) return "empty";
    const last = Buffer.alloc(1);
    await handle.read(last, 0, 1, size - 1);
    return last[0] === 0x0a ? "terminated" : "unterminated";
  } finally {
    await handle.close();
  }
}

/**
 * Append entries to the log. The header is written once, when the file is
 * new or empty; existing rows are never touched, and a last row missing its
 * newline is closed off before new rows go in.
 */
export async function appendCsvLog(file: string, entries: readonly LogEntry[]): Promise<number> {
  try {
    await fs.promises.mkdir(path.dirname(file), { recursive: true });

    const state = await inspectLogFile(file);
    const lines: string[] = [];
    if (state === "empty") lines.push(CSV_HEADER.join(","));
    for (const entry of entries) lines.push(formatCsvRow(entry));

    if (lines.length > 0) {
      const lead = state === "unterminated" ? "\n" : "";
      await fs.promises.appendFile(file, `${lead}${lines.join("\n")}\n`, "utf-8");
    }
    return entries.length;
  } catch (err) {
    throw new IOError(`Failed to append APY log ${file}: ${errorMessage(err)}`, file, { cause: err });
  }
}
