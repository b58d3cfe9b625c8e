import fs from "node:fs";
import path from "node:path";
import { IOError, createLogger, errorMessage, type PoolSnapshot } from "@apy-watch/common";

const logger = createLogger("scanner:snapshot");

/**
 * Replace the latest-run snapshot. Written to a sibling temp file first and
 * renamed, so readers never see a half-written file.
 */
export async function writeSnapshot(file: string, snapshot: PoolSnapshot): Promise<void> {
  const tmp = `${file}.${process.pid}.tmp`;
  try {
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.writeFile(tmp, `${JSON.stringify(snapshot, null, 4)}\n`, "utf-8");
    await fs.promises.rename(tmp, file);
  } catch (err) {
    await fs.promises.rm(tmp, { force: true }).catch((rmErr: unknown) => {
      logger.warn(`Could not remove temp snapshot ${tmp}`, { error: errorMessage(rmErr) });
    });
    throw new IOError(`Failed to write snapshot ${file}: ${errorMessage(err)}`, file, { cause: err });
  }
}
