import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { DiagnosticsWriter } from "../adapters/types";
import { slugifyText } from "../lib/slugify";
import { Logger } from "../lib/logger";
import { CanonicalProductRecord } from "../types";

/** Writes the ordered record list as a JSON array; the contract downstream exporters read. */
export async function writeRecordDocument(filePath: string, records: readonly CanonicalProductRecord[]): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(records, null, 2)}\n`, "utf8");
}

export function diagnosticsPath(dir: string, sourceId: string): string {
  return path.join(dir, `${slugifyText(sourceId) || "source"}-first-page.html`);
}

/** Snapshot failures are logged and dropped; they never affect a run. */
export function createDiagnosticsWriter(dir: string, logger: Logger): DiagnosticsWriter {
  return async (sourceId, html) => {
    const target = diagnosticsPath(dir, sourceId);
    try {
      await mkdir(dir, { recursive: true });
      await writeFile(target, html, "utf8");
      logger.debug("diagnostics_written", { source_id: sourceId, path: target, bytes: html.length });
    } catch (error) {
      logger.warn("diagnostics_write_failed", { source_id: sourceId, path: target, error });
    }
  };
}
