import * as fs from "fs";
import * as path from "path";

import { DocumentResult } from "../agents/types";
import { WorkflowLogger } from "../logging/logging";

/**
 * Writes results as UTF-8 JSON with 2-space indentation. Non-ASCII text is
 * written as-is. Parent directories are created when missing.
 */
export async function saveResults(
  results: readonly DocumentResult[],
  filename: string,
  logger?: WorkflowLogger,
): Promise<string> {
  const outputPath = path.resolve(filename);
  await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.promises.writeFile(outputPath, JSON.stringify(results, null, 2), "utf8");

  logger?.logInfo("saveResults", `Saved ${results.length} results`, { outputPath });
  return outputPath;
}
