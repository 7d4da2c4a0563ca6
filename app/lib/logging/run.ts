import { join } from "path";
import type { RunSummary } from "../pipeline/processEvents";
import { LOGS_DIR, writeJsonlCapped } from "./jsonl";

const RUN_LOG_FILE = join(LOGS_DIR, "runs.jsonl");

/**
 * Keeps the last 3 run summaries in logs/runs.jsonl.
 */
export async function logRunSummary(
  summary: RunSummary,
  filePath: string = RUN_LOG_FILE,
): Promise<void> {
  try {
    await writeJsonlCapped({
      filePath,
      entry: { timestamp: new Date().toISOString(), ...summary },
      maxEntries: 3,
    });
  } catch (error) {
    // Don't throw - logging failures shouldn't break the run
    console.error("Failed to log run summary:", error);
  }
}
