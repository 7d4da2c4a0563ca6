import { join } from "path";
import { appendJsonl, LOGS_DIR } from "./jsonl";

const SETLISTFM_LOG_FILE = join(LOGS_DIR, "setlistfm.jsonl");

interface SetlistFmLogEntry {
  timestamp: string;
  endpoint: "artist" | "venue";
  params: Record<string, string>;
  rawResponse: unknown;
}

/**
 * Logs a setlist.fm search response to a JSONL file (append-only).
 */
export async function logSetlistFmResponse(
  endpoint: "artist" | "venue",
  params: Record<string, string>,
  rawResponse: unknown,
): Promise<void> {
  try {
    const logEntry: SetlistFmLogEntry = {
      timestamp: new Date().toISOString(),
      endpoint,
      params,
      rawResponse,
    };
    await appendJsonl(SETLISTFM_LOG_FILE, logEntry);
  } catch (error) {
    // Don't throw - logging failures shouldn't break the run
    console.error("Failed to log setlist.fm response:", error);
  }
}
