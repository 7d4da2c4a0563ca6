import { appendFile, mkdir, readFile, writeFile } from "fs/promises";
import { dirname, join } from "path";

/**
 * Log directory: LOG_DIR when set, else ./logs under the working directory.
 * Read by the logging modules at import, not by loadConfig.
 */
export function resolveLogsDir(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  return env.LOG_DIR?.trim() || join(cwd, "logs");
}

export const LOGS_DIR = resolveLogsDir();

export async function ensureLogsDir(dir: string = LOGS_DIR): Promise<void> {
  // recursive mkdir resolves when the directory already exists
  await mkdir(dir, { recursive: true });
}

export async function readJsonlLines(filePath: string): Promise<string[]> {
  try {
    const raw = await readFile(filePath, "utf8");
    return raw
      .split("\n")
      .map((l) => l.trim())
      .filter(Boolean);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw error;
  }
}

/**
 * Writes a JSONL file capped to the last N entries.
 *
 * NOTE: Each entry is stored as single-line JSON, one per line, so the file
 * can be capped by line count.
 */
export async function writeJsonlCapped(params: {
  filePath: string;
  entry: unknown;
  maxEntries?: number;
}): Promise<void> {
  const { filePath, entry, maxEntries = 3 } = params;
  await ensureLogsDir(dirname(filePath));

  const existing = await readJsonlLines(filePath);
  const next = [
    ...existing.slice(Math.max(0, existing.length - (maxEntries - 1))),
    JSON.stringify(entry),
  ];
  await writeFile(filePath, next.join("\n") + "\n", { flag: "w" });
}

/**
 * Appends one entry to an uncapped JSONL file.
 */
export async function appendJsonl(filePath: string, entry: unknown): Promise<void> {
  await ensureLogsDir(dirname(filePath));
  await appendFile(filePath, JSON.stringify(entry) + "\n");
}
