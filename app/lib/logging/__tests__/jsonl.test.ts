import { describe, it, expect, afterEach, beforeEach } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { appendJsonl, readJsonlLines, resolveLogsDir } from "../jsonl";

describe("resolveLogsDir", () => {
  it("uses LOG_DIR when set", () => {
    expect(resolveLogsDir({ LOG_DIR: " /var/log/setlists " }, "/work")).toBe(
      "/var/log/setlists",
    );
  });

  it("defaults to logs under the working directory", () => {
    expect(resolveLogsDir({}, "/work")).toBe(join("/work", "logs"));
    expect(resolveLogsDir({ LOG_DIR: "  " }, "/work")).toBe(join("/work", "logs"));
  });
});

describe("appendJsonl", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "jsonl-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates missing directories and appends one line per entry", async () => {
    const file = join(dir, "a", "b", "entries.jsonl");

    await appendJsonl(file, { n: 1 });
    await appendJsonl(file, { n: 2 });

    expect(await readJsonlLines(file)).toEqual(['{"n":1}', '{"n":2}']);
  });

  it("reads a missing file as empty", async () => {
    expect(await readJsonlLines(join(dir, "missing.jsonl"))).toEqual([]);
  });
});
