import { mkdtemp, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFileActivityLog, createFileMessageFlag, keepLastLines } from "./file-activity-log";

describe("file activity log", () => {
  let root = "";

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "discord-relay-activity-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("keeps only the most recent lines", () => {
    expect(keepLastLines("a\nb\nc\n", 2)).toBe("b\nc\n");
    expect(keepLastLines("a\nb\n", 2)).toBeUndefined();
    expect(keepLastLines("a\nb\nc", 1)).toBe("c\n");
  });

  it("appends lines and truncates after each write", async () => {
    const path = join(root, "watchdog.log");
    const log = createFileActivityLog(path, 3);

    await log.append(["one", "two"]);
    expect(await readFile(path, "utf8")).toBe("one\ntwo\n");

    await log.append(["three", "four"]);
    expect(await readFile(path, "utf8")).toBe("two\nthree\nfour\n");

    await log.append(["five"]);
    expect(await readFile(path, "utf8")).toBe("three\nfour\nfive\n");
  });

  it("ignores empty batches", async () => {
    const path = join(root, "watchdog.log");
    const log = createFileActivityLog(path, 3);
    await log.append([]);
    await expect(readFile(path, "utf8")).rejects.toThrow(/ENOENT/);
  });

  it("overwrites the message flag with the latest batch", async () => {
    const path = join(root, "flags", "new_message.flag");
    const flag = createFileMessageFlag(path);

    await flag.write("[2026-01-01 00:00:00] alice: first");
    await flag.write("[2026-01-01 00:01:00] bob: second");

    expect(await readFile(path, "utf8")).toBe("[2026-01-01 00:01:00] bob: second");
  });
});
