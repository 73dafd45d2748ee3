import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  loadHistory,
  saveHistory,
  trimHistory,
  recordEntry,
} from "../lib/history.js";

describe("history file", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "dtcalc-history-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads nothing when the file does not exist", async () => {
    expect(await loadHistory(join(dir, "missing"))).toEqual([]);
  });

  it("saves oldest first and loads it back", async () => {
    const path = join(dir, "nested", "history");
    await saveHistory(path, ["today + 1d", "now - 2h"], 10);
    expect(await readFile(path, "utf-8")).toBe("today + 1d\nnow - 2h\n");
    expect(await loadHistory(path)).toEqual(["today + 1d", "now - 2h"]);
  });

  it("keeps only the newest entries up to the limit", async () => {
    const path = join(dir, "history");
    await saveHistory(path, ["a + 1d", "b + 1d", "c + 1d"], 2);
    expect(await loadHistory(path)).toEqual(["b + 1d", "c + 1d"]);
  });
});

describe("trimHistory", () => {
  it("returns nothing for a zero limit", () => {
    expect(trimHistory(["x"], 0)).toEqual([]);
  });
});

describe("recordEntry", () => {
  it("skips an immediate repeat", () => {
    const entries = ["today + 1d"];
    recordEntry(entries, "today + 1d");
    recordEntry(entries, "now + 1h");
    recordEntry(entries, "today + 1d");
    expect(entries).toEqual(["today + 1d", "now + 1h", "today + 1d"]);
  });
});
