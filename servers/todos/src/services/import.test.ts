import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { parseImportLines, readImportFiles } from "./import.js";

describe("parseImportLines", () => {
  test("returns one entry per line, trimmed", () => {
    expect(parseImportLines("  buy milk \n\twalk dog\t\n")).toEqual([
      "buy milk",
      "walk dog",
    ]);
  });

  test("drops blank and whitespace-only lines", () => {
    expect(parseImportLines("\n\none\n   \n\ntwo\n")).toEqual(["one", "two"]);
  });

  test("keeps text after the last newline", () => {
    expect(parseImportLines("one\ntwo")).toEqual(["one", "two"]);
  });

  test("handles Windows line endings", () => {
    expect(parseImportLines("one\r\ntwo\r\n")).toEqual(["one", "two"]);
  });

  test("yields nothing for empty input", () => {
    expect(parseImportLines("")).toEqual([]);
  });
});

describe("readImportFiles", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ticklist-import-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("concatenates files in the order given", async () => {
    const first = join(dir, "a.txt");
    const second = join(dir, "b.txt");
    writeFileSync(first, "alpha\n\nbeta\n");
    writeFileSync(second, "gamma");

    expect(await readImportFiles([second, first])).toEqual([
      "gamma",
      "alpha",
      "beta",
    ]);
  });
});
