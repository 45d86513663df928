import { readFile } from "node:fs/promises";

/**
 * One todo per non-blank line, surrounding whitespace removed.
 */
export function parseImportLines(contents: string): string[] {
  return contents
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Read each file in order and collect its lines into a single batch.
 */
export async function readImportFiles(paths: readonly string[]): Promise<string[]> {
  const batch: string[] = [];
  for (const path of paths) {
    const contents = await readFile(path, "utf8");
    batch.push(...parseImportLines(contents));
  }
  return batch;
}
