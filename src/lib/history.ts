/**
 * Prompt history persistence: one entry per line, oldest first.
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

export async function loadHistory(path: string): Promise<string[]> {
  let contents: string;
  try {
    contents = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return [];
    }
    throw err;
  }
  return contents.split("\n").filter((line) => line.trim().length > 0);
}

/**
 * Keep the newest `limit` entries. A limit of 0 keeps nothing.
 */
export function trimHistory(entries: string[], limit: number): string[] {
  if (limit <= 0) return [];
  return entries.slice(-limit);
}

export async function saveHistory(
  path: string,
  entries: string[],
  limit: number,
): Promise<void> {
  const kept = trimHistory(entries, limit);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, kept.length > 0 ? kept.join("\n") + "\n" : "");
}

/**
 * Append an entry unless it repeats the previous one.
 */
export function recordEntry(entries: string[], line: string): void {
  if (entries[entries.length - 1] !== line) entries.push(line);
}
