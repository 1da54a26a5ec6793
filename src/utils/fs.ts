/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, mkdir, readFile, writeFile } from "fs/promises";
import { constants } from "node:fs";
import { dirname } from "node:path";

/**
 * Check if a file or directory exists
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read a source file as UTF-8.
 * Invalid byte sequences become U+FFFD instead of failing the read.
 */
export async function readSourceText(path: string): Promise<string> {
  const buffer = await readFile(path);
  return buffer.toString("utf-8");
}

/**
 * Write a text file, creating parent directories as needed
 */
export async function writeTextFile(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf-8");
}

export async function saveJson(path: string, data: unknown): Promise<void> {
  await writeTextFile(path, JSON.stringify(data, null, 2));
}
