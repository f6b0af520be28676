/**
 * Whole-file JSON persistence for local state.
 *
 * Every document is read and rewritten in full on each mutation; there is a
 * single writer per identity so no locking is done.
 */

import { chmodSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { platform } from "node:os";
import { dirname } from "node:path";
import type { z } from "zod";

/**
 * Read and validate a JSON file.
 *
 * Missing, unreadable, unparseable, or schema-invalid files yield `fallback`.
 */
export function readJsonFile<T, F>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: F
): T | F {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch {
    return fallback;
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return fallback;
  }
  const result = schema.safeParse(json);
  return result.success ? result.data : fallback;
}

/**
 * Write `data` as pretty-printed JSON, creating parent directories.
 *
 * `mode` is applied with chmod on non-Windows platforms.
 */
export function writeJsonFile(path: string, data: unknown, mode?: number): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(data, null, 2) + "\n");
  if (mode !== undefined && platform() !== "win32") {
    chmodSync(path, mode);
  }
}
