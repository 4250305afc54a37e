import * as fs from "node:fs/promises";
import * as path from "node:path";

import { glob } from "glob";

import { EXCLUDED_DIRS, SCAN_LIMITS } from "../constants.js";
import { getErrorMessage, IOFailureError } from "./errors.js";
import { runBounded, type TaskBounds, throwIfCancelled } from "./timeout.js";

/**
 * Find files under root matching any pattern, as sorted POSIX paths relative to root
 */
export async function discoverFiles(
  root: string,
  patterns: readonly string[],
  exclude: readonly string[] = [],
  signal?: AbortSignal
): Promise<string[]> {
  let matches: string[];
  try {
    matches = await glob([...patterns], {
      cwd: root,
      nodir: true,
      dot: false,
      posix: true,
      ignore: [...EXCLUDED_DIRS, ...exclude],
      signal,
    });
  } catch (error) {
    throwIfCancelled(signal, "File discovery");
    throw error;
  }
  return [...new Set(matches)].sort();
}

/** Outcome of reading one text file */
export type TextFileRead =
  | { status: "ok"; text: string }
  | { status: "skipped"; reason: "too-large" | "binary" };

export interface ReadLimits {
  maxFileBytes: number;
}

/** True when the first bytes contain a NUL character */
export function looksBinary(buffer: Buffer): boolean {
  return buffer.subarray(0, SCAN_LIMITS.binarySniffBytes).includes(0);
}

/**
 * Read a UTF-8 text file under a time bound.
 * Oversized and binary files are skipped; IO errors become IOFailureError.
 */
export async function readTextFile(
  absolutePath: string,
  bounds: TaskBounds,
  limits?: ReadLimits
): Promise<TextFileRead> {
  const displayPath = path.basename(absolutePath);
  return runBounded<TextFileRead>(`Reading ${displayPath}`, bounds, async (signal) => {
    let buffer: Buffer;
    try {
      if (limits) {
        const stats = await fs.stat(absolutePath);
        if (stats.size > limits.maxFileBytes) {
          return { status: "skipped", reason: "too-large" };
        }
      }
      buffer = await fs.readFile(absolutePath, { signal });
    } catch (error) {
      if (signal.aborted) throw error;
      throw new IOFailureError(
        `Cannot read ${absolutePath}: ${getErrorMessage(error)}`,
        absolutePath
      );
    }
    if (looksBinary(buffer)) {
      return { status: "skipped", reason: "binary" };
    }
    return { status: "ok", text: buffer.toString("utf-8") };
  });
}
