/**
 * Apply gate: the only place files are written.
 */

import { createHash, randomBytes } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { getErrorMessage, IOFailureError } from "../core/errors.js";

export type ApplyStatus = "aborted" | "unchanged" | "applied";

export interface ApplyOptions {
  /** A missing file reads as empty text and is created */
  create?: boolean;
}

export interface ApplyResult {
  status: ApplyStatus;
  path: string;
}

/** SHA-256 of text as UTF-8, hex encoded */
export function checksum(text: string): string {
  return createHash("sha256").update(text, "utf-8").digest("hex");
}

function tempSibling(filePath: string): string {
  const suffix = `${process.pid}.${randomBytes(4).toString("hex")}`;
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${suffix}.tmp`);
}

/**
 * Renaming over a file only needs a writable directory, so the file's own
 * permissions are checked first. Read-only files are refused even where the
 * process could override the mode.
 */
async function assertWritable(filePath: string, mode: number): Promise<void> {
  if ((mode & 0o222) === 0) {
    throw new IOFailureError(`${filePath} is read-only`, filePath);
  }
  try {
    await fs.access(filePath, fs.constants.W_OK);
  } catch (error) {
    throw new IOFailureError(`Cannot write ${filePath}: ${getErrorMessage(error)}`, filePath);
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Current text and permission bits; mode is null for a file still to be created */
async function readCurrent(
  filePath: string,
  create: boolean
): Promise<{ current: string; mode: number | null }> {
  try {
    const current = await fs.readFile(filePath, "utf-8");
    const mode = (await fs.stat(filePath)).mode & 0o777;
    return { current, mode };
  } catch (error) {
    if (create && isMissing(error)) {
      return { current: "", mode: null };
    }
    throw new IOFailureError(`Cannot read ${filePath}: ${getErrorMessage(error)}`, filePath);
  }
}

/**
 * Write postEditText to filePath only when confirmed, replacing the file
 * atomically. Throws IOFailureError when the file is unreadable, unwritable,
 * or no longer matches originalText.
 */
export async function apply(
  filePath: string,
  originalText: string,
  postEditText: string,
  confirmed: boolean,
  options: ApplyOptions = {}
): Promise<ApplyResult> {
  if (!confirmed) {
    return { status: "aborted", path: filePath };
  }
  if (originalText === postEditText) {
    return { status: "unchanged", path: filePath };
  }

  const { current, mode } = await readCurrent(filePath, options.create === true);
  if (mode !== null) {
    await assertWritable(filePath, mode);
  }

  if (checksum(current) !== checksum(originalText)) {
    throw new IOFailureError(`${filePath} changed on disk since it was read`, filePath, true);
  }

  const tempPath = tempSibling(filePath);
  try {
    if (mode === null) {
      await fs.writeFile(tempPath, postEditText, { encoding: "utf-8", flag: "wx" });
    } else {
      await fs.writeFile(tempPath, postEditText, { encoding: "utf-8", mode });
      // writeFile's mode is filtered by the umask
      await fs.chmod(tempPath, mode);
    }
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new IOFailureError(`Cannot write ${filePath}: ${getErrorMessage(error)}`, filePath);
  }

  return { status: "applied", path: filePath };
}
