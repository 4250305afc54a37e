import type { Diagnostic, UsageRecord } from "@depmend/core";

/** A module specifier as written, with its 1-based line */
export interface ImportReference {
  specifier: string;
  line: number;
  /** Names imported by a `from x import a, b` statement */
  members?: string[];
}

export interface ScanOptions {
  /** Source globs, relative to the root */
  globs: readonly string[];
  /** Extra exclusion globs on top of the vendored directories */
  exclude?: readonly string[];
  maxFileBytes: number;
  /** Per-file read timeout */
  timeoutMs: number;
  concurrency?: number;
  signal?: AbortSignal;
}

export interface ScanResult {
  usages: UsageRecord[];
  /** Files that were read and scanned */
  files: string[];
  diagnostics: Diagnostic[];
  /** True when some file could not be scanned */
  partial: boolean;
}
