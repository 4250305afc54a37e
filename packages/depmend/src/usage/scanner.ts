import * as path from "node:path";

import { type Diagnostic, DiagnosticBuilder, type Ecosystem, type UsageRecord } from "@depmend/core";

import { CONCURRENCY } from "../constants.js";
import { mapInBatches } from "../core/batch.js";
import { IOFailureError, TimeoutError } from "../core/errors.js";
import { discoverFiles, readTextFile } from "../core/files.js";
import { throwIfCancelled } from "../core/timeout.js";
import { pythonStdlibModules } from "../data.js";
import { normalizePythonName } from "../manifest/names.js";
import { extractJavaScriptImports, javascriptPackageName } from "./javascript.js";
import { extractPythonImports, pythonNamespaceCandidates, pythonTopLevel } from "./python.js";
import type { ImportReference, ScanOptions, ScanResult } from "./types.js";

type FileOutcome =
  | { file: string; references: ImportReference[] }
  | { file: string; skipped: true }
  | { file: string; diagnostic: Diagnostic };

/**
 * Module names importable from a source root (the project root or `src/`):
 * top-level Python files and top-level package directories.
 */
export function localPythonModules(files: readonly string[]): Set<string> {
  const topLevel = (parts: readonly string[]): string =>
    normalizePythonName(parts.length === 1 ? parts[0].replace(/\.pyi?$/, "") : parts[0]);

  const local = new Set<string>();
  for (const file of files) {
    const parts = file.split("/");
    local.add(topLevel(parts));
    if (parts[0] === "src" && parts.length > 1) {
      local.add(topLevel(parts.slice(1)));
    }
  }
  return local;
}

function extract(ecosystem: Ecosystem, text: string): ImportReference[] {
  return ecosystem === "python" ? extractPythonImports(text) : extractJavaScriptImports(text);
}

async function scanFile(
  root: string,
  file: string,
  ecosystem: Ecosystem,
  options: ScanOptions
): Promise<FileOutcome> {
  try {
    const read = await readTextFile(
      path.join(root, file),
      { timeoutMs: options.timeoutMs, signal: options.signal },
      { maxFileBytes: options.maxFileBytes }
    );
    if (read.status === "skipped") {
      return { file, skipped: true };
    }
    return { file, references: extract(ecosystem, read.text) };
  } catch (error) {
    if (error instanceof TimeoutError) {
      return { file, diagnostic: DiagnosticBuilder.timeout(file, error.message) };
    }
    if (error instanceof IOFailureError) {
      return { file, diagnostic: DiagnosticBuilder.ioFailure(file, error.message) };
    }
    throw error;
  }
}

/**
 * Collect external module usage for one ecosystem under root.
 * Unreadable or timed-out files are dropped with a diagnostic and mark the
 * result partial; cancellation rejects with CancelledError.
 */
export async function scanUsage(
  root: string,
  ecosystem: Ecosystem,
  options: ScanOptions
): Promise<ScanResult> {
  throwIfCancelled(options.signal, "Scan");
  const files = await discoverFiles(root, options.globs, options.exclude, options.signal);
  const outcomes = await mapInBatches(
    files,
    options.concurrency ?? CONCURRENCY.fileReads,
    (file) => scanFile(root, file, ecosystem, options),
    options.signal
  );

  const stdlib = ecosystem === "python" ? pythonStdlibModules() : new Set<string>();
  const local = ecosystem === "python" ? localPythonModules(files) : new Set<string>();

  const usages: UsageRecord[] = [];
  const scanned: string[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const outcome of outcomes) {
    if ("diagnostic" in outcome) {
      diagnostics.push(outcome.diagnostic);
      continue;
    }
    if ("skipped" in outcome) {
      continue;
    }
    scanned.push(outcome.file);
    for (const reference of outcome.references) {
      const moduleName =
        ecosystem === "python"
          ? pythonTopLevel(reference.specifier)
          : javascriptPackageName(reference.specifier);
      if (moduleName === null || stdlib.has(moduleName) || local.has(moduleName)) {
        continue;
      }
      const candidates =
        ecosystem === "python" ? pythonNamespaceCandidates(reference.specifier, reference.members) : [];
      usages.push({
        moduleName,
        rawModule: reference.specifier,
        filePath: outcome.file,
        lineNumber: reference.line,
        ecosystem,
        ...(candidates.length > 0 && { namespaceCandidates: candidates }),
      });
    }
  }

  return { usages, files: scanned, diagnostics, partial: diagnostics.length > 0 };
}
