/**
 * End-to-end run: discover, parse and scan concurrently, join, reconcile,
 * then plan and apply fixes.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";

import {
  type Diagnostic,
  DiagnosticBuilder,
  type Ecosystem,
  type EditPlan,
  type Finding,
  type FindingKind,
  type ManifestDocument,
  type UsageRecord,
} from "@depmend/core";

import { apply, type ApplyResult } from "../apply/index.js";
import { CONCURRENCY, MANIFEST_PATTERNS } from "../constants.js";
import { mapInBatches } from "../core/batch.js";
import { getErrorMessage, IOFailureError, TimeoutError } from "../core/errors.js";
import { discoverFiles, readTextFile } from "../core/files.js";
import type { EngineConfig } from "../core/loader.js";
import { throwIfCancelled } from "../core/timeout.js";
import { present } from "../diff/index.js";
import { adapterFor } from "../manifest/index.js";
import { applyPlan, plan, type PlanInputs } from "../plan/index.js";
import { reconcile } from "../reconcile/index.js";
import { scanUsage } from "../usage/index.js";

export interface RunOptions {
  signal?: AbortSignal;
  /** Per-file timeout; defaults to the configured scan timeout */
  timeoutMs?: number;
  concurrency?: number;
}

/** A parsed manifest together with the text it was parsed from */
export interface LoadedManifest {
  document: ManifestDocument;
  text: string;
  absolutePath: string;
}

export interface Analysis {
  root: string;
  manifests: LoadedManifest[];
  usages: UsageRecord[];
  findings: Finding[];
  diagnostics: Diagnostic[];
  /** Manifests that could not be read */
  failedManifests: string[];
  /** True when some file's contribution was dropped */
  partial: boolean;
}

type ManifestOutcome =
  | { status: "loaded"; manifest: LoadedManifest }
  | { status: "failed"; file: string; diagnostic: Diagnostic };

async function assertReadableRoot(root: string): Promise<void> {
  try {
    const stats = await fs.stat(root);
    if (!stats.isDirectory()) {
      throw new IOFailureError(`${root} is not a directory`, root);
    }
    await fs.access(root, fs.constants.R_OK);
  } catch (error) {
    if (error instanceof IOFailureError) throw error;
    throw new IOFailureError(`Cannot read project root ${root}: ${getErrorMessage(error)}`, root);
  }
}

async function loadManifest(
  root: string,
  file: string,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<ManifestOutcome> {
  const adapter = adapterFor(file);
  const absolutePath = path.join(root, file);
  try {
    const read = await readTextFile(absolutePath, { timeoutMs, signal });
    if (!adapter || read.status === "skipped") {
      return {
        status: "failed",
        file,
        diagnostic: DiagnosticBuilder.ioFailure(file, `${file} is not a readable manifest`),
      };
    }
    return {
      status: "loaded",
      manifest: { document: adapter.parse(read.text, file), text: read.text, absolutePath },
    };
  } catch (error) {
    if (error instanceof TimeoutError) {
      return { status: "failed", file, diagnostic: DiagnosticBuilder.timeout(file, error.message) };
    }
    if (error instanceof IOFailureError) {
      return { status: "failed", file, diagnostic: DiagnosticBuilder.ioFailure(file, error.message) };
    }
    throw error;
  }
}

/**
 * Analyze a project. Per-file failures become diagnostics; an unreadable root
 * throws IOFailureError and cancellation throws CancelledError.
 */
export async function analyzeProject(
  root: string,
  config: EngineConfig,
  options: RunOptions = {}
): Promise<Analysis> {
  const { signal } = options;
  const timeoutMs = options.timeoutMs ?? config.scan.timeoutMs;
  const absoluteRoot = path.resolve(root);

  throwIfCancelled(signal);
  await assertReadableRoot(absoluteRoot);

  const manifestFiles = (
    await discoverFiles(
      absoluteRoot,
      Object.values(MANIFEST_PATTERNS).flat(),
      config.scan.exclude,
      signal
    )
  ).filter((file) => adapterFor(file) !== null);

  const ecosystems = [
    ...new Set(manifestFiles.flatMap((file) => adapterFor(file)?.ecosystem ?? [])),
  ].sort();

  const [manifestOutcomes, scans] = await Promise.all([
    mapInBatches(
      manifestFiles,
      options.concurrency ?? CONCURRENCY.fileReads,
      (file) => loadManifest(absoluteRoot, file, timeoutMs, signal),
      signal
    ),
    Promise.all(
      ecosystems.map((ecosystem: Ecosystem) =>
        scanUsage(absoluteRoot, ecosystem, {
          globs: config.ecosystemFileGlobs[ecosystem],
          exclude: config.scan.exclude,
          maxFileBytes: config.scan.maxFileBytes,
          timeoutMs,
          concurrency: options.concurrency,
          signal,
        })
      )
    ),
  ]);

  // Partial results of a cancelled run are discarded
  throwIfCancelled(signal);

  const manifests: LoadedManifest[] = [];
  const failedManifests: string[] = [];
  const diagnostics: Diagnostic[] = [];
  for (const outcome of manifestOutcomes) {
    if (outcome.status === "loaded") {
      manifests.push(outcome.manifest);
      diagnostics.push(...outcome.manifest.document.diagnostics);
    } else {
      failedManifests.push(outcome.file);
      diagnostics.push(outcome.diagnostic);
    }
  }

  const usages = scans.flatMap((scan) => scan.usages);
  for (const scan of scans) {
    diagnostics.push(...scan.diagnostics);
  }

  const findings = reconcile(
    manifests.map((manifest) => manifest.document),
    usages,
    config
  );

  return {
    root: absoluteRoot,
    manifests,
    usages,
    findings,
    diagnostics,
    failedManifests,
    partial: failedManifests.length > 0 || scans.some((scan) => scan.partial),
  };
}

/** Planned change to one manifest */
export interface Fix {
  manifest: LoadedManifest;
  plan: EditPlan;
  postEditText: string;
  diff: string;
}

/** Plan accepted findings for every manifest of an analysis */
export function planFixes(
  analysis: Analysis,
  acceptedKinds: readonly FindingKind[],
  inputs: PlanInputs = {}
): Fix[] {
  return analysis.manifests.map((manifest) => {
    const editPlan = plan(manifest.document, analysis.findings, acceptedKinds, inputs);
    return {
      manifest,
      plan: editPlan,
      postEditText: applyPlan(manifest.document, editPlan),
      diff: present(manifest.text, editPlan),
    };
  });
}

export type FixOutcome = ApplyResult | { status: "failed"; path: string; message: string };

/**
 * Ask for confirmation and apply each fix that has edits. A failure on one
 * file does not stop the others; cancellation stops before the next write.
 */
export async function applyFixes(
  fixes: readonly Fix[],
  confirm: (fix: Fix) => Promise<boolean>,
  options: { signal?: AbortSignal } = {}
): Promise<FixOutcome[]> {
  const outcomes: FixOutcome[] = [];
  for (const fix of fixes) {
    if (fix.plan.operations.length === 0) continue;
    throwIfCancelled(options.signal);
    const confirmed = await confirm(fix);
    throwIfCancelled(options.signal);
    try {
      outcomes.push(await apply(fix.manifest.absolutePath, fix.manifest.text, fix.postEditText, confirmed));
    } catch (error) {
      if (!(error instanceof IOFailureError)) throw error;
      outcomes.push({ status: "failed", path: fix.manifest.absolutePath, message: error.message });
    }
  }
  return outcomes;
}
