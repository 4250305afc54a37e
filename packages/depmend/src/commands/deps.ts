import * as path from "node:path";

import chalk from "chalk";

import { ExitCode, type ExitCodeType } from "@depmend/core";

import { loadConfig, withOverrides } from "../core/loader.js";
import {
  colorizeDiff,
  formatAnalysisJson,
  formatAnalysisText,
  formatOutcome,
  formatSkipped,
  promptConfirm,
} from "../output/index.js";
import { analyzeProject, applyFixes, type Fix, type FixOutcome, planFixes } from "../pipeline/index.js";
import { parseAssignments, parseFormat, parseKinds, parseTimeout } from "./options.js";

export interface DepsOptions {
  config?: string;
  format?: string;
  accept?: string;
  resolve?: string[];
  target?: string[];
  freshness?: string[];
  yes?: boolean;
  timeout?: string;
}

/** Abort controller tied to Ctrl-C for the duration of a run */
export function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once("SIGINT", onInterrupt);
  return { signal: controller.signal, dispose: () => process.off("SIGINT", onInterrupt) };
}

function exitCodeFor(failedManifests: readonly string[], outcomes: readonly FixOutcome[]): ExitCodeType {
  const failedApply = outcomes.some((outcome) => outcome.status === "failed");
  return failedManifests.length > 0 || failedApply ? ExitCode.RUNTIME_ERROR : ExitCode.SUCCESS;
}

/**
 * depmend deps: report findings and optionally fix accepted kinds.
 * Findings alone do not fail the run; unreadable manifests and failed writes do.
 */
export async function runDeps(projectPath: string | undefined, options: DepsOptions): Promise<ExitCodeType> {
  const root = path.resolve(projectPath ?? ".");
  const format = parseFormat(options.format);
  const accepted = parseKinds(options.accept);
  const resolutions = parseAssignments(options.resolve, "--resolve");
  const targets = parseAssignments(options.target, "--target");
  const freshness = parseAssignments(options.freshness, "--freshness");

  const { config: baseConfig, configPath } = loadConfig(options.config, root);
  const config = withOverrides(baseConfig, {
    freshnessReference: freshness,
    timeoutMs: parseTimeout(options.timeout),
  });

  const { signal, dispose } = interruptSignal();
  try {
    const analysis = await analyzeProject(root, config, { signal });
    const fixes: Fix[] =
      accepted.length > 0
        ? planFixes(analysis, accepted, {
            resolutions,
            targets,
            freshnessReference: config.freshnessReference,
          })
        : [];

    if (format === "json") {
      // JSON output never prompts; only --yes applies
      const outcomes = await applyFixes(fixes, () => Promise.resolve(options.yes === true), { signal });
      process.stdout.write(`${formatAnalysisJson(analysis, configPath, fixes, outcomes)}\n`);
      return exitCodeFor(analysis.failedManifests, outcomes);
    }

    process.stdout.write(`${formatAnalysisText(analysis, configPath)}\n`);

    for (const fix of fixes) {
      if (fix.plan.operations.length === 0 && fix.plan.skipped.length === 0) continue;
      process.stdout.write(`\n${chalk.bold(fix.plan.path)}\n`);
      if (fix.diff) {
        process.stdout.write(colorizeDiff(fix.diff));
      }
      const skipped = formatSkipped(fix);
      if (skipped.length > 0) {
        process.stdout.write(`${chalk.yellow("Not fixed:")}\n${skipped.join("\n")}\n`);
      }
    }

    const outcomes = await applyFixes(
      fixes,
      (fix) => (options.yes ? Promise.resolve(true) : promptConfirm(`Apply changes to ${fix.plan.path}?`)),
      { signal }
    );
    for (const outcome of outcomes) {
      process.stdout.write(`${formatOutcome(outcome)}\n`);
    }
    return exitCodeFor(analysis.failedManifests, outcomes);
  } finally {
    dispose();
  }
}
