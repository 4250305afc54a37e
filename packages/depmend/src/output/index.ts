import * as readline from "node:readline";

import chalk from "chalk";

import type { Diagnostic, Finding, Severity } from "@depmend/core";

import type { FileAnalysis } from "../assist/index.js";
import type { Analysis, Fix, FixOutcome } from "../pipeline/index.js";

export type OutputFormat = "text" | "json";

const SEVERITY_LABELS: Record<Severity, string> = {
  error: chalk.red("error"),
  warning: chalk.yellow("warn"),
  info: chalk.blue("info"),
};

function formatLocation(file: string, line?: number): string {
  return line !== undefined ? `${file}:${line}` : file;
}

function findingLocation(finding: Finding): string {
  const entry = finding.narrower ?? finding.evidence.entries[0];
  if (entry) {
    return formatLocation(entry.manifestPath, entry.sourceSpan.startLine);
  }
  const usage = finding.evidence.usages[0];
  return usage ? formatLocation(usage.filePath, usage.lineNumber) : finding.target;
}

function formatFindingText(finding: Finding): string {
  const kind = chalk.dim(`[${finding.kind}]`);
  return `  ${chalk.cyan(findingLocation(finding))} ${SEVERITY_LABELS[finding.severity]} ${kind} ${finding.message}`;
}

function formatDiagnosticText(diagnostic: Diagnostic): string {
  const code = chalk.dim(`[${diagnostic.code}]`);
  return `  ${chalk.cyan(formatLocation(diagnostic.file, diagnostic.line))} ${chalk.yellow("warn")} ${code} ${diagnostic.message}`;
}

/**
 * Format an analysis as human-readable text
 */
export function formatAnalysisText(analysis: Analysis, configPath: string | null): string {
  const lines: string[] = [];

  lines.push(`depmend deps ${analysis.root}`);
  lines.push(`Config: ${configPath ?? "(defaults)"}`);
  lines.push(`Manifests: ${analysis.manifests.map((m) => m.document.path).join(", ") || "none"}`);
  lines.push("");

  if (analysis.findings.length > 0) {
    lines.push(chalk.bold("FINDINGS"));
    lines.push(...analysis.findings.map(formatFindingText));
    lines.push("");
  }
  if (analysis.diagnostics.length > 0) {
    lines.push(chalk.bold("DIAGNOSTICS"));
    lines.push(...analysis.diagnostics.map(formatDiagnosticText));
    lines.push("");
  }

  lines.push(chalk.dim("─".repeat(50)));
  if (analysis.findings.length === 0) {
    lines.push(chalk.green("✓ Dependencies match usage"));
  } else {
    lines.push(chalk.red(`✗ ${analysis.findings.length} finding(s)`));
  }
  if (analysis.partial) {
    lines.push(chalk.yellow("! Results are partial: some files could not be read"));
  }

  return lines.join("\n");
}

/**
 * Format an analysis as JSON
 */
export function formatAnalysisJson(
  analysis: Analysis,
  configPath: string | null,
  fixes: readonly Fix[] = [],
  outcomes: readonly FixOutcome[] = []
): string {
  return JSON.stringify(
    {
      root: analysis.root,
      configPath,
      manifests: analysis.manifests.map((m) => m.document.path),
      findings: analysis.findings.map((finding) => ({
        kind: finding.kind,
        subjectName: finding.subjectName,
        severity: finding.severity,
        message: finding.message,
        target: finding.target,
        location: findingLocation(finding),
      })),
      diagnostics: analysis.diagnostics,
      partial: analysis.partial,
      fixes: fixes
        .filter((fix) => fix.plan.operations.length > 0 || fix.plan.skipped.length > 0)
        .map((fix) => ({
          path: fix.plan.path,
          diff: fix.diff,
          skipped: fix.plan.skipped.map((s) => ({ subjectName: s.finding.subjectName, reason: s.reason })),
        })),
      outcomes,
    },
    null,
    2
  );
}

/** Assistant report on a single file */
export function formatFileAnalysis(analysis: FileAnalysis): string {
  const lines = [chalk.bold(analysis.path)];
  if (analysis.truncated) {
    lines.push(chalk.yellow("Only the start of the file was analysed"));
  }
  lines.push("", analysis.report);
  return `${lines.join("\n")}\n`;
}

/** Colorize a unified diff for the terminal */
export function colorizeDiff(diff: string): string {
  return diff
    .split("\n")
    .map((line) => {
      if (line.startsWith("+++") || line.startsWith("---")) return chalk.bold(line);
      if (line.startsWith("@@")) return chalk.cyan(line);
      if (line.startsWith("+")) return chalk.green(line);
      if (line.startsWith("-")) return chalk.red(line);
      return line;
    })
    .join("\n");
}

/** Skipped findings of a fix, one line each */
export function formatSkipped(fix: Fix): string[] {
  return fix.plan.skipped.map(
    (s) => `  ${chalk.gray("○")} ${s.finding.subjectName}: ${chalk.gray(s.reason)}`
  );
}

/** One line per apply outcome */
export function formatOutcome(outcome: FixOutcome): string {
  switch (outcome.status) {
    case "applied":
      return `${chalk.green("✓")} Updated ${outcome.path}`;
    case "unchanged":
      return `${chalk.gray("○")} ${outcome.path} unchanged`;
    case "aborted":
      return `${chalk.gray("○")} Left ${outcome.path} as is`;
    default:
      return `${chalk.red("✗")} ${"message" in outcome ? outcome.message : outcome.path}`;
  }
}

/** Terminal streams the confirmation prompt talks to */
export interface PromptStreams {
  input: NodeJS.ReadableStream & { isTTY?: boolean };
  output: NodeJS.WritableStream;
}

/**
 * Ask a yes/no question on the terminal. Anything but y/yes declines,
 * and so does Ctrl-C.
 */
export async function promptConfirm(
  question: string,
  streams: PromptStreams = { input: process.stdin, output: process.stdout }
): Promise<boolean> {
  if (!streams.input.isTTY) {
    return false;
  }

  const rl = readline.createInterface({ input: streams.input, output: streams.output, terminal: true });
  return new Promise((resolve) => {
    // readline takes over Ctrl-C while it owns the terminal
    rl.once("SIGINT", () => {
      rl.close();
      resolve(false);
    });
    rl.question(`${question} [y/N] `, (answer) => {
      rl.close();
      resolve(/^y(es)?$/i.test(answer.trim()));
    });
  });
}
