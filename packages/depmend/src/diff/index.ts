/**
 * Unified diff rendering for edit plans.
 */

import type { EditPlan } from "@depmend/core";

import { DIFF_CONTEXT_LINES } from "../constants.js";
import { splitLines, stripEol } from "../manifest/lines.js";
import { applyEdits } from "../plan/index.js";

type LineChange = { type: " " | "-" | "+"; text: string };

/** Longest-common-subsequence edit script between two line arrays */
function editScript(before: readonly string[], after: readonly string[]): LineChange[] {
  let prefix = 0;
  while (prefix < before.length && prefix < after.length && before[prefix] === after[prefix]) {
    prefix++;
  }
  let suffix = 0;
  while (
    suffix < before.length - prefix &&
    suffix < after.length - prefix &&
    before[before.length - 1 - suffix] === after[after.length - 1 - suffix]
  ) {
    suffix++;
  }

  const a = before.slice(prefix, before.length - suffix);
  const b = after.slice(prefix, after.length - suffix);
  const lcs: number[][] = Array.from({ length: a.length + 1 }, () => new Array<number>(b.length + 1).fill(0));
  for (let i = a.length - 1; i >= 0; i--) {
    for (let j = b.length - 1; j >= 0; j--) {
      lcs[i][j] = a[i] === b[j] ? lcs[i + 1][j + 1] + 1 : Math.max(lcs[i + 1][j], lcs[i][j + 1]);
    }
  }

  const middle: LineChange[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    if (a[i] === b[j]) {
      middle.push({ type: " ", text: a[i] });
      i++;
      j++;
    } else if (lcs[i + 1][j] >= lcs[i][j + 1]) {
      middle.push({ type: "-", text: a[i++] });
    } else {
      middle.push({ type: "+", text: b[j++] });
    }
  }
  while (i < a.length) middle.push({ type: "-", text: a[i++] });
  while (j < b.length) middle.push({ type: "+", text: b[j++] });

  return [
    ...before.slice(0, prefix).map((text): LineChange => ({ type: " ", text })),
    ...middle,
    ...before.slice(before.length - suffix).map((text): LineChange => ({ type: " ", text })),
  ];
}

function renderLine(change: LineChange): string {
  const body = `${change.type}${stripEol(change.text)}\n`;
  return change.text.endsWith("\n") ? body : `${body}\\ No newline at end of file\n`;
}

/**
 * Standard unified diff between two texts; empty string when they are equal.
 * Hunks whose context would overlap are merged.
 */
export function unifiedDiff(
  before: string,
  after: string,
  filePath: string,
  context: number = DIFF_CONTEXT_LINES
): string {
  if (before === after) {
    return "";
  }

  const script = editScript(splitLines(before), splitLines(after));
  const changed = script.flatMap((change, index) => (change.type === " " ? [] : [index]));

  // Group change indices into hunk windows
  const windows: Array<{ start: number; end: number }> = [];
  for (const index of changed) {
    const start = Math.max(0, index - context);
    const end = Math.min(script.length - 1, index + context);
    const last = windows[windows.length - 1];
    if (last && start <= last.end + 1) {
      last.end = Math.max(last.end, end);
    } else {
      windows.push({ start, end });
    }
  }

  const out = [`--- a/${filePath}\n`, `+++ b/${filePath}\n`];
  for (const window of windows) {
    let oldLine = 1;
    let newLine = 1;
    for (const change of script.slice(0, window.start)) {
      if (change.type !== "+") oldLine++;
      if (change.type !== "-") newLine++;
    }
    const body = script.slice(window.start, window.end + 1);
    const oldCount = body.filter((change) => change.type !== "+").length;
    const newCount = body.filter((change) => change.type !== "-").length;
    const oldStart = oldCount === 0 ? oldLine - 1 : oldLine;
    const newStart = newCount === 0 ? newLine - 1 : newLine;
    out.push(`@@ -${oldStart},${oldCount} +${newStart},${newCount} @@\n`);
    out.push(...body.map(renderLine));
  }
  return out.join("");
}

/** Diff of a plan against the text it was planned for */
export function present(originalText: string, editPlan: EditPlan): string {
  if (editPlan.operations.length === 0) {
    return "";
  }
  return unifiedDiff(originalText, applyEdits(originalText, editPlan.operations), editPlan.path);
}
