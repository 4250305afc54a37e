/**
 * Assistant suggestions as edit plans, so they go through the same
 * diff, confirm and apply flow as dependency fixes.
 */

import type { EditOperation, EditPlan } from "@depmend/core";

import { ConfigError } from "../core/errors.js";
import { unifiedDiff } from "../diff/index.js";
import { detectLineEnding, lineEnding, splitLines } from "../manifest/lines.js";
import { applyEdits } from "../plan/index.js";
import type { AssistantClient, SubmitOptions } from "./client.js";

/** 1-based inclusive line range */
export interface LineRange {
  start: number;
  end: number;
}

export interface SuggestRequest {
  path: string;
  text: string;
  instruction: string;
  /** Lines sent to the assistant; the whole file when omitted */
  range?: LineRange;
}

export interface Suggestion {
  plan: EditPlan;
  postEditText: string;
  diff: string;
  /** The assistant's answer with code fences removed */
  answer: string;
}

const FENCED_PATTERN = /^\s*```[^\n]*\n([\s\S]*?)\n?```\s*$/;

/** Remove a Markdown code fence wrapping the whole answer */
export function stripCodeFences(answer: string): string {
  const match = FENCED_PATTERN.exec(answer);
  return match ? match[1] : answer;
}

/** Parse "a-b" (or a single "n") into a line range */
export function parseLineRange(value: string): LineRange | null {
  const match = /^(\d+)(?:-(\d+))?$/.exec(value.trim());
  if (!match) return null;
  const start = Number(match[1]);
  const end = match[2] === undefined ? start : Number(match[2]);
  return start >= 1 && end >= start ? { start, end } : null;
}

export function buildPrompt(request: SuggestRequest, selected: string, range: LineRange): string {
  return [
    `File: ${request.path} (lines ${range.start}-${range.end})`,
    `Instruction: ${request.instruction}`,
    "",
    "```",
    selected.replace(/\r?\n$/, ""),
    "```",
  ].join("\n");
}

/**
 * Single replace operation turning `before` lines into `after` lines, with
 * the unchanged leading and trailing lines trimmed. Null when nothing changes.
 */
export function replacementOperation(
  before: readonly string[],
  after: readonly string[],
  firstLine: number
): EditOperation | null {
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

  const removed = before.length - prefix - suffix;
  const added = after.slice(prefix, after.length - suffix).join("");
  if (removed === 0 && added === "") {
    return null;
  }
  const start = firstLine + prefix;
  if (removed === 0) {
    return { op: "insert", line: start - 1, endLine: start - 1, text: added };
  }
  return {
    op: added === "" ? "delete" : "replace",
    line: start,
    endLine: start + removed - 1,
    text: added,
  };
}

/** Ask the assistant for an edit and turn its answer into a plan and diff */
export async function suggestEdit(
  request: SuggestRequest,
  client: AssistantClient,
  options: SubmitOptions
): Promise<Suggestion> {
  const lines = splitLines(request.text);
  const range = request.range ?? { start: 1, end: Math.max(lines.length, 1) };
  if (range.end > lines.length && lines.length > 0) {
    throw new ConfigError(`${request.path} has ${lines.length} lines; cannot select ${range.start}-${range.end}`);
  }

  const before = lines.slice(range.start - 1, range.end);
  const selected = before.join("");
  const answer = stripCodeFences(await client.submit(buildPrompt(request, selected, range), options));

  const eol = detectLineEnding(request.text);
  let replacement = answer.replace(/\r?\n/g, eol);
  if (lineEnding(selected) !== "" && lineEnding(replacement) === "" && replacement !== "") {
    replacement += eol;
  }

  const operation = replacementOperation(before, splitLines(replacement), range.start);
  const plan: EditPlan = {
    path: request.path,
    operations: operation ? [operation] : [],
    skipped: [],
  };
  const postEditText = applyEdits(request.text, plan.operations);
  return {
    plan,
    postEditText,
    diff: unifiedDiff(request.text, postEditText, request.path),
    answer,
  };
}
