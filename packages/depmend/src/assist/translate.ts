/**
 * Translation of a source file into another language, written to a sibling
 * file with the same stem. The result is an edit plan against the sibling's
 * current text (empty when it does not exist yet).
 */

import * as path from "node:path";

import type { EditPlan } from "@depmend/core";

import { LANGUAGE_EXTENSIONS } from "../constants.js";
import { AssistantError, ConfigError } from "../core/errors.js";
import { present } from "../diff/index.js";
import { detectLineEnding, lineEnding, splitLines } from "../manifest/lines.js";
import { applyEdits } from "../plan/index.js";
import type { AssistantClient, SubmitOptions } from "./client.js";
import { replacementOperation, stripCodeFences } from "./suggest.js";

export const TRANSLATION_INSTRUCTIONS =
  "You translate a source file into another programming language. Keep its behaviour, " +
  "public names and structure, and use the target language's idioms and standard library. " +
  "Reply with the complete translated file only.";

export interface TranslateRequest {
  /** Source path as shown to the user */
  path: string;
  text: string;
  language: string;
  /** Target path as shown to the user */
  targetPath: string;
  /** Current target text; null when the target does not exist */
  targetText: string | null;
}

export interface Translation {
  targetPath: string;
  plan: EditPlan;
  postEditText: string;
  diff: string;
  /** True when the target file does not exist yet */
  creates: boolean;
}

/**
 * Sibling of sourcePath with the target language's extension. An explicit
 * extension wins over the language table.
 */
export function translationTarget(sourcePath: string, language: string, extension?: string): string {
  const raw = extension ?? LANGUAGE_EXTENSIONS[language.trim().toLowerCase()];
  if (raw === undefined || raw.replace(/^\./, "") === "") {
    throw new ConfigError(`No file extension known for "${language}"; pass --ext`);
  }
  const ext = raw.startsWith(".") ? raw : `.${raw}`;
  const parsed = path.parse(sourcePath);
  const target = path.join(parsed.dir, `${parsed.name}${ext}`);
  if (target === sourcePath) {
    throw new ConfigError(`Translating ${sourcePath} to ${language} would overwrite it`);
  }
  return target;
}

export function buildTranslationPrompt(request: TranslateRequest): string {
  return [
    `Source: ${request.path}`,
    `Target: ${request.targetPath} (${request.language})`,
    "",
    "```",
    request.text.replace(/\r?\n$/, ""),
    "```",
  ].join("\n");
}

/** Ask the assistant for a translation and plan it against the target's current text */
export async function translateFile(
  request: TranslateRequest,
  client: AssistantClient,
  options: SubmitOptions
): Promise<Translation> {
  const answer = stripCodeFences(
    await client.submit(buildTranslationPrompt(request), { ...options, instructions: TRANSLATION_INSTRUCTIONS })
  );
  if (answer.trim() === "") {
    throw new AssistantError(`Assistant returned no translation for ${request.path}`);
  }

  const eol = detectLineEnding(request.text);
  let translated = answer.replace(/\r?\n/g, eol);
  if (lineEnding(translated) === "") {
    translated += eol;
  }

  const before = request.targetText ?? "";
  const operation = replacementOperation(splitLines(before), splitLines(translated), 1);
  const plan: EditPlan = {
    path: request.targetPath,
    operations: operation ? [operation] : [],
    skipped: [],
  };
  return {
    targetPath: request.targetPath,
    plan,
    postEditText: applyEdits(before, plan.operations),
    diff: present(before, plan),
    creates: request.targetText === null,
  };
}
