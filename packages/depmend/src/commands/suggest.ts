import * as fs from "node:fs/promises";
import * as path from "node:path";

import chalk from "chalk";

import { ExitCode, type ExitCodeType } from "@depmend/core";

import { apply } from "../apply/index.js";
import { OpenAIAssistant, parseLineRange, suggestEdit, type AssistantClient } from "../assist/index.js";
import { ConfigError, getErrorMessage, IOFailureError } from "../core/errors.js";
import { loadConfig, withOverrides } from "../core/loader.js";
import { colorizeDiff, formatOutcome, promptConfirm } from "../output/index.js";
import { interruptSignal } from "./deps.js";
import { parseTimeout } from "./options.js";

export interface SuggestOptions {
  config?: string;
  instruction: string;
  lines?: string;
  model?: string;
  yes?: boolean;
  timeout?: string;
}

/**
 * depmend suggest: send a file (or a line range of it) to the assistant and
 * apply the suggested edit after review.
 */
export async function runSuggest(
  file: string,
  options: SuggestOptions,
  createClient: (model: string) => AssistantClient = (model) => new OpenAIAssistant({ model })
): Promise<ExitCodeType> {
  const filePath = path.resolve(file);
  const range = options.lines === undefined ? undefined : parseLineRange(options.lines);
  if (range === null) {
    throw new ConfigError(`--lines expects a-b with 1 <= a <= b, got "${options.lines}"`);
  }

  const { config: baseConfig } = loadConfig(options.config, path.dirname(filePath));
  const config = withOverrides(baseConfig, { model: options.model, timeoutMs: parseTimeout(options.timeout) });

  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new IOFailureError(`Cannot read ${filePath}: ${getErrorMessage(error)}`, filePath);
  }

  const { signal, dispose } = interruptSignal();
  try {
    const displayPath = path.relative(process.cwd(), filePath) || path.basename(filePath);
    const suggestion = await suggestEdit(
      { path: displayPath, text, instruction: options.instruction, range },
      createClient(config.assistant.model),
      { signal, timeoutMs: config.assistant.timeoutMs }
    );

    if (suggestion.plan.operations.length === 0) {
      process.stdout.write(chalk.green("✓ No changes suggested\n"));
      return ExitCode.SUCCESS;
    }

    process.stdout.write(colorizeDiff(suggestion.diff));
    const confirmed = options.yes === true || (await promptConfirm(`Apply changes to ${file}?`));
    const outcome = await apply(filePath, text, suggestion.postEditText, confirmed);
    process.stdout.write(`${formatOutcome(outcome)}\n`);
    return ExitCode.SUCCESS;
  } finally {
    dispose();
  }
}
