import * as fs from "node:fs/promises";
import * as path from "node:path";

import chalk from "chalk";

import { ExitCode, type ExitCodeType } from "@depmend/core";

import { apply } from "../apply/index.js";
import { OpenAIAssistant, translateFile, translationTarget, type AssistantClient } from "../assist/index.js";
import { getErrorMessage, IOFailureError } from "../core/errors.js";
import { loadConfig, withOverrides } from "../core/loader.js";
import { colorizeDiff, formatOutcome, promptConfirm } from "../output/index.js";
import { interruptSignal } from "./deps.js";
import { parseTimeout } from "./options.js";

export interface TranslateOptions {
  config?: string;
  to: string;
  ext?: string;
  model?: string;
  yes?: boolean;
  timeout?: string;
}

/** File text, or null when the file does not exist */
async function readExisting(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw new IOFailureError(`Cannot read ${filePath}: ${getErrorMessage(error)}`, filePath);
  }
}

/**
 * depmend translate: ask the assistant to translate a file into another
 * language and write it beside the source after review.
 */
export async function runTranslate(
  file: string,
  options: TranslateOptions,
  createClient: (model: string) => AssistantClient = (model) => new OpenAIAssistant({ model })
): Promise<ExitCodeType> {
  const filePath = path.resolve(file);
  const targetFile = translationTarget(filePath, options.to, options.ext);

  const { config: baseConfig } = loadConfig(options.config, path.dirname(filePath));
  const config = withOverrides(baseConfig, { model: options.model, timeoutMs: parseTimeout(options.timeout) });

  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new IOFailureError(`Cannot read ${filePath}: ${getErrorMessage(error)}`, filePath);
  }
  const targetText = await readExisting(targetFile);

  const display = (p: string): string => path.relative(process.cwd(), p) || path.basename(p);
  const { signal, dispose } = interruptSignal();
  try {
    const translation = await translateFile(
      { path: display(filePath), text, language: options.to, targetPath: display(targetFile), targetText },
      createClient(config.assistant.model),
      { signal, timeoutMs: config.assistant.timeoutMs }
    );

    if (translation.plan.operations.length === 0) {
      process.stdout.write(chalk.green(`✓ ${translation.targetPath} is already up to date\n`));
      return ExitCode.SUCCESS;
    }

    process.stdout.write(colorizeDiff(translation.diff));
    const verb = translation.creates ? "Create" : "Overwrite";
    const confirmed = options.yes === true || (await promptConfirm(`${verb} ${translation.targetPath}?`));
    const outcome = await apply(targetFile, targetText ?? "", translation.postEditText, confirmed, {
      create: translation.creates,
    });
    process.stdout.write(`${formatOutcome(outcome)}\n`);
    return ExitCode.SUCCESS;
  } finally {
    dispose();
  }
}
