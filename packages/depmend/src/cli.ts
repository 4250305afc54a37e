#!/usr/bin/env node

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import chalk from "chalk";
import { Command, type CommanderError, Option } from "commander";
import { z } from "zod";

import { ExitCode, type ExitCodeType } from "@depmend/core";

import { type AnalyzeOptions, runAnalyze } from "./commands/analyze.js";
import { type DepsOptions, runDeps } from "./commands/deps.js";
import { runSuggest, type SuggestOptions } from "./commands/suggest.js";
import { runTranslate, type TranslateOptions } from "./commands/translate.js";
import { runValidateConfig, type ValidateConfigOptions } from "./commands/validate.js";
import { ConfigError, EngineError, getErrorMessage } from "./core/errors.js";

// Read version from package.json to avoid hardcoding
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const packageJsonPath = path.resolve(__dirname, "..", "package.json");
const VERSION = z
  .object({ version: z.string() })
  .parse(JSON.parse(fs.readFileSync(packageJsonPath, "utf-8"))).version;

/**
 * Configure exitOverride for a Command to return proper exit codes.
 * Must be called on parent commands that have subcommands with options.
 */
function configureExitOverride(cmd: Command): Command {
  return cmd.exitOverride((err: CommanderError) => {
    // Commander uses exit code 1 for all errors by default
    // We want to use exit code 2 (CONFIG_ERROR) for argument/option errors
    if (
      err.code === "commander.invalidArgument" ||
      err.code === "commander.optionMissingArgument" ||
      err.code === "commander.missingMandatoryOptionValue" ||
      err.code === "commander.missingArgument" ||
      err.code === "commander.unknownOption"
    ) {
      process.exit(ExitCode.CONFIG_ERROR);
    }
    // For other Commander errors (help, version), use the default exit code
    process.exit(err.exitCode);
  });
}

function handleError(error: unknown): never {
  if (error instanceof ConfigError) {
    console.error(chalk.red(`Config error: ${error.message}`));
    process.exit(ExitCode.CONFIG_ERROR);
  }
  const prefix = error instanceof EngineError ? error.code : "Error";
  console.error(chalk.red(`${prefix}: ${getErrorMessage(error)}`));
  process.exit(ExitCode.RUNTIME_ERROR);
}

async function run(action: () => Promise<ExitCodeType> | ExitCodeType): Promise<void> {
  try {
    process.exit(await action());
  } catch (error) {
    handleError(error);
  }
}

const program = new Command();

configureExitOverride(program)
  .name("depmend")
  .description("Reconcile declared dependencies with source imports and patch manifests safely")
  .version(VERSION)
  .configureOutput({
    writeErr: (str: string) => {
      process.stderr.write(str);
    },
  });

// =============================================================================
// deps
// =============================================================================

program
  .command("deps [path]")
  .description("Report unused, missing, conflicting and outdated dependencies; optionally fix them")
  .option("-c, --config <path>", "Path to depmend.toml config file")
  .addOption(new Option("-f, --format <format>", "Output format").choices(["text", "json"]).default("text"))
  .option("-a, --accept <kinds>", "Comma-separated finding kinds to fix (unused,missing,conflicting,outdated,all)")
  .option("--resolve <name=spec...>", "Replacement constraints for conflicting dependencies")
  .option("--target <name=version...>", "Target versions for outdated and missing dependencies")
  .option("--freshness <name=version...>", "Freshness references, merged over the config")
  .option("-y, --yes", "Apply fixes without asking")
  .option("--timeout <ms>", "Per-file read timeout in milliseconds")
  .action((projectPath: string | undefined, options: DepsOptions) => run(() => runDeps(projectPath, options)));

// =============================================================================
// suggest
// =============================================================================

program
  .command("suggest <file>")
  .description("Ask the assistant to edit a file and apply the result after review")
  .requiredOption("-i, --instruction <text>", "What to change")
  .option("-c, --config <path>", "Path to depmend.toml config file")
  .option("--lines <a-b>", "Only send this line range")
  .option("--model <name>", "Assistant model")
  .option("-y, --yes", "Apply the suggestion without asking")
  .option("--timeout <ms>", "Assistant request timeout in milliseconds")
  .action((file: string, options: SuggestOptions) => run(() => runSuggest(file, options)));

// =============================================================================
// analyze
// =============================================================================

program
  .command("analyze <file>")
  .description("Ask the assistant to explain a file without changing it")
  .option("-c, --config <path>", "Path to depmend.toml config file")
  .option("--focus <text>", "Question or area to concentrate on")
  .addOption(new Option("-f, --format <format>", "Output format").choices(["text", "json"]).default("text"))
  .option("--model <name>", "Assistant model")
  .option("--timeout <ms>", "Assistant request timeout in milliseconds")
  .action((file: string, options: AnalyzeOptions) => run(() => runAnalyze(file, options)));

// =============================================================================
// translate
// =============================================================================

program
  .command("translate <file>")
  .description("Ask the assistant to translate a file into another language, written beside it")
  .requiredOption("--to <language>", "Target language")
  .option("--ext <extension>", "Target file extension, when the language has no known one")
  .option("-c, --config <path>", "Path to depmend.toml config file")
  .option("--model <name>", "Assistant model")
  .option("-y, --yes", "Write the translation without asking")
  .option("--timeout <ms>", "Assistant request timeout in milliseconds")
  .action((file: string, options: TranslateOptions) => run(() => runTranslate(file, options)));

// =============================================================================
// validate
// =============================================================================

const validateCommand = configureExitOverride(
  new Command("validate").description("Validate configuration files")
);

validateCommand
  .command("config")
  .description("Validate depmend.toml configuration file")
  .option("-c, --config <path>", "Path to depmend.toml config file")
  .addOption(new Option("-f, --format <format>", "Output format").choices(["text", "json"]).default("text"))
  .action((options: ValidateConfigOptions) => run(() => runValidateConfig(options)));

program.addCommand(validateCommand);

program.parseAsync(process.argv).catch(handleError);
