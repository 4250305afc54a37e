import chalk from "chalk";

import { ExitCode, type ExitCodeType } from "@depmend/core";

import { ConfigError } from "../core/errors.js";
import { CONFIG_FILE_NAME, findConfigFile, loadConfig } from "../core/loader.js";
import { parseFormat } from "./options.js";

export interface ValidateConfigOptions {
  config?: string;
  format?: string;
}

/**
 * depmend validate config: check depmend.toml against the schema.
 * Throws ConfigError when the file is missing or invalid.
 */
export function runValidateConfig(options: ValidateConfigOptions): ExitCodeType {
  const configPath = options.config ?? findConfigFile();
  if (!configPath) {
    throw new ConfigError(`No ${CONFIG_FILE_NAME} found`);
  }
  const { configPath: resolved } = loadConfig(configPath);

  if (parseFormat(options.format) === "json") {
    process.stdout.write(`${JSON.stringify({ valid: true, configPath: resolved }, null, 2)}\n`);
  } else {
    process.stdout.write(chalk.green(`✓ Valid: ${resolved}\n`));
  }
  return ExitCode.SUCCESS;
}
