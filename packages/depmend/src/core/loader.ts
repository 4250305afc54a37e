import * as fs from "node:fs";
import * as path from "node:path";

import { parse as parseToml } from "smol-toml";

import type { DependencySection, Ecosystem, FindingKind } from "@depmend/core";

import { DEFAULT_SOURCE_GLOBS, SCAN_LIMITS, TIMEOUTS, ASSISTANT } from "../constants.js";
import { ConfigError } from "./errors.js";
import { type Config, configSchema, defaultConfig } from "./schema.js";

/** Config file name */
export const CONFIG_FILE_NAME = "depmend.toml";

/**
 * Immutable run configuration threaded through every engine call
 */
export interface EngineConfig {
  /** Version baseline per package name for Outdated classification */
  readonly freshnessReference: Readonly<Record<string, string>>;
  /** Finding kinds that are always suppressed */
  readonly exemptKinds: readonly FindingKind[];
  /** Package name globs never reported as unused */
  readonly exemptPackages: readonly string[];
  /** Dependency classes never reported as unused */
  readonly exemptSections: readonly DependencySection[];
  /** Import name to distribution name */
  readonly aliases: Readonly<Record<string, string>>;
  /** Source globs scanned per ecosystem */
  readonly ecosystemFileGlobs: Readonly<Record<Ecosystem, readonly string[]>>;
  readonly scan: {
    readonly exclude: readonly string[];
    readonly maxFileBytes: number;
    readonly timeoutMs: number;
  };
  readonly assistant: {
    readonly model: string;
    readonly timeoutMs: number;
  };
}

export interface LoadConfigResult {
  config: EngineConfig;
  /** Absolute path of the config file, or null when defaults were used */
  configPath: string | null;
}

/**
 * Check if a path is a broken symlink
 */
function isBrokenSymlink(filePath: string): boolean {
  try {
    const stats = fs.lstatSync(filePath);
    if (stats.isSymbolicLink()) {
      try {
        fs.statSync(filePath);
        return false;
      } catch {
        return true;
      }
    }
    return false;
  } catch {
    return false;
  }
}

/**
 * Find depmend.toml by walking up the directory tree
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir);

  for (;;) {
    const configPath = path.join(currentDir, CONFIG_FILE_NAME);
    if (isBrokenSymlink(configPath)) {
      throw new ConfigError(`${CONFIG_FILE_NAME} exists but is a broken symlink: ${configPath}`);
    }
    if (fs.existsSync(configPath)) {
      return configPath;
    }
    const parent = path.dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

/**
 * Parse TOML file content
 */
function parseTomlFile(filePath: string): unknown {
  try {
    const content = fs.readFileSync(filePath, "utf-8");
    return parseToml(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new ConfigError(`Failed to parse ${CONFIG_FILE_NAME}: ${message}`);
  }
}

/**
 * Validate config against schema
 */
export function validateConfig(rawConfig: unknown): Config {
  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Invalid ${CONFIG_FILE_NAME} configuration:\n${errors}`);
  }
  return result.data;
}

/**
 * Merge a validated config with defaults into the engine's immutable shape
 */
export function toEngineConfig(config: Config): EngineConfig {
  const globs = config.ecosystem_file_globs;
  return Object.freeze({
    freshnessReference: { ...defaultConfig.freshness_reference, ...config.freshness_reference },
    exemptKinds: config.exempt_kinds ?? defaultConfig.exempt_kinds ?? [],
    exemptPackages: config.exempt_packages ?? defaultConfig.exempt_packages ?? [],
    exemptSections: config.exempt_sections ?? defaultConfig.exempt_sections ?? [],
    aliases: { ...defaultConfig.aliases, ...config.aliases },
    ecosystemFileGlobs: {
      python: globs?.python ?? [...DEFAULT_SOURCE_GLOBS.python],
      node: globs?.node ?? [...DEFAULT_SOURCE_GLOBS.node],
    },
    scan: {
      exclude: config.scan?.exclude ?? [],
      maxFileBytes: config.scan?.max_file_bytes ?? SCAN_LIMITS.maxFileBytes,
      timeoutMs: config.scan?.timeout_ms ?? TIMEOUTS.fileRead,
    },
    assistant: {
      model: config.assistant?.model ?? ASSISTANT.model,
      timeoutMs: config.assistant?.timeout_ms ?? TIMEOUTS.assistant,
    },
  });
}

/**
 * Load depmend.toml. An explicit path must exist; otherwise the file is searched
 * upwards from `startDir` and defaults apply when none is found.
 */
export function loadConfig(configPath?: string, startDir?: string): LoadConfigResult {
  if (configPath) {
    const absolutePath = path.resolve(configPath);
    if (!fs.existsSync(absolutePath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return { config: toEngineConfig(validateConfig(parseTomlFile(absolutePath))), configPath: absolutePath };
  }

  const found = findConfigFile(startDir);
  if (!found) {
    return { config: toEngineConfig({}), configPath: null };
  }
  return { config: toEngineConfig(validateConfig(parseTomlFile(found))), configPath: found };
}

/** Overrides supplied on the command line */
export interface ConfigOverrides {
  freshnessReference?: Record<string, string>;
  /** Applies to file reads and assistant requests */
  timeoutMs?: number;
  model?: string;
}

/**
 * Return a new config with command-line overrides applied
 */
export function withOverrides(config: EngineConfig, overrides: ConfigOverrides): EngineConfig {
  return Object.freeze({
    ...config,
    freshnessReference: { ...config.freshnessReference, ...overrides.freshnessReference },
    scan: { ...config.scan, timeoutMs: overrides.timeoutMs ?? config.scan.timeoutMs },
    assistant: {
      model: overrides.model ?? config.assistant.model,
      timeoutMs: overrides.timeoutMs ?? config.assistant.timeoutMs,
    },
  });
}
