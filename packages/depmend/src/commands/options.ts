import { FIXABLE_KINDS, type FindingKind } from "@depmend/core";

import { ConfigError } from "../core/errors.js";
import type { OutputFormat } from "../output/index.js";

function isFixableKind(value: string): value is FindingKind {
  return FIXABLE_KINDS.some((kind) => kind === value);
}

/**
 * Parse a comma-separated list of finding kinds to fix ("all" selects every
 * fixable kind)
 */
export function parseKinds(value: string | undefined): FindingKind[] {
  if (!value) {
    return [];
  }
  const kinds: FindingKind[] = [];
  for (const raw of value.split(",")) {
    const kind = raw.trim();
    if (kind === "") continue;
    if (kind === "all") return [...FIXABLE_KINDS];
    if (!isFixableKind(kind)) {
      throw new ConfigError(`Unknown finding kind "${kind}" (expected ${FIXABLE_KINDS.join(", ")} or all)`);
    }
    if (!kinds.includes(kind)) kinds.push(kind);
  }
  return kinds;
}

/** Parse repeated `name=value` arguments into a record */
export function parseAssignments(values: readonly string[] | undefined, flag: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const item of values ?? []) {
    const index = item.indexOf("=");
    const name = index === -1 ? "" : item.slice(0, index).trim();
    const value = index === -1 ? "" : item.slice(index + 1).trim();
    if (name === "" || value === "") {
      throw new ConfigError(`${flag} expects name=value, got "${item}"`);
    }
    result[name] = value;
  }
  return result;
}

/** Parse a positive integer millisecond timeout */
export function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new ConfigError(`--timeout expects a positive number of milliseconds, got "${value}"`);
  }
  return timeout;
}

export function parseFormat(value: string | undefined): OutputFormat {
  return value === "json" ? "json" : "text";
}
