import type { DependencyEntry, Dialect } from "@depmend/core";

import { parseNpmRange } from "./npm.js";
import { parsePep440 } from "./pep440.js";
import { type SpecifierParse } from "./types.js";

export { parseVersion, compareVersions, versionOf, bump, type Version } from "./version.js";
export {
  ANY_RANGE,
  contains,
  intersect,
  intersects,
  isBelow,
  isEmpty,
  narrowness,
  compareNarrowness,
  type Bound,
  type Interval,
  type Narrowness,
  type VersionRange,
} from "./range.js";
export { parsePep440 } from "./pep440.js";
export { parseNpmRange, isNonRegistrySpecifier } from "./npm.js";
export type { SpecifierParse } from "./types.js";

/** Split a requirements specifier into its version part and environment marker */
export function splitMarker(rawSpecifier: string): { version: string; marker: string | null } {
  const index = rawSpecifier.indexOf(";");
  if (index === -1) {
    return { version: rawSpecifier.trim(), marker: null };
  }
  return {
    version: rawSpecifier.slice(0, index).trim(),
    marker: rawSpecifier.slice(index + 1).trim(),
  };
}

/** Parse a raw specifier in the syntax of the given dialect */
export function parseSpecifier(dialect: Dialect, rawSpecifier: string): SpecifierParse {
  if (dialect === "package-json") {
    return parseNpmRange(rawSpecifier);
  }
  return parsePep440(splitMarker(rawSpecifier).version);
}

/** Parse the constraint of an entry, skipping entries that name no registry version */
export function parseEntrySpecifier(entry: DependencyEntry): SpecifierParse {
  if (entry.kind === "editable" || entry.kind === "file-reference") {
    return { status: "skip", reason: `${entry.displayName} is installed from a path or URL` };
  }
  const dialect: Dialect = entry.section === "requirements" ? "requirements" : "package-json";
  return parseSpecifier(dialect, entry.rawSpecifier);
}
