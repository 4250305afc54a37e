/**
 * npm semver ranges: `^1.2.3`, `~1.2`, `>=1 <2`, `1.x || 2.x`, `1.0.0 - 2.0.0`.
 */

import {
  ANY_RANGE,
  atLeast,
  below,
  between,
  exactly,
  intersect,
  union,
  type VersionRange,
} from "./range.js";
import { type SpecifierParse } from "./types.js";
import { bump, versionOf } from "./version.js";

const NOTHING: VersionRange = { intervals: [] };

/** Prefixes of specifiers that do not name a registry version */
const NON_REGISTRY_PREFIXES = [
  "file:",
  "link:",
  "workspace:",
  "portal:",
  "patch:",
  "npm:",
  "git:",
  "git+",
  "github:",
  "gitlab:",
  "bitbucket:",
  "http:",
  "https:",
];

const PARTIAL_PATTERN =
  /^v?(\d+|[xX*])(?:\.(\d+|[xX*])(?:\.(\d+|[xX*])(?:[-+][0-9A-Za-z.-]+)?)?)?$/;

const COMPARATOR_PATTERN = /^(<=|>=|<|>|=|\^|~>|~)?(.*)$/;

const HYPHEN_PATTERN = /^(\S+)\s+-\s+(\S+)$/;

/** Release components up to the first wildcard, or null when malformed */
function parsePartial(text: string): number[] | null {
  const match = PARTIAL_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const components: number[] = [];
  for (const part of match.slice(1, 4)) {
    if (part === undefined || !/^\d+$/.test(part)) {
      break;
    }
    components.push(Number(part));
  }
  return components;
}

function padded(components: number[]): ReturnType<typeof versionOf> {
  const release = [...components];
  while (release.length < 3) {
    release.push(0);
  }
  return versionOf(release);
}

function caret(p: number[]): VersionRange {
  if (p.length === 0) {
    return ANY_RANGE;
  }
  let depth = p.length;
  for (let i = 0; i < p.length; i++) {
    if (p[i] !== 0) {
      depth = i + 1;
      break;
    }
  }
  return between(padded(p), bump(p, depth));
}

function tilde(p: number[]): VersionRange {
  if (p.length === 0) {
    return ANY_RANGE;
  }
  return between(padded(p), bump(p, p.length === 1 ? 1 : 2));
}

function xRange(p: number[]): VersionRange {
  if (p.length === 0) {
    return ANY_RANGE;
  }
  if (p.length === 3) {
    return exactly(versionOf(p));
  }
  return between(padded(p), bump(p, p.length));
}

function comparator(operator: string, p: number[]): VersionRange {
  const full = p.length === 3;
  switch (operator) {
    case "^":
      return caret(p);
    case "~":
    case "~>":
      return tilde(p);
    case ">=":
      return p.length === 0 ? ANY_RANGE : atLeast(padded(p));
    case ">":
      if (p.length === 0) return NOTHING;
      return full ? atLeast(versionOf(p), false) : atLeast(bump(p, p.length));
    case "<":
      return p.length === 0 ? NOTHING : below(padded(p));
    case "<=":
      if (p.length === 0) return ANY_RANGE;
      return full ? below(versionOf(p), true) : below(bump(p, p.length));
    default:
      return xRange(p);
  }
}

function parseHyphen(fromText: string, toText: string): VersionRange | string {
  const from = parsePartial(fromText);
  const to = parsePartial(toText);
  if (!from || !to) {
    return `"${fromText} - ${toText}" is not a valid hyphen range`;
  }
  let range: VersionRange = from.length === 0 ? ANY_RANGE : atLeast(padded(from));
  if (to.length === 3) {
    range = intersect(range, below(versionOf(to), true));
  } else if (to.length > 0) {
    range = intersect(range, below(bump(to, to.length)));
  }
  return range;
}

/** Parse one space-separated comparator set */
function parseComparatorSet(set: string): VersionRange | string {
  const text = set.trim().replace(/(<=|>=|<|>|=|\^|~>|~)\s+/g, "$1");
  if (text === "") {
    return ANY_RANGE;
  }

  const hyphen = HYPHEN_PATTERN.exec(set.trim());
  if (hyphen) {
    return parseHyphen(hyphen[1], hyphen[2]);
  }

  let range: VersionRange = ANY_RANGE;
  for (const token of text.split(/\s+/)) {
    const match = COMPARATOR_PATTERN.exec(token);
    const operator = match?.[1] ?? "";
    const partial = parsePartial(match?.[2] ?? token);
    if (!partial) {
      return `"${token}" is not a valid comparator`;
    }
    range = intersect(range, comparator(operator, partial));
  }
  return range;
}

/** True for specifiers that point at a path, URL, VCS or alias instead of a version */
export function isNonRegistrySpecifier(specifier: string): boolean {
  const text = specifier.trim();
  if (NON_REGISTRY_PREFIXES.some((prefix) => text.startsWith(prefix))) {
    return true;
  }
  // Local paths and GitHub shorthands (owner/repo)
  return /^(\.{1,2}\/|\/|~\/)/.test(text) || /^[\w.-]+\/[\w.-]+(#.*)?$/.test(text);
}

/** Parse an npm range */
export function parseNpmRange(specifier: string): SpecifierParse {
  const text = specifier.trim();
  if (text === "" || text === "*" || text === "latest" || text === "x" || text === "X") {
    return { status: "range", range: ANY_RANGE };
  }
  if (isNonRegistrySpecifier(text)) {
    return { status: "skip", reason: `"${text}" is not a registry version` };
  }
  if (/^[a-z][a-z0-9-]*$/i.test(text) && !/^[xX]$/.test(text)) {
    return { status: "skip", reason: `"${text}" is a dist-tag` };
  }

  let range: VersionRange = NOTHING;
  for (const set of text.split("||")) {
    const parsed = parseComparatorSet(set);
    if (typeof parsed === "string") {
      return { status: "invalid", reason: parsed };
    }
    range = union(range, parsed);
  }
  return { status: "range", range };
}
