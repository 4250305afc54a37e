/**
 * PEP 440 version specifier sets, e.g. `>=2.0,<3`, `~=1.4.2`, `==1.*`.
 */

import {
  ANY_RANGE,
  atLeast,
  below,
  between,
  exactly,
  excluding,
  intersect,
  type VersionRange,
} from "./range.js";
import { type SpecifierParse } from "./types.js";
import { bump, parseVersion, versionOf } from "./version.js";

const CLAUSE_PATTERN = /^(~=|===|==|!=|<=|>=|<|>)\s*(\S+)$/;

function invalid(reason: string): SpecifierParse {
  return { status: "invalid", reason };
}

/** Parse one clause such as `>=2.0` into a range */
function parseClause(clause: string): VersionRange | string {
  const match = CLAUSE_PATTERN.exec(clause);
  if (!match) {
    return `"${clause}" is not a version clause`;
  }
  const [, operator, versionText] = match;

  if (versionText.endsWith(".*")) {
    if (operator !== "==" && operator !== "!=") {
      return `wildcard not allowed with ${operator}`;
    }
    const prefix = parseVersion(versionText.slice(0, -2));
    if (!prefix) {
      return `"${versionText}" is not a valid version`;
    }
    const upper = bump(prefix.release, prefix.release.length);
    const lower = versionOf(prefix.release);
    return operator === "==" ? between(lower, upper) : excluding(lower, upper);
  }

  const version = parseVersion(versionText);
  if (!version) {
    return `"${versionText}" is not a valid version`;
  }

  switch (operator) {
    case "==":
    case "===":
      return exactly(version);
    case "!=":
      return excluding(version, null);
    case "<":
      return below(version);
    case "<=":
      return below(version, true);
    case ">":
      return atLeast(version, false);
    case ">=":
      return atLeast(version);
    case "~=": {
      if (version.release.length < 2) {
        return `~= requires at least two release components, got "${versionText}"`;
      }
      return between(version, bump(version.release, version.release.length - 1));
    }
    default:
      return `unknown operator ${operator}`;
  }
}

/**
 * Parse a specifier set. Environment markers (`; python_version < "3.8"`) must
 * already be removed.
 */
export function parsePep440(specifier: string): SpecifierParse {
  const text = specifier.trim();
  if (text === "") {
    return { status: "range", range: ANY_RANGE };
  }

  let range: VersionRange = ANY_RANGE;
  for (const rawClause of text.split(",")) {
    const clause = rawClause.trim();
    if (clause === "") {
      return invalid(`empty clause in "${text}"`);
    }
    const parsed = parseClause(clause);
    if (typeof parsed === "string") {
      return invalid(parsed);
    }
    range = intersect(range, parsed);
  }
  return { status: "range", range };
}
