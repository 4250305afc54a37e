/**
 * Release versions: numeric tuples with an optional, ignored suffix.
 */

export interface Version {
  /** Numeric release components, e.g. [2, 31, 0] */
  readonly release: readonly number[];
  /** Text as written */
  readonly raw: string;
}

const RELEASE_PATTERN = /^(\d+(?:\.\d+)*)(.*)$/;
/** Pre-release, post-release, dev and local segments (PEP 440 and semver) */
const SUFFIX_PATTERN = /^[0-9A-Za-z]*(?:[-_.+][0-9A-Za-z]+)*$/;

/**
 * Parse a version such as `2.31.0`, `v1.2`, `1.0rc1` or `1.2.3-beta.1`.
 * A PEP 440 epoch (`1!2.0`) is accepted and dropped.
 */
export function parseVersion(text: string): Version | null {
  const trimmed = text.trim();
  const withoutPrefix = trimmed.replace(/^v/i, "").replace(/^\d+!/, "");
  const match = RELEASE_PATTERN.exec(withoutPrefix);
  if (!match) {
    return null;
  }
  const [, release, suffix] = match;
  if (!SUFFIX_PATTERN.test(suffix)) {
    return null;
  }
  return { release: release.split(".").map(Number), raw: trimmed };
}

/** Compare two versions, padding the shorter release with zeros */
export function compareVersions(a: Version, b: Version): number {
  const length = Math.max(a.release.length, b.release.length);
  for (let i = 0; i < length; i++) {
    const diff = (a.release[i] ?? 0) - (b.release[i] ?? 0);
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }
  return 0;
}

/** Build a version from release components */
export function versionOf(release: readonly number[]): Version {
  return { release: [...release], raw: release.join(".") };
}

/**
 * Smallest version above every version sharing the first `depth` components,
 * e.g. bump([1, 4, 2], 2) = 1.5
 */
export function bump(release: readonly number[], depth: number): Version {
  const head = release.slice(0, depth);
  while (head.length < depth) {
    head.push(0);
  }
  head[depth - 1] += 1;
  return versionOf(head);
}

/** Scalar used to compare the width of intervals */
export function magnitude(version: Version): number {
  const [major = 0, minor = 0, patch = 0] = version.release;
  return major * 1_000_000 + Math.min(minor, 999) * 1_000 + Math.min(patch, 999);
}
