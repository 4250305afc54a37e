import { compareVersions, magnitude, type Version } from "./version.js";

/** One end of an interval; null means unbounded */
export interface Bound {
  readonly version: Version;
  readonly inclusive: boolean;
}

export interface Interval {
  readonly lower: Bound | null;
  readonly upper: Bound | null;
}

/** A union of disjoint-or-not intervals; no intervals means "matches nothing" */
export interface VersionRange {
  readonly intervals: readonly Interval[];
}

export const ANY_RANGE: VersionRange = { intervals: [{ lower: null, upper: null }] };

export function exactly(version: Version): VersionRange {
  const bound = { version, inclusive: true };
  return { intervals: [{ lower: bound, upper: bound }] };
}

export function atLeast(version: Version, inclusive = true): VersionRange {
  return { intervals: [{ lower: { version, inclusive }, upper: null }] };
}

export function below(version: Version, inclusive = false): VersionRange {
  return { intervals: [{ lower: null, upper: { version, inclusive } }] };
}

/** [lower, upper) */
export function between(lower: Version, upper: Version): VersionRange {
  return {
    intervals: [{ lower: { version: lower, inclusive: true }, upper: { version: upper, inclusive: false } }],
  };
}

function isEmptyInterval(interval: Interval): boolean {
  if (!interval.lower || !interval.upper) {
    return false;
  }
  const cmp = compareVersions(interval.lower.version, interval.upper.version);
  if (cmp !== 0) {
    return cmp > 0;
  }
  return !(interval.lower.inclusive && interval.upper.inclusive);
}

/** The tighter of two lower bounds */
function maxLower(a: Bound | null, b: Bound | null): Bound | null {
  if (!a) return b;
  if (!b) return a;
  const cmp = compareVersions(a.version, b.version);
  if (cmp !== 0) {
    return cmp > 0 ? a : b;
  }
  return a.inclusive ? b : a;
}

/** The tighter of two upper bounds */
function minUpper(a: Bound | null, b: Bound | null): Bound | null {
  if (!a) return b;
  if (!b) return a;
  const cmp = compareVersions(a.version, b.version);
  if (cmp !== 0) {
    return cmp < 0 ? a : b;
  }
  return a.inclusive ? b : a;
}

/** Intersection of two ranges */
export function intersect(a: VersionRange, b: VersionRange): VersionRange {
  const intervals: Interval[] = [];
  for (const left of a.intervals) {
    for (const right of b.intervals) {
      const interval = {
        lower: maxLower(left.lower, right.lower),
        upper: minUpper(left.upper, right.upper),
      };
      if (!isEmptyInterval(interval)) {
        intervals.push(interval);
      }
    }
  }
  return { intervals };
}

/** Union of two ranges (intervals are concatenated, not merged) */
export function union(a: VersionRange, b: VersionRange): VersionRange {
  return { intervals: [...a.intervals, ...b.intervals] };
}

/** Complement of a single version or prefix window, used for `!=` */
export function excluding(lower: Version, upper: Version | null): VersionRange {
  const before: Interval = { lower: null, upper: { version: lower, inclusive: false } };
  const after: Interval = upper
    ? { lower: { version: upper, inclusive: true }, upper: null }
    : { lower: { version: lower, inclusive: false }, upper: null };
  return { intervals: [before, after] };
}

export function isEmpty(range: VersionRange): boolean {
  return range.intervals.every(isEmptyInterval);
}

export function intersects(a: VersionRange, b: VersionRange): boolean {
  return !isEmpty(intersect(a, b));
}

function inInterval(interval: Interval, version: Version): boolean {
  if (interval.lower) {
    const cmp = compareVersions(version, interval.lower.version);
    if (cmp < 0 || (cmp === 0 && !interval.lower.inclusive)) {
      return false;
    }
  }
  if (interval.upper) {
    const cmp = compareVersions(version, interval.upper.version);
    if (cmp > 0 || (cmp === 0 && !interval.upper.inclusive)) {
      return false;
    }
  }
  return true;
}

export function contains(range: VersionRange, version: Version): boolean {
  return range.intervals.some((interval) => inInterval(interval, version));
}

/**
 * True when every version the range admits is older than `version`:
 * each interval has an upper bound that ends at or before it.
 */
export function isBelow(range: VersionRange, version: Version): boolean {
  const live = range.intervals.filter((interval) => !isEmptyInterval(interval));
  if (live.length === 0) {
    return false;
  }
  return live.every((interval) => {
    if (!interval.upper) {
      return false;
    }
    const cmp = compareVersions(interval.upper.version, version);
    return cmp < 0 || (cmp === 0 && !interval.upper.inclusive);
  });
}

/** Width key: fewer open ends first, then smaller span */
export interface Narrowness {
  readonly unboundedSides: number;
  readonly span: number;
}

export function narrowness(range: VersionRange): Narrowness {
  let unboundedSides = 0;
  let span = 0;
  for (const interval of range.intervals) {
    if (!interval.lower) unboundedSides++;
    if (!interval.upper) unboundedSides++;
    if (interval.lower && interval.upper) {
      span += magnitude(interval.upper.version) - magnitude(interval.lower.version);
    }
  }
  return { unboundedSides, span };
}

/** Negative when `a` is narrower than `b` */
export function compareNarrowness(a: Narrowness, b: Narrowness): number {
  if (a.unboundedSides !== b.unboundedSides) {
    return a.unboundedSides - b.unboundedSides;
  }
  return a.span - b.span;
}
