import { describe, it, expect } from "vitest";

import { contains, isEmpty, parsePep440, parseVersion, type VersionRange } from "../../../src/versions/index.js";
import { ANY_RANGE } from "../../../src/versions/range.js";

function rangeOf(specifier: string): VersionRange {
  const parsed = parsePep440(specifier);
  if (parsed.status !== "range") {
    throw new Error(`expected a range for ${specifier}, got ${parsed.status}`);
  }
  return parsed.range;
}

function admits(specifier: string, version: string): boolean {
  const parsedVersion = parseVersion(version);
  if (!parsedVersion) {
    throw new Error(`bad version ${version}`);
  }
  return contains(rangeOf(specifier), parsedVersion);
}

describe("parsePep440", () => {
  it("treats an empty specifier as any version", () => {
    expect(parsePep440("")).toEqual({ status: "range", range: ANY_RANGE });
  });

  it("intersects comma-separated clauses", () => {
    expect(admits(">=2.0,<3", "2.5")).toBe(true);
    expect(admits(">=2.0,<3", "3.0")).toBe(false);
    expect(admits(">=2.0,<3", "1.9")).toBe(false);
  });

  it("handles exact pins", () => {
    expect(admits("==2.28.0", "2.28")).toBe(true);
    expect(admits("==2.28.0", "2.28.1")).toBe(false);
  });

  it("handles compatible release", () => {
    expect(admits("~=1.4.2", "1.4.9")).toBe(true);
    expect(admits("~=1.4.2", "1.5")).toBe(false);
    expect(admits("~=1.4.2", "1.4.1")).toBe(false);
  });

  it("handles prefix wildcards", () => {
    expect(admits("==1.*", "1.9.3")).toBe(true);
    expect(admits("==1.*", "2.0")).toBe(false);
    expect(admits("!=1.*", "2.0")).toBe(true);
    expect(admits("!=1.*", "1.2")).toBe(false);
  });

  it("excludes a single version with !=", () => {
    expect(admits("!=2.0", "2.0")).toBe(false);
    expect(admits("!=2.0", "2.1")).toBe(true);
    expect(admits("!=2.0", "1.9")).toBe(true);
  });

  it("handles strict bounds", () => {
    expect(admits(">1.0", "1.0")).toBe(false);
    expect(admits("<=1.0", "1.0")).toBe(true);
  });

  it("detects contradictory clauses", () => {
    expect(isEmpty(rangeOf(">=3,<2"))).toBe(true);
  });

  it("rejects an empty clause", () => {
    expect(parsePep440(">=2.0,,<3")).toEqual({ status: "invalid", reason: 'empty clause in ">=2.0,,<3"' });
  });

  it("rejects text that is not a clause", () => {
    expect(parsePep440("foo")).toEqual({ status: "invalid", reason: '"foo" is not a version clause' });
  });

  it("rejects wildcards with ordering operators", () => {
    expect(parsePep440(">=1.*")).toEqual({ status: "invalid", reason: "wildcard not allowed with >=" });
  });

  it("requires two components for ~=", () => {
    expect(parsePep440("~=1")).toEqual({
      status: "invalid",
      reason: '~= requires at least two release components, got "1"',
    });
  });
});
