import { describe, it, expect } from "vitest";

import { parseAssignments, parseFormat, parseKinds, parseTimeout } from "../../../src/commands/options.js";
import { ConfigError } from "../../../src/core/errors.js";

describe("parseKinds", () => {
  it("returns no kinds when nothing is accepted", () => {
    expect(parseKinds(undefined)).toEqual([]);
    expect(parseKinds("")).toEqual([]);
  });

  it("parses a comma-separated list without duplicates", () => {
    expect(parseKinds("missing, unused,missing,")).toEqual(["missing", "unused"]);
  });

  it("expands all to every fixable kind", () => {
    expect(parseKinds("unused,all")).toEqual(["unused", "missing", "conflicting", "outdated"]);
  });

  it("rejects unknown and unfixable kinds", () => {
    expect(() => parseKinds("unparseable")).toThrow(
      new ConfigError('Unknown finding kind "unparseable" (expected unused, missing, conflicting, outdated or all)')
    );
    expect(() => parseKinds("stale")).toThrow(ConfigError);
  });
});

describe("parseAssignments", () => {
  it("collects name=value pairs, later ones winning", () => {
    expect(parseAssignments(["requests=2.31.0", " flask = 3.0 ", "requests=2.32.0"], "--target")).toEqual({
      requests: "2.32.0",
      flask: "3.0",
    });
  });

  it("splits on the first equals sign", () => {
    expect(parseAssignments(["django===4.2"], "--resolve")).toEqual({ django: "==4.2" });
  });

  it("is empty when the flag is absent", () => {
    expect(parseAssignments(undefined, "--target")).toEqual({});
  });

  it("rejects items without a name or value", () => {
    expect(() => parseAssignments(["requests"], "--target")).toThrow(
      new ConfigError('--target expects name=value, got "requests"')
    );
    expect(() => parseAssignments(["=1.0"], "--resolve")).toThrow(
      new ConfigError('--resolve expects name=value, got "=1.0"')
    );
  });
});

describe("parseTimeout", () => {
  it("passes through an absent value", () => {
    expect(parseTimeout(undefined)).toBeUndefined();
  });

  it("parses positive integers", () => {
    expect(parseTimeout("1500")).toBe(1500);
  });

  it("rejects zero, fractions and words", () => {
    for (const value of ["0", "1.5", "-3", "soon"]) {
      expect(() => parseTimeout(value)).toThrow(
        new ConfigError(`--timeout expects a positive number of milliseconds, got "${value}"`)
      );
    }
  });
});

describe("parseFormat", () => {
  it("defaults to text", () => {
    expect(parseFormat(undefined)).toBe("text");
    expect(parseFormat("json")).toBe("json");
    expect(parseFormat("text")).toBe("text");
  });
});
