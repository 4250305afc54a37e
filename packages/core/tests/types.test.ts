import { describe, it, expect } from "vitest";
import {
  DiagnosticBuilder,
  ExitCode,
  FINDING_KIND_ORDER,
  FindingBuilder,
  entriesOf,
  isEntry,
  segmentText,
  type DependencyEntry,
  type ManifestDocument,
  type OpaqueLine,
} from "../src/types.js";

const entry: DependencyEntry = {
  type: "entry",
  name: "requests",
  displayName: "requests",
  rawSpecifier: "==2.0",
  kind: "runtime",
  section: "requirements",
  sourceSpan: { startLine: 2, endLine: 2 },
  lineText: "requests==2.0\n",
  manifestPath: "requirements.txt",
};

const comment: OpaqueLine = { type: "opaque", line: 1, text: "# deps\n", reason: "comment" };

describe("FindingBuilder", () => {
  it("applies the default severity for the kind", () => {
    const finding = FindingBuilder.create({
      kind: "missing",
      subjectName: "numpy",
      message: "numpy is imported but not declared",
      target: "requirements.txt",
      ecosystem: "python",
    });

    expect(finding).toEqual({
      kind: "missing",
      subjectName: "numpy",
      severity: "error",
      message: "numpy is imported but not declared",
      evidence: { entries: [], usages: [] },
      target: "requirements.txt",
      ecosystem: "python",
    });
  });

  it("keeps an explicit severity and the narrower entry", () => {
    const finding = FindingBuilder.create({
      kind: "conflicting",
      subjectName: "requests",
      message: "conflict",
      target: "requirements.txt",
      ecosystem: "python",
      entries: [entry],
      narrower: entry,
      severity: "warning",
    });

    expect(finding.severity).toBe("warning");
    expect(finding.narrower).toBe(entry);
    expect(finding.evidence.entries).toEqual([entry]);
  });

  it("omits narrower when not supplied", () => {
    const finding = FindingBuilder.create({
      kind: "unused",
      subjectName: "requests",
      message: "unused",
      target: "requirements.txt",
      ecosystem: "python",
    });
    expect("narrower" in finding).toBe(false);
    expect(finding.severity).toBe("warning");
  });
});

describe("DiagnosticBuilder", () => {
  it("creates a degraded-parse diagnostic with a line", () => {
    expect(DiagnosticBuilder.degraded("requirements.txt", 3, "bad line")).toEqual({
      code: "PARSE_DEGRADED",
      file: "requirements.txt",
      line: 3,
      message: "bad line",
    });
  });

  it("creates timeout and io diagnostics", () => {
    expect(DiagnosticBuilder.timeout("a.py", "slow").code).toBe("TIMEOUT");
    expect(DiagnosticBuilder.ioFailure("a.py", "gone").code).toBe("IO_FAILURE");
  });
});

describe("segment helpers", () => {
  const document: ManifestDocument = {
    path: "requirements.txt",
    dialect: "requirements",
    ecosystem: "python",
    eol: "\n",
    segments: [comment, entry],
    diagnostics: [],
  };

  it("distinguishes entries from opaque lines", () => {
    expect(isEntry(entry)).toBe(true);
    expect(isEntry(comment)).toBe(false);
  });

  it("returns verbatim segment text", () => {
    expect(document.segments.map(segmentText).join("")).toBe("# deps\nrequests==2.0\n");
  });

  it("lists entries in order", () => {
    expect(entriesOf(document)).toEqual([entry]);
  });
});

describe("constants", () => {
  it("orders finding kinds for reporting", () => {
    expect(FINDING_KIND_ORDER).toEqual([
      "unused",
      "missing",
      "conflicting",
      "outdated",
      "unparseable",
    ]);
  });

  it("exposes exit codes", () => {
    expect(ExitCode).toEqual({ SUCCESS: 0, CONFIG_ERROR: 2, RUNTIME_ERROR: 3 });
  });
});
