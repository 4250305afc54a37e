import { describe, it, expect } from "vitest";

import type { Ecosystem, ManifestDocument, UsageRecord } from "@depmend/core";

import { packageJsonAdapter, requirementsAdapter } from "../../../src/manifest/index.js";
import { primaryManifest, reconcile, type ReconcileOptions } from "../../../src/reconcile/index.js";

const OPTIONS: ReconcileOptions = {
  freshnessReference: {},
  exemptKinds: [],
  exemptPackages: [],
  exemptSections: [],
  aliases: {},
};

function requirements(text: string, filePath = "requirements.txt"): ManifestDocument {
  return requirementsAdapter.parse(text, filePath);
}

function usage(moduleName: string, filePath = "app.py", lineNumber = 1, ecosystem: Ecosystem = "python"): UsageRecord {
  return { moduleName, rawModule: moduleName, filePath, lineNumber, ecosystem };
}

describe("reconcile", () => {
  it("reports a declared package that is never imported", () => {
    const findings = reconcile([requirements("requests==2.0\n")], [], OPTIONS);

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      kind: "unused",
      subjectName: "requests",
      severity: "warning",
      message: "requests is declared at requirements.txt:1 but never imported",
      target: "requirements.txt",
      ecosystem: "python",
    });
  });

  it("reports an imported package that is not declared", () => {
    const findings = reconcile([requirements("")], [usage("numpy", "app.py", 3)], OPTIONS);

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      kind: "missing",
      subjectName: "numpy",
      severity: "error",
      message: "numpy is imported at app.py:3 but not declared",
      target: "requirements.txt",
    });
  });

  it("summarizes repeated imports of a missing package", () => {
    const findings = reconcile(
      [requirements("")],
      [usage("numpy", "a.py", 1), usage("numpy", "b.py", 7), usage("numpy", "c.py", 2)],
      OPTIONS
    );

    expect(findings.map((f) => f.message)).toEqual(["numpy is imported at a.py:1 and 2 more but not declared"]);
    expect(findings[0].evidence.usages).toHaveLength(3);
  });

  it("reports incompatible constraints once, citing both entries", () => {
    const document = requirements("foo>=2.0\nfoo<1.0\n");
    const findings = reconcile([document], [usage("foo")], OPTIONS);

    expect(findings).toHaveLength(1);
    const [finding] = findings;
    expect(finding.kind).toBe("conflicting");
    expect(finding.subjectName).toBe("foo");
    expect(finding.evidence.entries.map((e) => e.sourceSpan)).toEqual([
      { startLine: 1, endLine: 1 },
      { startLine: 2, endLine: 2 },
    ]);
    expect(finding.narrower?.rawSpecifier).toBe("<1.0");
    expect(finding.message).toBe(
      'foo has incompatible constraints: ">=2.0" (requirements.txt:1), "<1.0" (requirements.txt:2)'
    );
  });

  it("cites the narrower constraint of a conflict", () => {
    const findings = reconcile([requirements("foo==1.5\nfoo>=2.0\n")], [usage("foo")], OPTIONS);

    expect(findings[0].narrower?.rawSpecifier).toBe("==1.5");
  });

  it("finds conflicts across manifests", () => {
    const findings = reconcile(
      [requirements("foo>=2.0\n", "requirements.txt"), requirements("foo==1.0\n", "svc/requirements.txt")],
      [usage("foo")],
      OPTIONS
    );

    expect(findings.map((f) => [f.kind, f.target])).toEqual([["conflicting", "svc/requirements.txt"]]);
  });

  it("lets a conflict take precedence over outdated", () => {
    const findings = reconcile([requirements("foo>=2.0\nfoo<1.0\n")], [usage("foo")], {
      ...OPTIONS,
      freshnessReference: { foo: "3.0" },
    });

    expect(findings.map((f) => f.kind)).toEqual(["conflicting"]);
  });

  it("reports constraints older than the freshness reference", () => {
    const findings = reconcile([requirements("requests==2.28.0\n")], [usage("requests")], {
      ...OPTIONS,
      freshnessReference: { Requests: "2.31.0" },
    });

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      kind: "outdated",
      severity: "info",
      message: 'requests "==2.28.0" at requirements.txt:1 is older than 2.31.0',
    });
  });

  it("does not flag open-ended constraints as outdated", () => {
    const findings = reconcile([requirements("requests>=2.0\n")], [usage("requests")], {
      ...OPTIONS,
      freshnessReference: { requests: "2.31.0" },
    });

    expect(findings).toEqual([]);
  });

  it("reports unparseable specifiers", () => {
    const findings = reconcile([requirements("django>=abc\n")], [usage("django")], OPTIONS);

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      kind: "unparseable",
      subjectName: "django",
      message: 'django at requirements.txt:1 has an unparseable specifier ">=abc": "abc" is not a valid version',
    });
  });

  it("matches imports to distributions through built-in aliases", () => {
    expect(reconcile([requirements("PyYAML>=6.0\n")], [usage("yaml")], OPTIONS)).toEqual([]);

    const missing = reconcile([requirements("")], [usage("yaml")], OPTIONS);
    expect(missing.map((f) => [f.kind, f.subjectName])).toEqual([["missing", "pyyaml"]]);
  });

  it("applies configured aliases", () => {
    const findings = reconcile([requirements("acme-sdk==1.0\n")], [usage("internal-sdk")], {
      ...OPTIONS,
      aliases: { internal_sdk: "acme-sdk" },
    });

    expect(findings).toEqual([]);
  });

  it("never reports exempt entries as unused", () => {
    const text = "types-requests==2.0\n-e ./libs/tool\n";
    const findings = reconcile([requirements(text)], [], { ...OPTIONS, exemptPackages: ["types-*"] });

    expect(findings).toEqual([]);
  });

  it("never reports exempt sections as unused", () => {
    const document = packageJsonAdapter.parse(
      '{\n  "devDependencies": {\n    "vitest": "^2.0.0"\n  }\n}\n',
      "package.json"
    );

    expect(reconcile([document], [], { ...OPTIONS, exemptSections: ["devDependencies"] })).toEqual([]);
    expect(reconcile([document], [], OPTIONS).map((f) => f.subjectName)).toEqual(["vitest"]);
  });

  it("drops exempt kinds", () => {
    const findings = reconcile([requirements("requests==2.0\n")], [usage("numpy")], {
      ...OPTIONS,
      exemptKinds: ["unused"],
    });

    expect(findings.map((f) => f.kind)).toEqual(["missing"]);
  });

  it("orders findings by kind, then name", () => {
    const findings = reconcile([requirements("zeta==1.0\nalpha==1.0\n")], [usage("beta")], OPTIONS);

    expect(findings.map((f) => [f.kind, f.subjectName])).toEqual([
      ["unused", "alpha"],
      ["unused", "zeta"],
      ["missing", "beta"],
    ]);
  });

  it("keeps ecosystems apart", () => {
    const packageJson = packageJsonAdapter.parse(
      '{\n  "dependencies": {\n    "express": "^4.18.0"\n  }\n}\n',
      "package.json"
    );
    const findings = reconcile(
      [packageJson],
      [usage("express", "src/index.ts", 1, "node"), usage("chalk", "src/cli.ts", 2, "node"), usage("numpy")],
      OPTIONS
    );

    expect(findings.map((f) => [f.kind, f.subjectName, f.target])).toEqual([["missing", "chalk", "package.json"]]);
  });

  it("matches namespace distributions through dotted imports", () => {
    const storage: UsageRecord = {
      ...usage("google"),
      rawModule: "google.cloud",
      namespaceCandidates: ["google-cloud-storage", "google-cloud"],
    };

    expect(reconcile([requirements("google-cloud-storage==2.10.0\n")], [storage], OPTIONS)).toEqual([]);
  });

  it("falls back to the top-level name when no namespace distribution is declared", () => {
    const storage: UsageRecord = {
      ...usage("google"),
      rawModule: "google.cloud",
      namespaceCandidates: ["google-cloud-storage", "google-cloud"],
    };

    const findings = reconcile([requirements("requests==2.0\n")], [storage], OPTIONS);

    expect(findings.map((f) => [f.kind, f.subjectName])).toEqual([
      ["unused", "requests"],
      ["missing", "google"],
    ]);
  });

  it("returns the same findings for the same inputs", () => {
    const documents = [
      requirements("requests==2.0\nflask>=2.0\nflask<2.0\nnumpy==1.20\n"),
      packageJsonAdapter.parse('{\n  "dependencies": {\n    "left-pad": "^1.0.0"\n  }\n}\n', "package.json"),
    ];
    const usages = [usage("numpy"), usage("pandas", "b.py", 4), usage("chalk", "web/index.js", 2, "node")];
    const options: ReconcileOptions = { ...OPTIONS, freshnessReference: { numpy: "1.26.0" } };

    const first = reconcile(documents, usages, options);
    const second = reconcile(documents, [...usages], options);

    expect(first.length).toBeGreaterThan(0);
    expect(second).toEqual(first);
  });
});

describe("primaryManifest", () => {
  it("prefers the shallowest path", () => {
    const documents = ["b/requirements.txt", "requirements.txt", "a/requirements.txt"].map((p) => requirements("", p));
    expect(primaryManifest(documents)?.path).toBe("requirements.txt");
  });

  it("is null without documents", () => {
    expect(primaryManifest([])).toBeNull();
  });
});
