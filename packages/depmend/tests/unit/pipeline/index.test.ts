import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

import { CancelledError, IOFailureError } from "../../../src/core/errors.js";
import { toEngineConfig } from "../../../src/core/loader.js";
import { analyzeProject, applyFixes, planFixes } from "../../../src/pipeline/index.js";

const PACKAGE_JSON = '{\n  "name": "web",\n  "dependencies": {\n    "express": "^4.18.0"\n  }\n}\n';

describe("pipeline", () => {
  let root: string;
  const config = toEngineConfig({});

  function write(relativePath: string, content: string): void {
    const filePath = join(root, relativePath);
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, content);
  }

  function read(relativePath: string): string {
    return readFileSync(join(root, relativePath), "utf-8");
  }

  beforeEach(() => {
    root = join(tmpdir(), `depmend-pipeline-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(root, { recursive: true });
    write("requirements.txt", "requests==2.28.0\nflask>=2.0\n");
    write("app/main.py", "import flask\nimport numpy as np\n");
    write("package.json", PACKAGE_JSON);
    write("web/index.js", 'const express = require("express");\nimport chalk from "chalk";\n');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("reconciles every manifest against the sources", async () => {
    const analysis = await analyzeProject(root, config);

    expect(analysis.manifests.map((m) => m.document.path)).toEqual(["package.json", "requirements.txt"]);
    expect(analysis.findings.map((f) => [f.kind, f.subjectName, f.target])).toEqual([
      ["unused", "requests", "requirements.txt"],
      ["missing", "chalk", "package.json"],
      ["missing", "numpy", "requirements.txt"],
    ]);
    expect(analysis.diagnostics).toEqual([]);
    expect(analysis.failedManifests).toEqual([]);
    expect(analysis.partial).toBe(false);
  });

  it("plans, applies and converges", async () => {
    const analysis = await analyzeProject(root, config);
    const fixes = planFixes(analysis, ["unused", "missing"], { targets: { numpy: "1.26.0" } });

    expect(fixes.map((fix) => fix.postEditText)).toEqual([
      '{\n  "name": "web",\n  "dependencies": {\n    "express": "^4.18.0",\n    "chalk": "*"\n  }\n}\n',
      "flask>=2.0\nnumpy>=1.26.0\n",
    ]);

    const outcomes = await applyFixes(fixes, () => Promise.resolve(true));

    expect(outcomes.map((o) => o.status)).toEqual(["applied", "applied"]);
    expect(read("requirements.txt")).toBe("flask>=2.0\nnumpy>=1.26.0\n");

    const again = await analyzeProject(root, config);
    expect(again.findings).toEqual([]);
  });

  it("keeps dependencies imported from a module of the same name", async () => {
    write("requirements.txt", "celery==5.3.0\ndjango==4.2\n");
    write("app/main.py", "import django\n");
    write("proj/celery.py", "from celery import Celery\n");

    const analysis = await analyzeProject(root, config);
    const fixes = planFixes(analysis, ["unused"]);

    expect(analysis.findings.filter((f) => f.ecosystem === "python")).toEqual([]);
    expect(fixes.map((fix) => fix.postEditText)[1]).toBe("celery==5.3.0\ndjango==4.2\n");
  });

  it("keeps namespace distributions imported through dotted paths", async () => {
    write("requirements.txt", "google-cloud-storage==2.10.0\n");
    write("app/main.py", "from google.cloud import storage\n");

    const analysis = await analyzeProject(root, config);
    const fixes = planFixes(analysis, ["unused", "missing"]);

    expect(analysis.findings.filter((f) => f.ecosystem === "python")).toEqual([]);
    expect(fixes.map((fix) => fix.postEditText)[1]).toBe("google-cloud-storage==2.10.0\n");
  });

  it("writes nothing when every fix is declined", async () => {
    const analysis = await analyzeProject(root, config);
    const fixes = planFixes(analysis, ["unused", "missing"]);

    const outcomes = await applyFixes(fixes, () => Promise.resolve(false));

    expect(outcomes.map((o) => o.status)).toEqual(["aborted", "aborted"]);
    expect(read("requirements.txt")).toBe("requests==2.28.0\nflask>=2.0\n");
    expect(read("package.json")).toBe(PACKAGE_JSON);
  });

  it("keeps applying other files when one changed on disk", async () => {
    const analysis = await analyzeProject(root, config);
    const fixes = planFixes(analysis, ["unused", "missing"]);
    write("requirements.txt", "requests==2.29.0\nflask>=2.0\n");

    const outcomes = await applyFixes(fixes, () => Promise.resolve(true));

    const requirementsPath = join(root, "requirements.txt");
    expect(outcomes).toEqual([
      { status: "applied", path: join(root, "package.json") },
      { status: "failed", path: requirementsPath, message: `${requirementsPath} changed on disk since it was read` },
    ]);
    expect(read("requirements.txt")).toBe("requests==2.29.0\nflask>=2.0\n");
  });

  it("surfaces degraded manifests as diagnostics", async () => {
    write("package.json", '{ "dependencies": ');

    const analysis = await analyzeProject(root, config);

    expect(analysis.diagnostics.map((d) => [d.code, d.file])).toEqual([["PARSE_DEGRADED", "package.json"]]);
    expect(analysis.partial).toBe(false);
  });

  it("throws IOFailureError for a missing root", async () => {
    await expect(analyzeProject(join(root, "nope"), config)).rejects.toBeInstanceOf(IOFailureError);
  });

  it("throws IOFailureError when the root is a file", async () => {
    await expect(analyzeProject(join(root, "requirements.txt"), config)).rejects.toThrow(/is not a directory$/);
  });

  it("throws CancelledError for a cancelled run", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(analyzeProject(root, config, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
  });
});
