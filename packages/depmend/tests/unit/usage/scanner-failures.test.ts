import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

vi.mock("../../../src/core/files.js", async () => {
  const actual = await vi.importActual<typeof import("../../../src/core/files.js")>("../../../src/core/files.js");
  return {
    ...actual,
    readTextFile: vi.fn(),
  };
});

import { IOFailureError, TimeoutError } from "../../../src/core/errors.js";
import { readTextFile } from "../../../src/core/files.js";
import { scanUsage } from "../../../src/usage/index.js";

const mockedReadTextFile = vi.mocked(readTextFile);

describe("scanUsage failures", () => {
  let root: string;

  beforeEach(() => {
    vi.clearAllMocks();
    root = join(tmpdir(), `depmend-scanfail-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(root, { recursive: true });
    for (const name of ["bad.py", "good.py", "slow.py"]) {
      writeFileSync(join(root, name), "");
    }
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("turns read failures and timeouts into diagnostics", async () => {
    mockedReadTextFile.mockImplementation(async (filePath) => {
      if (filePath.endsWith("bad.py")) {
        throw new IOFailureError("Cannot read bad.py: denied", filePath);
      }
      if (filePath.endsWith("slow.py")) {
        throw new TimeoutError("Reading slow.py timed out after 5ms", 5);
      }
      return { status: "ok", text: "import requests\n" };
    });

    const result = await scanUsage(root, "python", { globs: ["*.py"], maxFileBytes: 100, timeoutMs: 5 });

    expect(result.usages.map((u) => [u.moduleName, u.filePath])).toEqual([["requests", "good.py"]]);
    expect(result.files).toEqual(["good.py"]);
    expect(result.diagnostics).toEqual([
      { code: "IO_FAILURE", file: "bad.py", message: "Cannot read bad.py: denied" },
      { code: "TIMEOUT", file: "slow.py", message: "Reading slow.py timed out after 5ms" },
    ]);
    expect(result.partial).toBe(true);
  });

  it("propagates unexpected errors", async () => {
    mockedReadTextFile.mockRejectedValue(new Error("boom"));

    await expect(scanUsage(root, "python", { globs: ["*.py"], maxFileBytes: 100, timeoutMs: 5 })).rejects.toThrow(
      "boom"
    );
  });
});
