import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { discoverFiles, IOFailureError, looksBinary, readTextFile } from "../../../src/core/index.js";

describe("looksBinary", () => {
  it("detects NUL bytes", () => {
    expect(looksBinary(Buffer.from([0x50, 0x4b, 0x00, 0x03]))).toBe(true);
    expect(looksBinary(Buffer.from("import os\n"))).toBe(false);
  });

  it("only inspects the first bytes", () => {
    const buffer = Buffer.alloc(9000, 0x61);
    buffer[8500] = 0;

    expect(looksBinary(buffer)).toBe(false);
  });
});

describe("file access", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "depmend-files-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("readTextFile", () => {
    it("reads text", async () => {
      const file = path.join(tempDir, "a.py");
      fs.writeFileSync(file, "import os\n");

      await expect(readTextFile(file, { timeoutMs: 1000 })).resolves.toEqual({ status: "ok", text: "import os\n" });
    });

    it("skips files over the size limit", async () => {
      const file = path.join(tempDir, "big.py");
      fs.writeFileSync(file, "x = 1\n".repeat(10));

      await expect(readTextFile(file, { timeoutMs: 1000 }, { maxFileBytes: 10 })).resolves.toEqual({
        status: "skipped",
        reason: "too-large",
      });
    });

    it("skips binary files", async () => {
      const file = path.join(tempDir, "blob.js");
      fs.writeFileSync(file, Buffer.from([0x00, 0x01, 0x02]));

      await expect(readTextFile(file, { timeoutMs: 1000 })).resolves.toEqual({ status: "skipped", reason: "binary" });
    });

    it("wraps read errors", async () => {
      const file = path.join(tempDir, "missing.py");

      const error = await readTextFile(file, { timeoutMs: 1000 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IOFailureError);
      expect(error instanceof IOFailureError && error.filePath).toBe(file);
    });
  });

  describe("discoverFiles", () => {
    it("returns sorted relative paths and skips excluded directories", async () => {
      for (const file of ["b/x.py", "a.py", "node_modules/pkg/index.py", "vendor/v.py"]) {
        fs.mkdirSync(path.dirname(path.join(tempDir, file)), { recursive: true });
        fs.writeFileSync(path.join(tempDir, file), "");
      }

      await expect(discoverFiles(tempDir, ["**/*.py"], ["vendor/**"])).resolves.toEqual(["a.py", "b/x.py"]);
    });
  });
});
