import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import {
  CONFIG_FILE_NAME,
  ConfigError,
  findConfigFile,
  loadConfig,
  toEngineConfig,
  validateConfig,
  withOverrides,
} from "../../../src/core/index.js";

describe("CONFIG_FILE_NAME", () => {
  it("is depmend.toml", () => {
    expect(CONFIG_FILE_NAME).toBe("depmend.toml");
  });
});

describe("ConfigError", () => {
  it("is an Error with its own name", () => {
    const error = new ConfigError("test message");
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("ConfigError");
    expect(error.message).toBe("test message");
  });
});

describe("config files", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "depmend-loader-")));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("findConfigFile", () => {
    it("returns config path when found in the start directory", () => {
      fs.writeFileSync(path.join(tempDir, CONFIG_FILE_NAME), "");

      expect(findConfigFile(tempDir)).toBe(path.join(tempDir, CONFIG_FILE_NAME));
    });

    it("walks up the directory tree", () => {
      const nested = path.join(tempDir, "a", "b");
      fs.mkdirSync(nested, { recursive: true });
      fs.writeFileSync(path.join(tempDir, CONFIG_FILE_NAME), "");

      expect(findConfigFile(nested)).toBe(path.join(tempDir, CONFIG_FILE_NAME));
    });

    it("throws on a broken symlink", () => {
      fs.symlinkSync(path.join(tempDir, "missing.toml"), path.join(tempDir, CONFIG_FILE_NAME));

      expect(() => findConfigFile(tempDir)).toThrow(ConfigError);
    });
  });

  describe("loadConfig", () => {
    it("loads and merges an explicit config file", () => {
      const configPath = path.join(tempDir, "custom.toml");
      fs.writeFileSync(
        configPath,
        [
          'exempt_packages = ["pytest*"]',
          "",
          "[freshness_reference]",
          'requests = "2.31.0"',
          "",
          "[aliases]",
          'cv2 = "opencv-python"',
          "",
          "[scan]",
          "timeout_ms = 500",
          "",
        ].join("\n")
      );

      const { config, configPath: loaded } = loadConfig(configPath);

      expect(loaded).toBe(configPath);
      expect(config.exemptPackages).toEqual(["pytest*"]);
      expect(config.exemptSections).toEqual(["devDependencies", "peerDependencies"]);
      expect(config.freshnessReference).toEqual({ requests: "2.31.0" });
      expect(config.aliases).toEqual({ cv2: "opencv-python" });
      expect(config.scan).toEqual({ exclude: [], maxFileBytes: 200_000, timeoutMs: 500 });
      expect(Object.isFrozen(config)).toBe(true);
    });

    it("throws when an explicit path does not exist", () => {
      expect(() => loadConfig(path.join(tempDir, "nope.toml"))).toThrow(ConfigError);
    });

    it("reports TOML syntax errors", () => {
      const configPath = path.join(tempDir, CONFIG_FILE_NAME);
      fs.writeFileSync(configPath, "exempt_kinds = [\n");

      expect(() => loadConfig(configPath)).toThrow(/^Failed to parse depmend\.toml: /);
    });

    it("finds the config from the start directory", () => {
      fs.writeFileSync(path.join(tempDir, CONFIG_FILE_NAME), 'exempt_kinds = ["outdated"]\n');

      const { config, configPath } = loadConfig(undefined, tempDir);

      expect(configPath).toBe(path.join(tempDir, CONFIG_FILE_NAME));
      expect(config.exemptKinds).toEqual(["outdated"]);
    });
  });
});

describe("validateConfig", () => {
  it("lists every issue with its path", () => {
    expect(() => validateConfig({ exempt_kinds: ["stale"], scan: { timeout_ms: 0 } })).toThrow(ConfigError);
    expect(() => validateConfig({ scan: { timeout_ms: 0 } })).toThrow(
      "Invalid depmend.toml configuration:\n  - scan.timeout_ms: Number must be greater than 0"
    );
  });
});

describe("toEngineConfig", () => {
  it("fills defaults for an empty config", () => {
    const config = toEngineConfig({});

    expect(config.exemptKinds).toEqual([]);
    expect(config.exemptPackages).toEqual(["@types/*", "types-*", "*-stubs"]);
    expect(config.ecosystemFileGlobs).toEqual({
      python: ["**/*.py", "**/*.pyi"],
      node: ["**/*.{js,jsx,ts,tsx,mjs,cjs,mts,cts}"],
    });
    expect(config.assistant.timeoutMs).toBe(120_000);
  });
});

describe("withOverrides", () => {
  it("merges freshness and applies one timeout to scans and the assistant", () => {
    const base = toEngineConfig({ freshness_reference: { requests: "2.31.0", flask: "3.0.0" } });

    const config = withOverrides(base, {
      freshnessReference: { flask: "3.1.0" },
      timeoutMs: 250,
      model: "test-model",
    });

    expect(config.freshnessReference).toEqual({ requests: "2.31.0", flask: "3.1.0" });
    expect(config.scan.timeoutMs).toBe(250);
    expect(config.assistant).toEqual({ model: "test-model", timeoutMs: 250 });
    expect(base.scan.timeoutMs).toBe(30_000);
  });

  it("keeps configured values without overrides", () => {
    const base = toEngineConfig({ assistant: { model: "configured", timeout_ms: 900 } });

    expect(withOverrides(base, {}).assistant).toEqual({ model: "configured", timeoutMs: 900 });
  });
});
