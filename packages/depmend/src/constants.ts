/**
 * Centralized constants for depmend.
 * Consolidates all hardcoded values for easier maintenance and configuration.
 */

/**
 * Timeout values in milliseconds
 */
export const TIMEOUTS = {
  /** Per-file read timeout for manifests and sources (30 seconds) */
  fileRead: 30_000,
  /** Assistant request timeout (2 minutes) */
  assistant: 2 * 60 * 1000,
} as const;

/**
 * Concurrency limits
 */
export const CONCURRENCY = {
  /** Files read in parallel per batch */
  fileReads: 16,
} as const;

/**
 * Source scanning limits
 */
export const SCAN_LIMITS = {
  /** Files above this size are skipped (200 KB) */
  maxFileBytes: 200_000,
  /** Bytes inspected for NUL characters when detecting binary files */
  binarySniffBytes: 8_000,
} as const;

/**
 * Directories never scanned for manifests or sources
 */
export const EXCLUDED_DIRS = [
  "**/node_modules/**",
  "**/.git/**",
  "**/.hg/**",
  "**/.svn/**",
  "**/.venv/**",
  "**/venv/**",
  "**/__pycache__/**",
  "**/.tox/**",
  "**/site-packages/**",
  "**/dist/**",
  "**/build/**",
] as const;

/**
 * Manifest file name patterns per dialect
 */
export const MANIFEST_PATTERNS = {
  requirements: ["**/requirements*.txt", "**/requirements/*.txt"],
  "package-json": ["**/package.json"],
} as const;

/**
 * Default source globs per ecosystem
 */
export const DEFAULT_SOURCE_GLOBS = {
  python: ["**/*.py", "**/*.pyi"],
  node: ["**/*.{js,jsx,ts,tsx,mjs,cjs,mts,cts}"],
} as const;

/**
 * Assistant defaults
 */
export const ASSISTANT = {
  /** Default chat model */
  model: process.env.DEPMEND_MODEL ?? "gpt-4o",
  /** Characters of a file sent for analysis */
  analysisMaxChars: 8000,
} as const;

/** File extension for each translation target language */
export const LANGUAGE_EXTENSIONS: Readonly<Partial<Record<string, string>>> = {
  c: ".c",
  "c#": ".cs",
  "c++": ".cpp",
  cpp: ".cpp",
  csharp: ".cs",
  go: ".go",
  java: ".java",
  javascript: ".js",
  kotlin: ".kt",
  php: ".php",
  python: ".py",
  ruby: ".rb",
  rust: ".rs",
  swift: ".swift",
  typescript: ".ts",
};

/** Lines of context around each diff hunk */
export const DIFF_CONTEXT_LINES = 3;
