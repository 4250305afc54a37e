/**
 * depmend - dependency reconciliation and safe manifest patching
 */

// Model types and exit codes
export type {
  DependencyEntry,
  Diagnostic,
  EditOperation,
  EditPlan,
  Finding,
  FindingKind,
  ManifestDocument,
  Severity,
  UsageRecord,
} from "@depmend/core";
export { ExitCode, type ExitCodeType } from "@depmend/core";

// Config, errors and bounded tasks
export {
  AssistantError,
  CancelledError,
  ConfigError,
  configSchema,
  defaultConfig,
  EngineError,
  findConfigFile,
  getErrorMessage,
  IOFailureError,
  loadConfig,
  TimeoutError,
  validateConfig,
  withOverrides,
  type Config,
  type ConfigOverrides,
  type EngineConfig,
} from "./core/index.js";

// Versions
export {
  compareVersions,
  intersect,
  isBelow,
  parseSpecifier,
  parseVersion,
  type VersionRange,
} from "./versions/index.js";

// Manifests
export {
  adapterFor,
  normalizeName,
  packageJsonAdapter,
  parseManifest,
  renderManifest,
  requirementsAdapter,
  type FormatAdapter,
} from "./manifest/index.js";

// Usage scanning
export {
  extractJavaScriptImports,
  extractPythonImports,
  scanUsage,
  type ScanOptions,
  type ScanResult,
} from "./usage/index.js";

// Reconciliation, planning, presentation and apply
export { reconcile, type ReconcileOptions } from "./reconcile/index.js";
export { applyEdits, applyPlan, plan, type PlanInputs } from "./plan/index.js";
export { present, unifiedDiff } from "./diff/index.js";
export { apply, checksum, type ApplyOptions, type ApplyResult, type ApplyStatus } from "./apply/index.js";

// Pipeline
export {
  analyzeProject,
  applyFixes,
  planFixes,
  type Analysis,
  type Fix,
  type FixOutcome,
  type RunOptions,
} from "./pipeline/index.js";

// Assistant
export {
  analyzeFile,
  OpenAIAssistant,
  suggestEdit,
  translateFile,
  translationTarget,
  type AnalyzeRequest,
  type AssistantClient,
  type FileAnalysis,
  type Suggestion,
  type SuggestRequest,
  type TranslateRequest,
  type Translation,
} from "./assist/index.js";

// Output
export { formatAnalysisJson, formatAnalysisText } from "./output/index.js";
