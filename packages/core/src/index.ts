// Types
export type {
  Ecosystem,
  Dialect,
  EntryKind,
  DependencySection,
  SourceSpan,
  DependencyEntry,
  OpaqueReason,
  OpaqueLine,
  Segment,
  LineEnding,
  ManifestDocument,
  UsageRecord,
  FindingKind,
  Severity,
  FindingEvidence,
  Finding,
  EditOp,
  EditOperation,
  SkippedFinding,
  EditPlan,
  DiagnosticCode,
  Diagnostic,
  FindingOptions,
  ExitCodeType,
} from "./types.js";

export {
  FINDING_KIND_ORDER,
  FIXABLE_KINDS,
  FindingBuilder,
  DiagnosticBuilder,
  ExitCode,
  isEntry,
  segmentText,
  entriesOf,
} from "./types.js";
