/**
 * Shared types for depmend
 */

// =============================================================================
// Manifest Model
// =============================================================================

/** Package ecosystem a manifest belongs to */
export type Ecosystem = "python" | "node";

/** Manifest dialect understood by a format adapter */
export type Dialect = "requirements" | "package-json";

/** How a dependency is declared */
export type EntryKind =
  | "runtime"
  | "editable"
  | "file-reference"
  | "marker-conditional"
  | "development"
  | "peer"
  | "optional";

/** Dependency class an entry was declared in */
export type DependencySection =
  | "requirements"
  | "dependencies"
  | "devDependencies"
  | "peerDependencies"
  | "optionalDependencies";

/** 1-based, inclusive line range */
export interface SourceSpan {
  readonly startLine: number;
  readonly endLine: number;
}

/** One declared dependency */
export interface DependencyEntry {
  readonly type: "entry";
  /** Normalized identifier used for matching */
  readonly name: string;
  /** Name as written in the manifest */
  readonly displayName: string;
  /** Version constraint as written (markers included) */
  readonly rawSpecifier: string;
  readonly kind: EntryKind;
  readonly section: DependencySection;
  readonly sourceSpan: SourceSpan;
  /** Verbatim original text, line terminators included */
  readonly lineText: string;
  readonly manifestPath: string;
}

/** Why a line was kept opaque */
export type OpaqueReason = "blank" | "comment" | "directive" | "structure" | "degraded";

/** A line carried through verbatim */
export interface OpaqueLine {
  readonly type: "opaque";
  readonly line: number;
  readonly text: string;
  readonly reason: OpaqueReason;
}

export type Segment = DependencyEntry | OpaqueLine;

/** Line terminator style of a document */
export type LineEnding = "\n" | "\r\n";

/** Parsed manifest: an ordered arena of segments */
export interface ManifestDocument {
  readonly path: string;
  readonly dialect: Dialect;
  readonly ecosystem: Ecosystem;
  readonly eol: LineEnding;
  readonly segments: readonly Segment[];
  readonly diagnostics: readonly Diagnostic[];
}

// =============================================================================
// Usage
// =============================================================================

/** One source-level reference to an external module */
export interface UsageRecord {
  /** Top-level module name, normalized for matching */
  readonly moduleName: string;
  /** Module reference as written */
  readonly rawModule: string;
  readonly filePath: string;
  readonly lineNumber: number;
  readonly ecosystem: Ecosystem;
  /** Dotted imports only: namespace distribution names, most specific first */
  readonly namespaceCandidates?: readonly string[];
}

// =============================================================================
// Findings
// =============================================================================

export type FindingKind = "unused" | "missing" | "conflicting" | "outdated" | "unparseable";

/** Fixed reporting order of finding kinds */
export const FINDING_KIND_ORDER: readonly FindingKind[] = [
  "unused",
  "missing",
  "conflicting",
  "outdated",
  "unparseable",
];

/** Finding kinds the planner can turn into edits */
export const FIXABLE_KINDS: readonly FindingKind[] = [
  "unused",
  "missing",
  "conflicting",
  "outdated",
];

export type Severity = "error" | "warning" | "info";

export interface FindingEvidence {
  readonly entries: readonly DependencyEntry[];
  readonly usages: readonly UsageRecord[];
}

/** One reconciliation result */
export interface Finding {
  readonly kind: FindingKind;
  readonly subjectName: string;
  readonly severity: Severity;
  readonly message: string;
  readonly evidence: FindingEvidence;
  /** Manifest the fix applies to */
  readonly target: string;
  readonly ecosystem: Ecosystem;
  /** Conflicting only: the entry cited as the likely error source */
  readonly narrower?: DependencyEntry;
}

// =============================================================================
// Edit Plans
// =============================================================================

export type EditOp = "insert" | "delete" | "replace";

/**
 * Line-level edit. Inserts go after `line` (0 = top of file);
 * deletes and replaces cover `line`..`endLine`.
 */
export interface EditOperation {
  readonly op: EditOp;
  readonly line: number;
  readonly endLine: number;
  readonly text: string;
  /** Originating finding; absent for assistant suggestions */
  readonly finding?: Finding;
}

export interface SkippedFinding {
  readonly finding: Finding;
  readonly reason: string;
}

export interface EditPlan {
  readonly path: string;
  readonly operations: readonly EditOperation[];
  readonly skipped: readonly SkippedFinding[];
}

// =============================================================================
// Diagnostics
// =============================================================================

export type DiagnosticCode = "PARSE_DEGRADED" | "TIMEOUT" | "IO_FAILURE" | "CANCELLED";

/** Non-fatal issue surfaced alongside findings */
export interface Diagnostic {
  readonly code: DiagnosticCode;
  readonly file: string;
  readonly line?: number;
  readonly message: string;
}

// =============================================================================
// Builders
// =============================================================================

const DEFAULT_SEVERITY: Record<FindingKind, Severity> = {
  unused: "warning",
  missing: "error",
  conflicting: "error",
  outdated: "info",
  unparseable: "warning",
};

/** Options for creating a finding */
export interface FindingOptions {
  kind: FindingKind;
  subjectName: string;
  message: string;
  target: string;
  ecosystem: Ecosystem;
  entries?: readonly DependencyEntry[];
  usages?: readonly UsageRecord[];
  narrower?: DependencyEntry;
  severity?: Severity;
}

/** Builder for creating Finding objects */
export const FindingBuilder = {
  create(options: FindingOptions): Finding {
    return {
      kind: options.kind,
      subjectName: options.subjectName,
      severity: options.severity ?? DEFAULT_SEVERITY[options.kind],
      message: options.message,
      evidence: {
        entries: options.entries ?? [],
        usages: options.usages ?? [],
      },
      target: options.target,
      ecosystem: options.ecosystem,
      ...(options.narrower && { narrower: options.narrower }),
    };
  },
};

/** Builder for creating Diagnostic objects */
export const DiagnosticBuilder = {
  degraded(file: string, line: number, message: string): Diagnostic {
    return { code: "PARSE_DEGRADED", file, line, message };
  },

  timeout(file: string, message: string): Diagnostic {
    return { code: "TIMEOUT", file, message };
  },

  ioFailure(file: string, message: string): Diagnostic {
    return { code: "IO_FAILURE", file, message };
  },
};

/** Type guard for entry segments */
export function isEntry(segment: Segment): segment is DependencyEntry {
  return segment.type === "entry";
}

/** Verbatim text of a segment */
export function segmentText(segment: Segment): string {
  return segment.type === "entry" ? segment.lineText : segment.text;
}

/** All dependency entries of a document, in source order */
export function entriesOf(document: ManifestDocument): DependencyEntry[] {
  return document.segments.filter(isEntry);
}

// =============================================================================
// Exit Codes
// =============================================================================

export const ExitCode = {
  SUCCESS: 0,
  CONFIG_ERROR: 2,
  RUNTIME_ERROR: 3,
} as const;

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode];
