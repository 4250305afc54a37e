/**
 * Patch planner: accepted findings become line-level edits against one document.
 *
 * Operations address original line numbers. Opaque segments are never the
 * subject of an operation; only entry lines are deleted or replaced.
 */

import {
  type DependencyEntry,
  type DependencySection,
  type EditOperation,
  type EditPlan,
  entriesOf,
  type Finding,
  FINDING_KIND_ORDER,
  FIXABLE_KINDS,
  type FindingKind,
  type ManifestDocument,
  type SkippedFinding,
} from "@depmend/core";

import { adapterForDialect, type FormatAdapter, renderManifest } from "../manifest/index.js";
import { detectLineEnding, lineEnding, splitLines, stripEol } from "../manifest/lines.js";
import { normalizeName } from "../manifest/names.js";

/** Values the planner needs from outside; it never invents them */
export interface PlanInputs {
  /** Replacement specifier per name, for Conflicting findings */
  resolutions?: Readonly<Record<string, string>>;
  /** Target version per name, for Outdated and Missing findings */
  targets?: Readonly<Record<string, string>>;
  /** Fallback versions when no target is given */
  freshnessReference?: Readonly<Record<string, string>>;
}

/** Mutable working copy of an operation while the plan is assembled */
interface Draft {
  op: EditOperation["op"];
  line: number;
  endLine: number;
  text: string;
  finding: Finding;
  entry?: DependencyEntry;
}

function lookup(
  table: Readonly<Record<string, string>> | undefined,
  finding: Finding
): string | undefined {
  if (!table) return undefined;
  for (const [name, value] of Object.entries(table)) {
    if (normalizeName(finding.ecosystem, name) === finding.subjectName) {
      return value;
    }
  }
  return undefined;
}

function belongsTo(entry: DependencyEntry | undefined, document: ManifestDocument): entry is DependencyEntry {
  return entry !== undefined && entry.manifestPath === document.path;
}

function kindRank(kind: FindingKind): number {
  return FINDING_KIND_ORDER.indexOf(kind);
}

/**
 * Keep separators valid in dialects that have them: within each map every
 * surviving or inserted entry but the last carries one.
 */
function fixSeparators(
  adapter: FormatAdapter,
  document: ManifestDocument,
  drafts: Draft[],
  insertSection: DependencySection
): void {
  const deleted = new Set<DependencyEntry>();
  const replaced = new Map<DependencyEntry, Draft>();
  for (const draft of drafts) {
    if (draft.entry && draft.op === "delete") deleted.add(draft.entry);
    if (draft.entry && draft.op === "replace") replaced.set(draft.entry, draft);
  }
  const inserts = drafts.filter((d) => d.op === "insert");

  const sections = new Set(entriesOf(document).map((entry) => entry.section));
  if (inserts.length > 0) sections.add(insertSection);

  for (const section of sections) {
    const survivors = entriesOf(document).filter((e) => e.section === section && !deleted.has(e));
    const added = section === insertSection ? inserts : [];
    const touched = drafts.find(
      (d) => d.op === "insert" ? section === insertSection : d.entry?.section === section
    );
    if (!touched) continue;

    const total = survivors.length + added.length;
    survivors.forEach((entry, index) => {
      const wanted = index < total - 1;
      const existing = replaced.get(entry);
      const current = existing ? existing.text : entry.lineText;
      const text = adapter.withSeparator(current, wanted);
      if (text === current) return;
      if (existing) {
        existing.text = text;
      } else {
        const draft: Draft = {
          op: "replace",
          line: entry.sourceSpan.startLine,
          endLine: entry.sourceSpan.endLine,
          text,
          finding: touched.finding,
          entry,
        };
        drafts.push(draft);
        replaced.set(entry, draft);
      }
    });
    added.forEach((draft, index) => {
      draft.text = adapter.withSeparator(draft.text, survivors.length + index < total - 1);
    });
  }
}

/**
 * Turn accepted findings that target this document into an edit plan.
 * Findings of other kinds or for other documents are ignored; accepted
 * findings that cannot be fixed land in `skipped` with a reason.
 */
export function plan(
  document: ManifestDocument,
  findings: readonly Finding[],
  acceptedKinds: readonly FindingKind[],
  inputs: PlanInputs = {}
): EditPlan {
  const adapter = adapterForDialect(document.dialect);
  const drafts: Draft[] = [];
  const skipped: SkippedFinding[] = [];
  const claimed = new Set<DependencyEntry>();

  const relevant = findings
    .filter(
      (f) => f.target === document.path && acceptedKinds.includes(f.kind) && FIXABLE_KINDS.includes(f.kind)
    )
    .sort((a, b) => kindRank(a.kind) - kindRank(b.kind));

  const skip = (finding: Finding, reason: string): void => {
    skipped.push({ finding, reason });
  };
  const claim = (finding: Finding, entry: DependencyEntry): boolean => {
    if (claimed.has(entry)) {
      skip(finding, `${entry.displayName} at line ${entry.sourceSpan.startLine} is already being edited`);
      return false;
    }
    claimed.add(entry);
    return true;
  };

  for (const finding of relevant) {
    switch (finding.kind) {
      case "unused": {
        const entry = finding.evidence.entries[0];
        if (!belongsTo(entry, document) || !claim(finding, entry)) break;
        drafts.push({
          op: "delete",
          line: entry.sourceSpan.startLine,
          endLine: entry.sourceSpan.endLine,
          text: "",
          finding,
          entry,
        });
        break;
      }

      case "missing": {
        const point = adapter.insertionPoint(document);
        if (!point) {
          skip(finding, `${document.path} has no dependency section to add ${finding.subjectName} to`);
          break;
        }
        const version = lookup(inputs.targets, finding) ?? lookup(inputs.freshnessReference, finding);
        const specifier = version === undefined ? null : adapter.formatConstraint(version);
        drafts.push({
          op: "insert",
          line: point.afterLine,
          endLine: point.afterLine,
          text: adapter.formatEntry(finding.subjectName, specifier, { eol: document.eol, indent: point.indent }),
          finding,
        });
        break;
      }

      case "conflicting": {
        const entry = finding.narrower;
        if (!belongsTo(entry, document)) break;
        const resolution = lookup(inputs.resolutions, finding);
        if (resolution === undefined) {
          skip(finding, `no resolution supplied for ${finding.subjectName}`);
          break;
        }
        if (!claim(finding, entry)) break;
        drafts.push({
          op: "replace",
          line: entry.sourceSpan.startLine,
          endLine: entry.sourceSpan.endLine,
          text: adapter.withSpecifier(entry, resolution),
          finding,
          entry,
        });
        break;
      }

      case "outdated": {
        const entry = finding.evidence.entries[0];
        if (!belongsTo(entry, document)) break;
        const version = lookup(inputs.targets, finding) ?? lookup(inputs.freshnessReference, finding);
        if (version === undefined) {
          skip(finding, `no target version supplied for ${finding.subjectName}`);
          break;
        }
        if (!claim(finding, entry)) break;
        drafts.push({
          op: "replace",
          line: entry.sourceSpan.startLine,
          endLine: entry.sourceSpan.endLine,
          text: adapter.withSpecifier(entry, adapter.formatConstraint(version, entry.rawSpecifier)),
          finding,
          entry,
        });
        break;
      }

      default:
        break;
    }
  }

  fixSeparators(adapter, document, drafts, document.dialect === "requirements" ? "requirements" : "dependencies");

  const operations: EditOperation[] = drafts
    .map((draft, order) => ({ draft, order }))
    .sort(
      (a, b) =>
        a.draft.line - b.draft.line ||
        Number(a.draft.op === "insert") - Number(b.draft.op === "insert") ||
        a.order - b.order
    )
    .map(({ draft }) => ({
      op: draft.op,
      line: draft.line,
      endLine: draft.endLine,
      text: draft.text,
      finding: draft.finding,
    }));

  return { path: document.path, operations, skipped };
}

/**
 * Apply line operations to text. Deletes and replaces cover `line`..`endLine`;
 * inserts go after `line`. The result ends with a line terminator exactly
 * when the original did.
 */
export function applyEdits(text: string, operations: readonly EditOperation[]): string {
  const lines = splitLines(text);
  const eol = detectLineEnding(text);
  const rewrites = new Map<number, EditOperation>();
  const inserts = new Map<number, EditOperation[]>();
  for (const operation of operations) {
    if (operation.op === "insert") {
      const list = inserts.get(operation.line) ?? [];
      list.push(operation);
      inserts.set(operation.line, list);
    } else {
      rewrites.set(operation.line, operation);
    }
  }

  const pieces: string[] = [];
  const pushInserts = (afterLine: number): void => {
    for (const operation of inserts.get(afterLine) ?? []) {
      pieces.push(operation.text);
    }
  };

  pushInserts(0);
  let coveredUntil = 0;
  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    const rewrite = rewrites.get(lineNumber);
    if (rewrite && lineNumber > coveredUntil) {
      coveredUntil = rewrite.endLine;
      if (rewrite.op === "replace") pieces.push(rewrite.text);
    } else if (lineNumber > coveredUntil) {
      pieces.push(line);
    }
    pushInserts(lineNumber);
  });

  const missingFinalEol = lines.length > 0 && lineEnding(lines[lines.length - 1]) === "";
  const normalized = pieces
    .filter((piece) => piece !== "")
    .map((piece, index, all) => (index < all.length - 1 && lineEnding(piece) === "" ? `${piece}${eol}` : piece));
  if (missingFinalEol && normalized.length > 0) {
    normalized[normalized.length - 1] = stripEol(normalized[normalized.length - 1]);
  }
  return normalized.join("");
}

/** Render the post-edit text of a document */
export function applyPlan(document: ManifestDocument, editPlan: EditPlan): string {
  return applyEdits(renderManifest(document), editPlan.operations);
}
