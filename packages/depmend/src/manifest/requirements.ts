/**
 * requirements.txt dialect.
 *
 * One entry per logical line. Comments, blank lines and option lines
 * (`-r`, `-c`, `--index-url`, ...) are opaque; inclusions are never followed.
 */

import * as path from "node:path";

import {
  type DependencyEntry,
  type Diagnostic,
  DiagnosticBuilder,
  entriesOf,
  type EntryKind,
  type ManifestDocument,
  type OpaqueReason,
  type Segment,
} from "@depmend/core";

import { splitMarker } from "../versions/index.js";
import { detectLineEnding, lineEnding, renderSegments, splitLines, stripEol } from "./lines.js";
import { normalizePythonName } from "./names.js";
import type { FormatAdapter, InsertionPoint, NewEntryContext } from "./types.js";

const NAME = "[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?";
const EXTRAS = "\\[[^\\]]*\\]";

const REQUIREMENT_PATTERN = new RegExp(`^(${NAME})\\s*(${EXTRAS})?\\s*(.*)$`);
const DIRECT_REFERENCE_PATTERN = new RegExp(`^(${NAME})\\s*(${EXTRAS})?\\s*@\\s*(.+)$`);
const EDITABLE_PATTERN = /^(?:-e|--editable)(?:\s+|=)(.+)$/;
const PATH_OR_URL_PATTERN = /^(?:\.{1,2}[\\/]|[\\/]|[A-Za-z][A-Za-z0-9+.-]*:\/\/|file:)/;
const SPECIFIER_START_PATTERN = /^(?:~=|===|==|!=|<=|>=|<|>|;)/;
const LINE_PREFIX_PATTERN = new RegExp(`^(\\s*${NAME}\\s*(?:${EXTRAS})?\\s*)(.*)$`);

/** Logical line: one or more physical lines joined by backslash continuations */
interface LogicalLine {
  startLine: number;
  physical: string[];
  content: string;
}

function joinContinuations(lines: string[]): LogicalLine[] {
  const logical: LogicalLine[] = [];
  let i = 0;
  while (i < lines.length) {
    const startLine = i + 1;
    const physical = [lines[i]];
    let content = stripEol(lines[i]);
    while (content.endsWith("\\") && i + 1 < lines.length && !content.trimStart().startsWith("#")) {
      i++;
      physical.push(lines[i]);
      content = `${content.slice(0, -1)} ${stripEol(lines[i]).trim()}`;
    }
    logical.push({ startLine, physical, content });
    i++;
  }
  return logical;
}

/** Remove an inline `  # comment` (a `#` preceded by whitespace) */
function stripInlineComment(content: string): string {
  const match = /\s#/.exec(content);
  return match ? content.slice(0, match.index) : content;
}

/** Best-effort project name of a path or URL requirement */
export function nameFromReference(reference: string): string | null {
  const egg = /#egg=([^&\s]+)/.exec(reference);
  if (egg) {
    return egg[1].replace(new RegExp(`${EXTRAS}$`), "");
  }
  const withoutFragment = reference.split(/[#?]/)[0].replace(new RegExp(`${EXTRAS}$`), "");
  const base = path.posix.basename(withoutFragment.replace(/\\/g, "/").replace(/\/+$/, ""));
  const archive = /^(.+?)-\d[^/]*\.(?:whl|tar\.gz|zip|tar\.bz2)$/.exec(base);
  const name = archive ? archive[1] : base.replace(/\.git$/, "");
  return new RegExp(`^${NAME}$`).test(name) ? name : null;
}

type Classified =
  | { type: "opaque"; reason: OpaqueReason; diagnostic?: string }
  | { type: "entry"; name: string; rawSpecifier: string; kind: EntryKind };

function classify(content: string): Classified {
  const trimmed = content.trim();
  if (trimmed === "") {
    return { type: "opaque", reason: "blank" };
  }
  if (trimmed.startsWith("#")) {
    return { type: "opaque", reason: "comment" };
  }

  const editable = EDITABLE_PATTERN.exec(stripInlineComment(trimmed));
  if (editable) {
    const target = editable[1].trim();
    const name = nameFromReference(target);
    if (!name) {
      return { type: "opaque", reason: "degraded", diagnostic: `cannot infer a name for editable "${target}"` };
    }
    return { type: "entry", name, rawSpecifier: target, kind: "editable" };
  }
  if (trimmed.startsWith("-")) {
    return { type: "opaque", reason: "directive" };
  }

  const body = stripInlineComment(trimmed).trim();

  const direct = DIRECT_REFERENCE_PATTERN.exec(body);
  if (direct) {
    return { type: "entry", name: direct[1], rawSpecifier: `@ ${direct[3].trim()}`, kind: "file-reference" };
  }

  if (PATH_OR_URL_PATTERN.test(body)) {
    const name = nameFromReference(body);
    if (!name) {
      return { type: "opaque", reason: "degraded", diagnostic: `cannot infer a name for "${body}"` };
    }
    return { type: "entry", name, rawSpecifier: body, kind: "file-reference" };
  }

  const requirement = REQUIREMENT_PATTERN.exec(body);
  if (!requirement) {
    return { type: "opaque", reason: "degraded", diagnostic: `unrecognized requirement "${body}"` };
  }
  // Per-requirement options such as --hash are not part of the constraint
  const rawSpecifier = requirement[3].replace(/\s+--[A-Za-z].*$/, "").trim();
  if (rawSpecifier !== "" && !SPECIFIER_START_PATTERN.test(rawSpecifier)) {
    return { type: "opaque", reason: "degraded", diagnostic: `unrecognized requirement "${body}"` };
  }
  const kind: EntryKind = rawSpecifier.includes(";") ? "marker-conditional" : "runtime";
  return { type: "entry", name: requirement[1], rawSpecifier, kind };
}

function parse(text: string, filePath: string): ManifestDocument {
  const segments: Segment[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const logical of joinContinuations(splitLines(text))) {
    const classified = classify(logical.content);
    if (classified.type === "entry") {
      const entry: DependencyEntry = {
        type: "entry",
        name: normalizePythonName(classified.name),
        displayName: classified.name,
        rawSpecifier: classified.rawSpecifier,
        kind: classified.kind,
        section: "requirements",
        sourceSpan: {
          startLine: logical.startLine,
          endLine: logical.startLine + logical.physical.length - 1,
        },
        lineText: logical.physical.join(""),
        manifestPath: filePath,
      };
      segments.push(entry);
      continue;
    }

    if (classified.diagnostic) {
      diagnostics.push(DiagnosticBuilder.degraded(filePath, logical.startLine, classified.diagnostic));
    }
    logical.physical.forEach((physicalLine, offset) => {
      segments.push({
        type: "opaque",
        line: logical.startLine + offset,
        text: physicalLine,
        reason: classified.reason,
      });
    });
  }

  return {
    path: filePath,
    dialect: "requirements",
    ecosystem: "python",
    eol: detectLineEnding(text),
    segments,
    diagnostics,
  };
}

function withSpecifier(entry: DependencyEntry, specifier: string): string {
  const [first, ...rest] = splitLines(entry.lineText);
  const eol = lineEnding(first);
  const content = stripEol(first);
  const match = LINE_PREFIX_PATTERN.exec(content);
  if (!match) {
    return entry.lineText;
  }
  const [, prefix, remainder] = match;
  const tail = /;|\s#|\s--|\\$/.exec(remainder);
  const versionPart = tail ? remainder.slice(0, tail.index) : remainder;
  if (rest.length > 0 && versionPart.trim() === "") {
    // Constraint sits on a continuation line: collapse the entry onto one line
    const { marker } = splitMarker(entry.rawSpecifier);
    return `${prefix.trimEnd()}${specifier}${marker === null ? "" : `; ${marker}`}${eol}`;
  }
  const trailing = /\s*$/.exec(versionPart)?.[0] ?? "";
  const after = tail ? remainder.slice(tail.index) : "";
  return [`${prefix}${specifier}${trailing}${after}${eol}`, ...rest].join("");
}

function formatConstraint(version: string, previous?: string): string {
  const previousVersion = previous === undefined ? "" : splitMarker(previous).version;
  return /^==[^,]*$/.test(previousVersion) ? `==${version}` : `>=${version}`;
}

function formatEntry(name: string, specifier: string | null, context: NewEntryContext): string {
  return `${name}${specifier ?? ""}${context.eol}`;
}

/** After the last entry, or at the end of a file that has none */
function insertionPoint(document: ManifestDocument): InsertionPoint {
  const entries = entriesOf(document);
  const previous = entries.length > 0 ? entries[entries.length - 1] : null;
  if (previous) {
    return { afterLine: previous.sourceSpan.endLine, indent: "", previous };
  }
  const last = document.segments[document.segments.length - 1];
  const lastLine = last === undefined ? 0 : last.type === "entry" ? last.sourceSpan.endLine : last.line;
  return { afterLine: lastLine, indent: "", previous: null };
}

/** Adapter for requirements.txt files */
export const requirementsAdapter: FormatAdapter = {
  dialect: "requirements",
  ecosystem: "python",
  matches(filePath: string): boolean {
    const base = path.basename(filePath);
    const parent = path.basename(path.dirname(filePath));
    return /^requirements.*\.txt$/i.test(base) || (parent === "requirements" && base.endsWith(".txt"));
  },
  parse,
  render: renderSegments,
  withSpecifier,
  formatConstraint,
  formatEntry,
  withSeparator: (lineText) => lineText,
  hasSeparator: () => false,
  insertionPoint,
};
