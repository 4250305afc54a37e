/**
 * package.json dialect.
 *
 * The file must be valid JSON to be edited at all. Entries are recognised
 * line by line inside the top-level dependency maps; every other line is
 * carried through untouched.
 */

import * as path from "node:path";

import {
  type DependencyEntry,
  type DependencySection,
  type Diagnostic,
  DiagnosticBuilder,
  type EntryKind,
  type ManifestDocument,
  type Segment,
  segmentText,
} from "@depmend/core";

import { getErrorMessage } from "../core/errors.js";
import { detectLineEnding, indentOf, lineEnding, renderSegments, splitLines, stripEol } from "./lines.js";
import type { FormatAdapter, InsertionPoint, NewEntryContext } from "./types.js";

const SECTION_KINDS: Record<Exclude<DependencySection, "requirements">, EntryKind> = {
  dependencies: "runtime",
  devDependencies: "development",
  peerDependencies: "peer",
  optionalDependencies: "optional",
};

const SECTION_HEADER_PATTERN =
  /^\s*"(dependencies|devDependencies|peerDependencies|optionalDependencies)"\s*:\s*\{(.*)$/;
const ENTRY_PATTERN = /^(\s*)"((?:[^"\\]|\\.)+)"\s*:\s*"((?:[^"\\]|\\.)*)"\s*(,?)\s*$/;
const VALUE_PATTERN = /^(\s*"(?:[^"\\]|\\.)+"\s*:\s*)"(?:[^"\\]|\\.)*"(.*)$/;
const SECTION_CLOSE_PATTERN = /^\s*\}/;
const LOCAL_PREFIXES = ["file:", "link:"];

function isSection(value: string): value is Exclude<DependencySection, "requirements"> {
  return value in SECTION_KINDS;
}

/** Net change in object/array nesting over a line, ignoring brackets inside strings */
export function nestingDelta(line: string): number {
  let delta = 0;
  let inString = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inString) {
      if (ch === "\\") i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{" || ch === "[") delta++;
    else if (ch === "}" || ch === "]") delta--;
  }
  return delta;
}

/** Decode a JSON string literal body; null when it is not valid JSON */
function decodeJsonString(body: string): string | null {
  try {
    const decoded: unknown = JSON.parse(`"${body}"`);
    return typeof decoded === "string" ? decoded : null;
  } catch {
    return null;
  }
}

function degradedDocument(text: string, filePath: string, message: string): ManifestDocument {
  const segments: Segment[] = splitLines(text).map((line, index): Segment => ({
    type: "opaque",
    line: index + 1,
    text: line,
    reason: "degraded",
  }));
  return {
    path: filePath,
    dialect: "package-json",
    ecosystem: "node",
    eol: detectLineEnding(text),
    segments,
    diagnostics: [DiagnosticBuilder.degraded(filePath, 1, message)],
  };
}

function parse(text: string, filePath: string): ManifestDocument {
  try {
    JSON.parse(text);
  } catch (error) {
    return degradedDocument(text, filePath, `invalid JSON: ${getErrorMessage(error)}`);
  }

  const segments: Segment[] = [];
  const diagnostics: Diagnostic[] = [];
  let depth = 0;
  let section: Exclude<DependencySection, "requirements"> | null = null;

  const lines = splitLines(text);
  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    const lineNumber = index + 1;
    const content = stripEol(line);
    const opaque = (reason: "blank" | "structure" | "degraded"): void => {
      segments.push({ type: "opaque", line: lineNumber, text: line, reason });
    };

    if (section !== null) {
      const entry = depth === 2 ? ENTRY_PATTERN.exec(content) : null;
      if (SECTION_CLOSE_PATTERN.test(content) && depth + nestingDelta(content) <= 1) {
        section = null;
        opaque("structure");
      } else if (entry) {
        const name = decodeJsonString(entry[2]);
        const rawSpecifier = decodeJsonString(entry[3]);
        if (name === null || rawSpecifier === null) {
          diagnostics.push(DiagnosticBuilder.degraded(filePath, lineNumber, "undecodable dependency entry"));
          opaque("degraded");
        } else {
          const isLocal = LOCAL_PREFIXES.some((prefix) => rawSpecifier.startsWith(prefix));
          segments.push({
            type: "entry",
            name,
            displayName: name,
            rawSpecifier,
            kind: isLocal ? "file-reference" : SECTION_KINDS[section],
            section,
            sourceSpan: { startLine: lineNumber, endLine: lineNumber },
            lineText: line,
            manifestPath: filePath,
          });
        }
      } else if (content.trim() === "") {
        opaque("blank");
      } else {
        diagnostics.push(
          DiagnosticBuilder.degraded(filePath, lineNumber, `unrecognized line in "${section}"`)
        );
        opaque("degraded");
      }
      depth += nestingDelta(content);
      continue;
    }

    const header = depth === 1 ? SECTION_HEADER_PATTERN.exec(content) : null;
    if (header && isSection(header[1])) {
      const rest = header[2].trim();
      if (rest === "") {
        section = header[1];
        opaque("structure");
      } else if (rest.startsWith("}")) {
        opaque("structure");
      } else {
        diagnostics.push(
          DiagnosticBuilder.degraded(filePath, lineNumber, `inline "${header[1]}" map is not editable`)
        );
        opaque("degraded");
      }
    } else {
      opaque(content.trim() === "" ? "blank" : "structure");
    }
    depth += nestingDelta(content);
  }

  return {
    path: filePath,
    dialect: "package-json",
    ecosystem: "node",
    eol: detectLineEnding(text),
    segments,
    diagnostics,
  };
}

function withSpecifier(entry: DependencyEntry, specifier: string): string {
  const match = VALUE_PATTERN.exec(stripEol(entry.lineText));
  if (!match) {
    return entry.lineText;
  }
  return `${match[1]}${JSON.stringify(specifier)}${match[2]}${lineEnding(entry.lineText)}`;
}

function hasSeparator(lineText: string): boolean {
  return /,\s*$/.test(stripEol(lineText));
}

function withSeparator(lineText: string, present: boolean): string {
  if (present === hasSeparator(lineText)) {
    return lineText;
  }
  const content = stripEol(lineText);
  const eol = lineEnding(lineText);
  const updated = present ? content.replace(/(\s*)$/, ",$1") : content.replace(/,(\s*)$/, "$1");
  return `${updated}${eol}`;
}

function formatConstraint(version: string, previous?: string): string {
  const style = previous?.trim() ?? "";
  if (style.startsWith("~")) return `~${version}`;
  if (/^\d/.test(style)) return version;
  return `^${version}`;
}

function formatEntry(name: string, specifier: string | null, context: NewEntryContext): string {
  return `${context.indent}${JSON.stringify(name)}: ${JSON.stringify(specifier ?? "*")}${context.eol}`;
}

/**
 * After the last "dependencies" entry, or just inside an empty multi-line
 * "dependencies" map. Documents without one get nothing inserted.
 */
function insertionPoint(document: ManifestDocument): InsertionPoint | null {
  let depth = 0;
  let header: { line: number; indent: string } | null = null;
  let previous: DependencyEntry | null = null;

  for (const segment of document.segments) {
    if (segment.type === "entry") {
      if (segment.section === "dependencies") previous = segment;
    } else if (depth === 1 && header === null) {
      const match = SECTION_HEADER_PATTERN.exec(stripEol(segment.text));
      if (match && match[1] === "dependencies" && match[2].trim() === "") {
        header = { line: segment.line, indent: indentOf(segment.text) };
      }
    }
    depth += nestingDelta(stripEol(segmentText(segment)));
  }

  if (previous) {
    return { afterLine: previous.sourceSpan.endLine, indent: indentOf(previous.lineText), previous };
  }
  if (header) {
    return { afterLine: header.line, indent: `${header.indent}${header.indent || "  "}`, previous: null };
  }
  return null;
}

/** Adapter for package.json files */
export const packageJsonAdapter: FormatAdapter = {
  dialect: "package-json",
  ecosystem: "node",
  matches: (filePath: string) => path.basename(filePath) === "package.json",
  parse,
  render: renderSegments,
  withSpecifier,
  formatConstraint,
  formatEntry,
  withSeparator,
  hasSeparator,
  insertionPoint,
};
