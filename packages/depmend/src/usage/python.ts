/**
 * Import extraction for Python sources.
 */

import { normalizePythonName } from "../manifest/names.js";
import type { ImportReference } from "./types.js";

const IMPORT_PATTERN = /^\s*import\s+(.+)$/;
const FROM_PATTERN = /^\s*from\s+(\.*)([A-Za-z_][\w.]*)?\s+import\b/;
const DYNAMIC_PATTERN = /\b(?:__import__|(?:importlib\.)?import_module)\(\s*["']([A-Za-z_][\w.]*)["']/g;
const MODULE_PATTERN = /^[A-Za-z_][\w.]*$/;
const IDENTIFIER_PATTERN = /^[A-Za-z_]\w*$/;

function stripComment(line: string): string {
  const index = line.indexOf("#");
  return index === -1 ? line : line.slice(0, index);
}

/** Join backslash continuations, remembering the first physical line of each */
function logicalLines(text: string): Array<{ line: number; content: string }> {
  const result: Array<{ line: number; content: string }> = [];
  const physical = text.split(/\r?\n/);
  let i = 0;
  while (i < physical.length) {
    const line = i + 1;
    let content = physical[i];
    while (content.endsWith("\\") && i + 1 < physical.length) {
      i++;
      content = `${content.slice(0, -1)} ${physical[i]}`;
    }
    result.push({ line, content });
    i++;
  }
  return result;
}

/** Names after `from x import`, without aliases, parentheses or `*` */
function importedNames(list: string): string[] {
  return list
    .replace(/[()]/g, " ")
    .split(",")
    .map((part) => part.trim().split(/\s+as\s+/)[0].trim())
    .filter((name) => IDENTIFIER_PATTERN.test(name));
}

/**
 * Every absolute module reference in a Python file.
 * Relative imports (`from . import x`, `from .a import b`) are not returned.
 */
export function extractPythonImports(text: string): ImportReference[] {
  const references: ImportReference[] = [];

  for (const { line, content: rawContent } of logicalLines(text)) {
    const content = stripComment(rawContent);

    const from = FROM_PATTERN.exec(content);
    if (from) {
      if (from[1] === "" && from[2]) {
        references.push({ specifier: from[2], line, members: importedNames(content.slice(from[0].length)) });
      }
    } else {
      const plain = IMPORT_PATTERN.exec(content);
      if (plain) {
        for (const part of plain[1].split(",")) {
          const moduleName = part.trim().split(/\s+as\s+/)[0].trim();
          if (MODULE_PATTERN.test(moduleName)) {
            references.push({ specifier: moduleName, line });
          }
        }
      }
    }

    for (const match of content.matchAll(DYNAMIC_PATTERN)) {
      references.push({ specifier: match[1], line });
    }
  }

  return references;
}

/** Top-level package of a dotted module path, normalized (`a.b.c` → `a`) */
export function pythonTopLevel(specifier: string): string {
  return normalizePythonName(specifier.split(".")[0]);
}

/**
 * Distribution names a dotted import may be published under, most specific
 * first: `from google.cloud import storage` gives google-cloud-storage, then
 * google-cloud. The top-level name alone is not a candidate.
 */
export function pythonNamespaceCandidates(specifier: string, members: readonly string[] = []): string[] {
  const parts = specifier.split(".");
  const candidates = new Set<string>();
  for (const member of members) {
    candidates.add(normalizePythonName([...parts, member].join("-")));
  }
  for (let length = parts.length; length >= 2; length--) {
    candidates.add(normalizePythonName(parts.slice(0, length).join("-")));
  }
  return [...candidates];
}
