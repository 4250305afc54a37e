/**
 * Import extraction for JavaScript and TypeScript sources.
 */

import { builtinModules } from "node:module";

import type { ImportReference } from "./types.js";

const PATTERNS: readonly RegExp[] = [
  // import x from "m", import { a, b } from "m", import type { T } from "m", import "m"
  /\bimport\s+(?:type\s+)?(?:[^"'`;]*?\bfrom\s*)?["']([^"'\n]+)["']/g,
  // export * from "m", export { a } from "m"
  /\bexport\s+(?:type\s+)?(?:\*(?:\s+as\s+[\w$]+)?|\{[^}]*\})\s*from\s*["']([^"'\n]+)["']/g,
  // require("m")
  /\brequire\s*\(\s*["']([^"'\n]+)["']\s*\)/g,
  // import("m")
  /\bimport\s*\(\s*["']([^"'\n]+)["']\s*\)/g,
];

const ALIAS_PREFIXES = ["@/", "~/", "#"];
const BUILTINS: ReadonlySet<string> = new Set(builtinModules);

function lineAt(text: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index; i++) {
    if (text.charCodeAt(i) === 10) line++;
  }
  return line;
}

/** Every module specifier referenced by a JavaScript or TypeScript file */
export function extractJavaScriptImports(text: string): ImportReference[] {
  const seen = new Set<string>();
  const references: ImportReference[] = [];

  for (const pattern of PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const index = match.index ?? 0;
      const offset = index + match[0].lastIndexOf(match[1]);
      const key = `${offset}:${match[1]}`;
      if (seen.has(key)) continue;
      seen.add(key);
      references.push({ specifier: match[1], line: lineAt(text, offset) });
    }
  }

  return references.sort((a, b) => a.line - b.line || a.specifier.localeCompare(b.specifier));
}

/**
 * Package name a bare specifier resolves to (`lodash/fp` → `lodash`,
 * `@scope/pkg/sub` → `@scope/pkg`), or null for relative paths, URLs,
 * path aliases and Node built-ins.
 */
export function javascriptPackageName(specifier: string): string | null {
  if (specifier.startsWith(".") || specifier.startsWith("/")) return null;
  if (ALIAS_PREFIXES.some((prefix) => specifier.startsWith(prefix))) return null;
  if (specifier.includes(":")) return null;

  const parts = specifier.split("/");
  const name = specifier.startsWith("@") ? parts.slice(0, 2).join("/") : parts[0];
  if (name === "" || (specifier.startsWith("@") && parts.length < 2)) return null;
  if (BUILTINS.has(name) || BUILTINS.has(specifier)) return null;
  return name;
}
