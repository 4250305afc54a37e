import type { Dialect, ManifestDocument } from "@depmend/core";

import { packageJsonAdapter } from "./package-json.js";
import { requirementsAdapter } from "./requirements.js";
import type { FormatAdapter } from "./types.js";

export { requirementsAdapter, nameFromReference } from "./requirements.js";
export { packageJsonAdapter, nestingDelta } from "./package-json.js";
export { normalizeName, normalizePythonName } from "./names.js";
export { splitLines, lineEnding, stripEol, detectLineEnding, indentOf, renderSegments } from "./lines.js";
export type { FormatAdapter, InsertionPoint, NewEntryContext } from "./types.js";

/** Every supported dialect */
export const ADAPTERS: readonly FormatAdapter[] = [requirementsAdapter, packageJsonAdapter];

/** Adapter for a manifest path, or null if the file is not a manifest */
export function adapterFor(filePath: string): FormatAdapter | null {
  return ADAPTERS.find((adapter) => adapter.matches(filePath)) ?? null;
}

/** Adapter for a dialect */
export function adapterForDialect(dialect: Dialect): FormatAdapter {
  return dialect === "requirements" ? requirementsAdapter : packageJsonAdapter;
}

/** Parse manifest text with the adapter matching its path */
export function parseManifest(text: string, filePath: string): ManifestDocument | null {
  const adapter = adapterFor(filePath);
  return adapter ? adapter.parse(text, filePath) : null;
}

/** Render a document back to text; lossless for an unmodified document */
export function renderManifest(document: ManifestDocument): string {
  return adapterForDialect(document.dialect).render(document);
}
