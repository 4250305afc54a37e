import type { DependencyEntry, Dialect, Ecosystem, LineEnding, ManifestDocument } from "@depmend/core";

/** Where a new dependency line is being added */
export interface NewEntryContext {
  eol: LineEnding;
  /** Indentation of the neighbouring entry, if any */
  indent: string;
}

/** Where new runtime dependencies are added to a document */
export interface InsertionPoint {
  /** New lines go after this line (0 = top of file) */
  afterLine: number;
  indent: string;
  /** Last runtime entry before the insertion point, if any */
  previous: DependencyEntry | null;
}

/**
 * Contract of a manifest dialect: lossless parse/render plus the
 * line-level rewrites the planner needs.
 */
export interface FormatAdapter {
  readonly dialect: Dialect;
  readonly ecosystem: Ecosystem;

  /** True when the file name belongs to this dialect */
  matches(filePath: string): boolean;

  /** Parse text into segments; never throws, degrades unreadable lines */
  parse(text: string, filePath: string): ManifestDocument;

  /** Concatenate segments back into text */
  render(document: ManifestDocument): string;

  /** The entry's text with its version constraint replaced, everything else kept */
  withSpecifier(entry: DependencyEntry, specifier: string): string;

  /** Constraint text for a target version, following the style of `previous` */
  formatConstraint(version: string, previous?: string): string;

  /** Canonical line for a new dependency, terminator included */
  formatEntry(name: string, specifier: string | null, context: NewEntryContext): string;

  /**
   * An entry line with its trailing separator set or removed.
   * Dialects without separators return the text unchanged.
   */
  withSeparator(lineText: string, present: boolean): string;

  /** True when an entry line carries a trailing separator */
  hasSeparator(lineText: string): boolean;

  /** Where a missing runtime dependency goes; null when the document has no place for one */
  insertionPoint(document: ManifestDocument): InsertionPoint | null;
}
