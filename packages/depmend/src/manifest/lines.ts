import type { LineEnding, ManifestDocument } from "@depmend/core";
import { segmentText } from "@depmend/core";

/**
 * Split text into lines that keep their terminators.
 * A final line without a terminator is kept as is; empty text yields no lines.
 */
export function splitLines(text: string): string[] {
  const lines: string[] = [];
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    if (text[i] === "\n") {
      lines.push(text.slice(start, i + 1));
      start = i + 1;
    }
  }
  if (start < text.length) {
    lines.push(text.slice(start));
  }
  return lines;
}

/** Terminator of a line ("" for the last line of a file without one) */
export function lineEnding(line: string): string {
  if (line.endsWith("\r\n")) return "\r\n";
  if (line.endsWith("\n")) return "\n";
  return "";
}

/** Line content without its terminator */
export function stripEol(line: string): string {
  return line.slice(0, line.length - lineEnding(line).length);
}

/** Dominant line terminator; LF when the text has none */
export function detectLineEnding(text: string): LineEnding {
  const total = (text.match(/\n/g) ?? []).length;
  const crlf = (text.match(/\r\n/g) ?? []).length;
  return crlf > 0 && crlf >= total - crlf ? "\r\n" : "\n";
}

/** Leading whitespace of a line */
export function indentOf(line: string): string {
  return /^[ \t]*/.exec(line)?.[0] ?? "";
}

/** Concatenate every segment's verbatim text */
export function renderSegments(document: ManifestDocument): string {
  return document.segments.map(segmentText).join("");
}
