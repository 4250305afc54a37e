import type { VersionRange } from "./range.js";

/** Outcome of parsing a version constraint */
export type SpecifierParse =
  | { status: "range"; range: VersionRange }
  /** Not a registry version constraint (path, URL, VCS, alias) */
  | { status: "skip"; reason: string }
  | { status: "invalid"; reason: string };
