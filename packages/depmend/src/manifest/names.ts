import type { Ecosystem } from "@depmend/core";

/** PEP 503 normalization: lowercase, runs of `-`, `_`, `.` become `-` */
export function normalizePythonName(name: string): string {
  return name.trim().toLowerCase().replace(/[-_.]+/g, "-");
}

/** Normalize a package or module name for matching within an ecosystem */
export function normalizeName(ecosystem: Ecosystem, name: string): string {
  return ecosystem === "python" ? normalizePythonName(name) : name.trim();
}
