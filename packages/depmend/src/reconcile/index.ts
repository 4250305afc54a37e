/**
 * Reconciler: declared entries against discovered usage, and against each other.
 * Pure; performs no I/O.
 */

import { minimatch } from "minimatch";

import {
  type DependencyEntry,
  type Ecosystem,
  entriesOf,
  type Finding,
  FindingBuilder,
  FINDING_KIND_ORDER,
  type ManifestDocument,
  type UsageRecord,
} from "@depmend/core";

import type { EngineConfig } from "../core/loader.js";
import { builtinModuleAliases } from "../data.js";
import { normalizeName } from "../manifest/names.js";
import {
  compareNarrowness,
  intersect,
  isBelow,
  isEmpty,
  narrowness,
  parseEntrySpecifier,
  parseVersion,
  type VersionRange,
} from "../versions/index.js";

/** The configuration slice the reconciler reads */
export type ReconcileOptions = Pick<
  EngineConfig,
  "freshnessReference" | "exemptKinds" | "exemptPackages" | "exemptSections" | "aliases"
>;

const ECOSYSTEMS: readonly Ecosystem[] = ["python", "node"];

/**
 * The manifest missing dependencies are added to: the shallowest path,
 * then alphabetical.
 */
export function primaryManifest(documents: readonly ManifestDocument[]): ManifestDocument | null {
  const sorted = [...documents].sort((a, b) => {
    const depth = a.path.split("/").length - b.path.split("/").length;
    return depth !== 0 ? depth : a.path.localeCompare(b.path);
  });
  return sorted.length > 0 ? sorted[0] : null;
}

/** Import-name to distribution-name lookup for an ecosystem, config over built-ins */
function aliasTable(ecosystem: Ecosystem, options: ReconcileOptions): Map<string, string> {
  const table = new Map<string, string>(ecosystem === "python" ? builtinModuleAliases() : []);
  for (const [moduleName, distribution] of Object.entries(options.aliases)) {
    table.set(normalizeName(ecosystem, moduleName), normalizeName(ecosystem, distribution));
  }
  return table;
}

function isExempt(entry: DependencyEntry, options: ReconcileOptions): boolean {
  if (entry.kind === "editable" || entry.kind === "file-reference") return true;
  if (options.exemptSections.includes(entry.section)) return true;
  return options.exemptPackages.some(
    (pattern) => minimatch(entry.name, pattern) || minimatch(entry.displayName, pattern)
  );
}

function describeUsages(usages: readonly UsageRecord[]): string {
  const first = usages[0];
  const more = usages.length > 1 ? ` and ${usages.length - 1} more` : "";
  return `${first.filePath}:${first.lineNumber}${more}`;
}

function location(entry: DependencyEntry): string {
  return `${entry.manifestPath}:${entry.sourceSpan.startLine}`;
}

function reconcileEcosystem(
  ecosystem: Ecosystem,
  documents: readonly ManifestDocument[],
  usages: readonly UsageRecord[],
  options: ReconcileOptions
): Finding[] {
  const findings: Finding[] = [];
  const entries = documents.flatMap(entriesOf);
  const aliases = aliasTable(ecosystem, options);

  const declared = new Set(entries.map((entry) => entry.name));
  const usagesByName = new Map<string, UsageRecord[]>();
  const usedNames = new Set<string>();
  for (const usage of usages) {
    const distribution = aliases.get(usage.moduleName) ?? usage.moduleName;
    usedNames.add(distribution);
    usedNames.add(usage.moduleName);
    const namespaced = (usage.namespaceCandidates ?? []).filter((name) => declared.has(name));
    namespaced.forEach((name) => usedNames.add(name));
    const key =
      namespaced.length > 0 ? namespaced[0] : declared.has(usage.moduleName) ? usage.moduleName : distribution;
    const list = usagesByName.get(key) ?? [];
    list.push(usage);
    usagesByName.set(key, list);
  }

  // Unused
  for (const entry of entries) {
    if (usedNames.has(entry.name) || isExempt(entry, options)) continue;
    findings.push(
      FindingBuilder.create({
        kind: "unused",
        subjectName: entry.name,
        message: `${entry.displayName} is declared at ${location(entry)} but never imported`,
        target: entry.manifestPath,
        ecosystem,
        entries: [entry],
      })
    );
  }

  // Missing
  const primary = primaryManifest(documents);
  if (primary) {
    for (const [name, records] of usagesByName) {
      if (declared.has(name)) continue;
      findings.push(
        FindingBuilder.create({
          kind: "missing",
          subjectName: name,
          message: `${name} is imported at ${describeUsages(records)} but not declared`,
          target: primary.path,
          ecosystem,
          usages: records,
        })
      );
    }
  }

  // Unparseable, and ranges for the rest
  const ranges = new Map<DependencyEntry, VersionRange>();
  for (const entry of entries) {
    const parsed = parseEntrySpecifier(entry);
    if (parsed.status === "range") {
      ranges.set(entry, parsed.range);
    } else if (parsed.status === "invalid") {
      findings.push(
        FindingBuilder.create({
          kind: "unparseable",
          subjectName: entry.name,
          message: `${entry.displayName} at ${location(entry)} has an unparseable specifier "${entry.rawSpecifier}": ${parsed.reason}`,
          target: entry.manifestPath,
          ecosystem,
          entries: [entry],
        })
      );
    }
  }

  // Conflicting
  const conflicted = new Set<DependencyEntry>();
  const byName = new Map<string, DependencyEntry[]>();
  for (const entry of ranges.keys()) {
    const group = byName.get(entry.name) ?? [];
    group.push(entry);
    byName.set(entry.name, group);
  }
  for (const [name, group] of byName) {
    if (group.length < 2) continue;
    const combined = group.reduce<VersionRange | null>((acc, entry) => {
      const range = ranges.get(entry);
      if (!range) return acc;
      return acc === null ? range : intersect(acc, range);
    }, null);
    if (combined === null || !isEmpty(combined)) continue;

    let narrower = group[0];
    for (const entry of group) {
      const current = ranges.get(entry);
      const best = ranges.get(narrower);
      // Ties go to the later-declared entry
      if (current && best && compareNarrowness(narrowness(current), narrowness(best)) <= 0) {
        narrower = entry;
      }
    }
    group.forEach((entry) => conflicted.add(entry));
    findings.push(
      FindingBuilder.create({
        kind: "conflicting",
        subjectName: name,
        message: `${narrower.displayName} has incompatible constraints: ${group
          .map((entry) => `"${entry.rawSpecifier}" (${location(entry)})`)
          .join(", ")}`,
        target: narrower.manifestPath,
        ecosystem,
        entries: group,
        narrower,
      })
    );
  }

  // Outdated
  const references = new Map<string, string>();
  for (const [name, version] of Object.entries(options.freshnessReference)) {
    references.set(normalizeName(ecosystem, name), version);
  }
  for (const [entry, range] of ranges) {
    if (conflicted.has(entry)) continue;
    const reference = references.get(entry.name);
    const version = reference === undefined ? null : parseVersion(reference);
    if (!version || !isBelow(range, version)) continue;
    findings.push(
      FindingBuilder.create({
        kind: "outdated",
        subjectName: entry.name,
        message: `${entry.displayName} "${entry.rawSpecifier}" at ${location(entry)} is older than ${version.raw}`,
        target: entry.manifestPath,
        ecosystem,
        entries: [entry],
      })
    );
  }

  return findings;
}

function firstLocation(finding: Finding): string {
  const entry = finding.evidence.entries[0];
  if (entry) {
    return `${entry.manifestPath}\u0000${String(entry.sourceSpan.startLine).padStart(8, "0")}`;
  }
  return finding.target;
}

/** Fixed report order: kind, then subject name, then manifest path and line */
export function compareFindings(a: Finding, b: Finding): number {
  const kind = FINDING_KIND_ORDER.indexOf(a.kind) - FINDING_KIND_ORDER.indexOf(b.kind);
  if (kind !== 0) return kind;
  if (a.subjectName !== b.subjectName) return a.subjectName < b.subjectName ? -1 : 1;
  const locationA = firstLocation(a);
  const locationB = firstLocation(b);
  if (locationA !== locationB) return locationA < locationB ? -1 : 1;
  return 0;
}

/**
 * Classify discrepancies between manifests and usage.
 * Documents are expected in a stable order (the pipeline sorts them by path);
 * "later-declared" follows that order and then line numbers.
 */
export function reconcile(
  documents: readonly ManifestDocument[],
  usages: readonly UsageRecord[],
  options: ReconcileOptions
): Finding[] {
  const findings = ECOSYSTEMS.flatMap((ecosystem) =>
    reconcileEcosystem(
      ecosystem,
      documents.filter((document) => document.ecosystem === ecosystem),
      usages.filter((usage) => usage.ecosystem === ecosystem),
      options
    )
  );
  return findings
    .filter((finding) => !options.exemptKinds.includes(finding.kind))
    .sort(compareFindings);
}
