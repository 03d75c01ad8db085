import type { RuleCatalog } from "@codeguard/core";
import type { Diagnostic, Finding } from "../engine/types.js";
import { Report } from "./report.js";

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Canonical order: score desc, then unit, line, rule id, indicator id ascending. */
export function compareFindings(a: Finding, b: Finding): number {
  if (a.score !== b.score) return b.score - a.score;
  return (
    compareStrings(a.unit, b.unit) ||
    a.line - b.line ||
    compareStrings(a.ruleId, b.ruleId) ||
    compareStrings(a.indicatorId, b.indicatorId)
  );
}

export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return (
    compareStrings(a.unit ?? "", b.unit ?? "") ||
    (a.line ?? 0) - (b.line ?? 0) ||
    compareStrings(a.kind, b.kind) ||
    compareStrings(a.message, b.message)
  );
}

/**
 * Per-worker accumulator. Workers never share one; partials are merged once
 * all workers finish, and `merge` is commutative and associative.
 */
export class PartialReport {
  private readonly findingList: Finding[] = [];
  private readonly diagnosticList: Diagnostic[] = [];
  private readonly scanned = new Set<string>();
  private readonly skipped = new Set<string>();

  addUnit(unitId: string, findings: readonly Finding[], diagnostics: readonly Diagnostic[] = []): this {
    this.scanned.add(unitId);
    this.findingList.push(...findings);
    this.diagnosticList.push(...diagnostics);
    return this;
  }

  addSkipped(unitId: string, diagnostic: Diagnostic): this {
    this.skipped.add(unitId);
    this.diagnosticList.push(diagnostic);
    return this;
  }

  addDiagnostic(diagnostic: Diagnostic): this {
    this.diagnosticList.push(diagnostic);
    return this;
  }

  merge(other: PartialReport): PartialReport {
    const merged = new PartialReport();
    for (const part of [this, other]) {
      merged.findingList.push(...part.findingList);
      merged.diagnosticList.push(...part.diagnosticList);
      for (const id of part.scanned) merged.scanned.add(id);
      for (const id of part.skipped) merged.skipped.add(id);
    }
    return merged;
  }

  get findings(): readonly Finding[] {
    return this.findingList;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.diagnosticList;
  }

  get scannedUnits(): ReadonlySet<string> {
    return this.scanned;
  }

  get skippedUnits(): ReadonlySet<string> {
    return this.skipped;
  }
}

export interface AggregateOptions {
  catalog: RuleCatalog;
  incomplete?: boolean;
}

export function aggregate(partials: Iterable<PartialReport>, options: AggregateOptions): Report {
  let combined = new PartialReport();
  for (const partial of partials) combined = combined.merge(partial);

  return new Report({
    findings: [...combined.findings].sort(compareFindings),
    diagnostics: [...combined.diagnostics].sort(compareDiagnostics),
    scannedUnits: [...combined.scannedUnits].sort(compareStrings),
    skippedUnits: [...combined.skippedUnits].sort(compareStrings),
    incomplete: options.incomplete ?? false,
    catalogVersion: options.catalog.version,
    catalogFingerprint: options.catalog.fingerprint,
  });
}

/** Single-stream form: findings from any number of units, in any order. */
export function aggregateFindings(findings: Iterable<Finding>, options: AggregateOptions): Report {
  const partial = new PartialReport();
  for (const finding of findings) partial.addUnit(finding.unit, [finding]);
  return aggregate([partial], options);
}
