import { ENGINE_VERSION } from "@codeguard/shared";
import type {
  ReportDocument,
  RuleCategory,
  SeverityBand,
} from "@codeguard/shared";
import type { Diagnostic, Finding } from "../engine/types.js";

export interface ReportInit {
  findings: Finding[];
  diagnostics: Diagnostic[];
  scannedUnits: string[];
  skippedUnits: string[];
  incomplete: boolean;
  catalogVersion: string;
  catalogFingerprint: string;
}

/** Result of one scan. Findings are already in canonical order. */
export class Report {
  readonly diagnostics: readonly Diagnostic[];
  readonly scannedUnits: readonly string[];
  readonly skippedUnits: readonly string[];
  readonly incomplete: boolean;
  readonly catalogVersion: string;
  readonly catalogFingerprint: string;
  readonly engineVersion = ENGINE_VERSION;
  private readonly ordered: readonly Finding[];

  constructor(init: ReportInit) {
    this.ordered = Object.freeze([...init.findings]);
    this.diagnostics = Object.freeze([...init.diagnostics]);
    this.scannedUnits = Object.freeze([...init.scannedUnits]);
    this.skippedUnits = Object.freeze([...init.skippedUnits]);
    this.incomplete = init.incomplete;
    this.catalogVersion = init.catalogVersion;
    this.catalogFingerprint = init.catalogFingerprint;
  }

  findings(): readonly Finding[] {
    return this.ordered;
  }

  get total(): number {
    return this.ordered.length;
  }

  countBySeverityBand(): Record<SeverityBand, number> {
    const counts: Record<SeverityBand, number> = {
      Critical: 0,
      High: 0,
      Medium: 0,
      Low: 0,
    };
    for (const finding of this.ordered) counts[finding.band]++;
    return counts;
  }

  countByCategory(): Record<RuleCategory, number> {
    const counts: Record<RuleCategory, number> = {
      HardcodedCredentials: 0,
      SSLVerificationDisabled: 0,
      InputValidationMissing: 0,
      InformationDisclosureInLogs: 0,
      InsufficientErrorHandling: 0,
    };
    for (const finding of this.ordered) counts[finding.category]++;
    return counts;
  }

  toJSON(): ReportDocument {
    return {
      engine_version: this.engineVersion,
      catalog_version: this.catalogVersion,
      catalog_fingerprint: this.catalogFingerprint,
      incomplete: this.incomplete,
      summary: {
        total: this.total,
        by_severity_band: this.countBySeverityBand(),
        by_category: this.countByCategory(),
      },
      findings: this.ordered.map((f) => ({
        rule_id: f.ruleId,
        indicator_id: f.indicatorId,
        category: f.category,
        tier: f.tier,
        severity_score: f.score,
        severity_band: f.band,
        source_unit: f.unit,
        line: f.line,
        excerpt: f.excerpt,
        rationale: f.rationale,
        low_confidence: f.lowConfidence,
        anomaly: f.anomaly,
      })),
      diagnostics: this.diagnostics.map((d) => ({
        kind: d.kind,
        ...(d.unit !== undefined ? { source_unit: d.unit } : {}),
        ...(d.line !== undefined ? { line: d.line } : {}),
        message: d.message,
      })),
      scanned_units: [...this.scannedUnits],
      skipped_units: [...this.skippedUnits],
    };
  }
}
