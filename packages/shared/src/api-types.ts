import type {
  RuleCategory,
  SeverityBand,
  SeverityTier,
} from "./constants.js";

// ---- Findings ----
export interface FindingRecord {
  rule_id: string;
  indicator_id: string;
  category: RuleCategory;
  tier: SeverityTier;
  severity_score: number;
  severity_band: SeverityBand;
  source_unit: string;
  line: number;
  excerpt: string;
  rationale: string;
  low_confidence: boolean;
  anomaly: boolean;
}

// ---- Diagnostics ----
export type DiagnosticKind =
  | "unit-skipped"
  | "scorer-anomaly"
  | "scan-cancelled"
  | "source-failed";

export interface DiagnosticRecord {
  kind: DiagnosticKind;
  source_unit?: string;
  line?: number;
  message: string;
}

// ---- Report ----
export interface ReportDocument {
  engine_version: string;
  catalog_version: string;
  catalog_fingerprint: string;
  incomplete: boolean;
  summary: {
    total: number;
    by_severity_band: Record<SeverityBand, number>;
    by_category: Record<RuleCategory, number>;
  };
  findings: FindingRecord[];
  diagnostics: DiagnosticRecord[];
  scanned_units: string[];
  skipped_units: string[];
}
