import type {
  DiagnosticKind,
  RuleCategory,
  ScoringFactor,
  SeverityBand,
  SeverityTier,
} from "@codeguard/shared";

/** One scannable text artifact as handed over by the caller. */
export interface SourceUnit {
  id: string;
  content: string | Uint8Array;
}

export interface DecodedUnit {
  id: string;
  lines: string[];
}

export interface Match {
  ruleId: string;
  indicatorId: string;
  category: RuleCategory;
  factor: ScoringFactor;
  weight: number;
  unit: string;
  line: number;
  excerpt: string;
  lowConfidence: boolean;
}

export interface Finding {
  readonly ruleId: string;
  readonly indicatorId: string;
  readonly category: RuleCategory;
  readonly tier: SeverityTier;
  readonly score: number;
  readonly band: SeverityBand;
  readonly unit: string;
  readonly line: number;
  readonly excerpt: string;
  readonly rationale: string;
  readonly lowConfidence: boolean;
  readonly anomaly: boolean;
}

export interface Diagnostic {
  kind: DiagnosticKind;
  unit?: string;
  line?: number;
  message: string;
}

export interface UnitResult {
  unit: string;
  findings: Finding[];
  diagnostics: Diagnostic[];
}
