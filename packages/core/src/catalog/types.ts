import type {
  RuleCategory,
  ScoringFactor,
  SeverityTier,
} from "@codeguard/shared";

interface IndicatorBase {
  id: string;
  name: string;
  weight: number;
  factor: ScoringFactor;
}

export interface KeywordIndicator extends IndicatorBase {
  kind: "keyword";
  regex: RegExp;
}

export interface PatternIndicator extends IndicatorBase {
  kind: "pattern";
  regex: RegExp;
}

export interface AssignmentIndicator extends IndicatorBase {
  kind: "assignment";
  /** `name = "literal"` on a single line. */
  inline: RegExp;
  /** `name = (` with the literal on a following line. */
  wrapped: RegExp;
}

export interface CooccurrenceIndicator extends IndicatorBase {
  kind: "cooccurrence";
  first: RegExp;
  second: RegExp;
  window: number;
}

export interface UnguardedIndicator extends IndicatorBase {
  kind: "unguarded";
  regex: RegExp;
  absent: RegExp;
  within: number;
}

export type Indicator =
  | KeywordIndicator
  | PatternIndicator
  | AssignmentIndicator
  | CooccurrenceIndicator
  | UnguardedIndicator;

export interface Rule {
  readonly id: string;
  readonly category: RuleCategory;
  readonly tier: SeverityTier;
  readonly title: string;
  readonly summary: string;
  readonly remediation: string;
  readonly guidance: readonly string[];
  readonly indicators: readonly Readonly<Indicator>[];
}
