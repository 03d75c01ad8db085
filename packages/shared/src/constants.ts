export const ENGINE_VERSION = "0.1.0";
export const CATALOG_FORMAT_VERSION = "1.0" as const;

// Canonical order: report sections and catalog iteration both follow it.
export const RULE_CATEGORIES = [
  "HardcodedCredentials",
  "SSLVerificationDisabled",
  "InputValidationMissing",
  "InformationDisclosureInLogs",
  "InsufficientErrorHandling",
] as const;

export type RuleCategory = (typeof RULE_CATEGORIES)[number];

export const SEVERITY_TIERS = ["HIGH", "MEDIUM", "LOW"] as const;

export type SeverityTier = (typeof SEVERITY_TIERS)[number];

export const SEVERITY_BANDS = ["Critical", "High", "Medium", "Low"] as const;

export type SeverityBand = (typeof SEVERITY_BANDS)[number];

export const BAND_RANGES: Record<SeverityBand, { min: number; max: number }> = {
  Critical: { min: 9, max: 10 },
  High: { min: 7, max: 8 },
  Medium: { min: 4, max: 6 },
  Low: { min: 1, max: 3 },
};

export const SCORING_FACTORS = [
  "credential-literal",
  "verify-disabled",
  "plain-http",
  "unvalidated-input",
  "credential-in-log",
  "verbose-exception-log",
  "bare-except",
  "missing-timeout",
] as const;

export type ScoringFactor = (typeof SCORING_FACTORS)[number];

export const INDICATOR_KINDS = [
  "keyword",
  "pattern",
  "assignment",
  "cooccurrence",
  "unguarded",
] as const;

export type IndicatorKind = (typeof INDICATOR_KINDS)[number];

export const DEFAULT_LOOKAROUND = 2;
export const DEFAULT_BLOCK_WINDOW = 8;
export const DEFAULT_EXCERPT_LENGTH = 200;

export const FIXTURE_PATH_SEGMENTS = [
  "docs",
  "doc",
  "examples",
  "example",
  "fixtures",
  "__fixtures__",
  "testdata",
  "samples",
] as const;

export const TEST_PATH_SEGMENTS = [
  "test",
  "tests",
  "__tests__",
  "spec",
  "mocks",
  "__mocks__",
] as const;

export function bandForScore(score: number): SeverityBand {
  for (const band of SEVERITY_BANDS) {
    const { min, max } = BAND_RANGES[band];
    if (score >= min && score <= max) return band;
  }
  throw new RangeError(`Score out of range: ${score}`);
}
