export {
  ENGINE_VERSION,
  CATALOG_FORMAT_VERSION,
  RULE_CATEGORIES,
  SEVERITY_TIERS,
  SEVERITY_BANDS,
  BAND_RANGES,
  SCORING_FACTORS,
  INDICATOR_KINDS,
  DEFAULT_LOOKAROUND,
  DEFAULT_BLOCK_WINDOW,
  DEFAULT_EXCERPT_LENGTH,
  FIXTURE_PATH_SEGMENTS,
  TEST_PATH_SEGMENTS,
  bandForScore,
} from "./constants.js";
export type {
  RuleCategory,
  SeverityTier,
  SeverityBand,
  ScoringFactor,
  IndicatorKind,
} from "./constants.js";

export type {
  FindingRecord,
  DiagnosticKind,
  DiagnosticRecord,
  ReportDocument,
} from "./api-types.js";
