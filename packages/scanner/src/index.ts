// Engine
export { scanUnit, scanUnits, scanSource } from "./engine/scanner.js";
export type { ScanOptions } from "./engine/scanner.js";
export { matchUnit, indicatorMatches } from "./engine/matcher.js";
export type { MatchOptions } from "./engine/matcher.js";
export { filterMatches } from "./engine/filter.js";
export type { FilterOptions } from "./engine/filter.js";
export {
  scoreMatches,
  scoreInBand,
  lookupBand,
  lowestBand,
  RUBRIC,
} from "./engine/scorer.js";
export type {
  ScoreOptions,
  ScoreResult,
  ScoringContext,
  RubricRow,
} from "./engine/scorer.js";
export { decodeUnit, makeExcerpt, ScanUnitError } from "./engine/source.js";
export {
  isCommentLine,
  isTestPath,
  hasFixtureSegment,
  isEntryPoint,
  findBlockHeader,
} from "./engine/context.js";
export type {
  SourceUnit,
  DecodedUnit,
  Match,
  Finding,
  Diagnostic,
  UnitResult,
} from "./engine/types.js";

// Report
export {
  PartialReport,
  aggregate,
  aggregateFindings,
  compareFindings,
} from "./report/aggregate.js";
export type { AggregateOptions } from "./report/aggregate.js";
export { Report } from "./report/report.js";
export type { ReportInit } from "./report/report.js";
export { formatReport } from "./report/format.js";
export type { FormatOptions } from "./report/format.js";

// Config & logging
export { EngineConfigSchema, resolveConfig } from "./config/config.js";
export type { EngineConfig, EngineConfigInput, LogLevel } from "./config/config.js";
export { createLogger, defaultLogger } from "./logging/logger.js";
export type { Logger, LoggerOptions } from "./logging/logger.js";
