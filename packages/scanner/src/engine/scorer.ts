import { BAND_RANGES } from "@codeguard/shared";
import type { RuleCategory, ScoringFactor, SeverityBand } from "@codeguard/shared";
import type { RuleCatalog } from "@codeguard/core";
import type { DecodedUnit, Diagnostic, Finding, Match } from "./types.js";
import { isEntryPoint, isTestPath } from "./context.js";

export interface ScoreOptions {
  blockWindow: number;
  testSegments: readonly string[];
}

export interface ScoringContext {
  productionPath: boolean;
  entryPoint: boolean;
  lowConfidence: boolean;
}

export interface RubricRow {
  category: RuleCategory;
  factor: ScoringFactor;
  when?: (ctx: ScoringContext) => boolean;
  band: SeverityBand;
}

// First matching row wins.
export const RUBRIC: readonly RubricRow[] = [
  { category: "HardcodedCredentials", factor: "credential-literal", when: (c) => c.productionPath, band: "Critical" },
  { category: "HardcodedCredentials", factor: "credential-literal", band: "High" },
  { category: "SSLVerificationDisabled", factor: "verify-disabled", band: "Critical" },
  { category: "SSLVerificationDisabled", factor: "plain-http", band: "High" },
  { category: "InputValidationMissing", factor: "unvalidated-input", when: (c) => c.entryPoint, band: "Critical" },
  { category: "InputValidationMissing", factor: "unvalidated-input", band: "Medium" },
  { category: "InformationDisclosureInLogs", factor: "credential-in-log", band: "High" },
  { category: "InformationDisclosureInLogs", factor: "verbose-exception-log", band: "Medium" },
  { category: "InsufficientErrorHandling", factor: "bare-except", when: (c) => c.lowConfidence, band: "Low" },
  { category: "InsufficientErrorHandling", factor: "bare-except", band: "Medium" },
  { category: "InsufficientErrorHandling", factor: "missing-timeout", band: "Low" },
];

export function lookupBand(
  category: RuleCategory,
  factor: ScoringFactor,
  ctx: ScoringContext,
): SeverityBand | null {
  for (const row of RUBRIC) {
    if (row.category !== category || row.factor !== factor) continue;
    if (row.when && !row.when(ctx)) continue;
    return row.band;
  }
  return null;
}

export function lowestBand(category: RuleCategory): SeverityBand {
  let lowest: SeverityBand = "Low";
  let min = Number.POSITIVE_INFINITY;
  for (const row of RUBRIC) {
    if (row.category !== category) continue;
    if (BAND_RANGES[row.band].min < min) {
      min = BAND_RANGES[row.band].min;
      lowest = row.band;
    }
  }
  return lowest;
}

/** Higher confidence lands higher in the band. */
export function scoreInBand(band: SeverityBand, weight: number): number {
  const { min, max } = BAND_RANGES[band];
  const clamped = Math.min(1, Math.max(0, weight));
  return min + Math.round(clamped * (max - min));
}

export interface ScoreResult {
  findings: Finding[];
  diagnostics: Diagnostic[];
}

export function scoreMatches(
  matches: readonly Match[],
  unit: DecodedUnit,
  catalog: RuleCatalog,
  options: ScoreOptions,
): ScoreResult {
  const findings: Finding[] = [];
  const diagnostics: Diagnostic[] = [];
  const productionPath = !isTestPath(unit.id, options.testSegments);

  for (const match of matches) {
    const rule = catalog.rulesFor(match.category);
    const indicator = rule.indicators.find((i) => i.id === match.indicatorId);
    const ctx: ScoringContext = {
      productionPath,
      entryPoint:
        match.category === "InputValidationMissing" &&
        isEntryPoint(unit.lines, match.line - 1, options.blockWindow),
      lowConfidence: match.lowConfidence,
    };

    let band = lookupBand(match.category, match.factor, ctx);
    const anomaly = band === null;
    if (band === null) {
      band = lowestBand(match.category);
      diagnostics.push({
        kind: "scorer-anomaly",
        unit: unit.id,
        line: match.line,
        message: `No rubric entry for ${match.category}/${match.factor} (${match.indicatorId}); scored in ${band} band`,
      });
    }

    findings.push(
      Object.freeze({
        ruleId: match.ruleId,
        indicatorId: match.indicatorId,
        category: match.category,
        tier: rule.tier,
        score: scoreInBand(band, match.weight),
        band,
        unit: match.unit,
        line: match.line,
        excerpt: match.excerpt,
        rationale: `${indicator?.name ?? match.indicatorId}: ${rule.summary}`,
        lowConfidence: match.lowConfidence,
        anomaly,
      }),
    );
  }

  return { findings, diagnostics };
}
