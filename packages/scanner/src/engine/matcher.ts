import { LEADING_STRING_LITERAL } from "@codeguard/core";
import type { Indicator, Rule, RuleCatalog } from "@codeguard/core";
import type { DecodedUnit, Match } from "./types.js";
import { makeExcerpt } from "./source.js";

export interface MatchOptions {
  lookaround: number;
  maxExcerptLength: number;
}

function anyLineIn(
  lines: readonly string[],
  from: number,
  to: number,
  regex: RegExp,
): boolean {
  const start = Math.max(0, from);
  const end = Math.min(lines.length - 1, to);
  for (let i = start; i <= end; i++) {
    if (regex.test(lines[i])) return true;
  }
  return false;
}

function literalFollows(lines: readonly string[], index: number, lookaround: number): boolean {
  const end = Math.min(lines.length - 1, index + lookaround);
  for (let i = index + 1; i <= end; i++) {
    if (lines[i].trim() === "") continue;
    return LEADING_STRING_LITERAL.test(lines[i]);
  }
  return false;
}

export function indicatorMatches(
  indicator: Readonly<Indicator>,
  lines: readonly string[],
  index: number,
  lookaround: number,
): boolean {
  const line = lines[index];
  switch (indicator.kind) {
    case "keyword":
    case "pattern":
      return indicator.regex.test(line);
    case "assignment":
      if (indicator.inline.test(line)) return true;
      return indicator.wrapped.test(line) && literalFollows(lines, index, lookaround);
    case "cooccurrence":
      return (
        indicator.first.test(line) &&
        anyLineIn(lines, index - indicator.window, index + indicator.window, indicator.second)
      );
    case "unguarded":
      return (
        indicator.regex.test(line) &&
        !anyLineIn(lines, index, index + indicator.within, indicator.absent)
      );
  }
}

function matchRule(rule: Rule, unit: DecodedUnit, options: MatchOptions, out: Match[]): void {
  for (const indicator of rule.indicators) {
    for (let index = 0; index < unit.lines.length; index++) {
      if (!indicatorMatches(indicator, unit.lines, index, options.lookaround)) continue;
      out.push({
        ruleId: rule.id,
        indicatorId: indicator.id,
        category: rule.category,
        factor: indicator.factor,
        weight: indicator.weight,
        unit: unit.id,
        line: index + 1,
        excerpt: makeExcerpt(unit.lines[index], options.maxExcerptLength),
        lowConfidence: false,
      });
    }
  }
}

/**
 * Raw matches for every indicator of every rule, in catalog order. Overlapping
 * indicators on one line each yield their own match.
 */
export function matchUnit(unit: DecodedUnit, catalog: RuleCatalog, options: MatchOptions): Match[] {
  const matches: Match[] = [];
  for (const rule of catalog.allRules()) {
    matchRule(rule, unit, options, matches);
  }
  return matches;
}
