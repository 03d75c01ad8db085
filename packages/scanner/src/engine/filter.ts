import type { RuleCatalog } from "@codeguard/core";
import type { DecodedUnit, Match } from "./types.js";
import {
  assignsPlaceholder,
  findBlockHeader,
  hasDifferentiatedHandler,
  hasFixtureSegment,
  isCommentLine,
} from "./context.js";

export interface FilterOptions {
  blockWindow: number;
  fixtureSegments: readonly string[];
}

function compareMatches(a: Match, b: Match): number {
  if (a.line !== b.line) return a.line - b.line;
  if (a.ruleId !== b.ruleId) return a.ruleId < b.ruleId ? -1 : 1;
  if (a.indicatorId !== b.indicatorId) return a.indicatorId < b.indicatorId ? -1 : 1;
  return 0;
}

function isSuppressed(match: Match, line: string): boolean {
  if (isCommentLine(line)) return true;
  return match.category === "HardcodedCredentials" && assignsPlaceholder(line);
}

// A broad catch counts as corroborated only inside a recognisable function
// block that has no type-specific handler next to it.
function tagBroadCatch(match: Match, unit: DecodedUnit, blockWindow: number): Match {
  if (match.factor !== "bare-except") return match;
  const index = match.line - 1;
  const inBlock = findBlockHeader(unit.lines, index, blockWindow) !== -1;
  const differentiated = hasDifferentiatedHandler(unit.lines, index, blockWindow);
  return { ...match, lowConfidence: !inBlock || differentiated };
}

/**
 * Narrows raw matches: drops comment lines, documentation/fixture paths and
 * placeholder credentials, tags uncorroborated broad catches as low
 * confidence, and keeps one match per (rule, line) with the highest weight.
 * Equal weights go to the indicator listed first in the catalog. Output is
 * sorted by line, then rule id.
 */
export function filterMatches(
  matches: readonly Match[],
  unit: DecodedUnit,
  catalog: RuleCatalog,
  options: FilterOptions,
): Match[] {
  const rank = (m: Match): number => catalog.indicatorRank(m.ruleId, m.indicatorId);

  if (hasFixtureSegment(unit.id, options.fixtureSegments)) return [];

  const best = new Map<string, Match>();
  for (const raw of matches) {
    const line = unit.lines[raw.line - 1] ?? "";
    if (isSuppressed(raw, line)) continue;

    const match = tagBroadCatch(raw, unit, options.blockWindow);
    const key = `${match.ruleId}\u0000${match.line}`;
    const current = best.get(key);
    if (
      !current ||
      match.weight > current.weight ||
      (match.weight === current.weight && rank(match) < rank(current))
    ) {
      best.set(key, match);
    }
  }

  return [...best.values()].sort(compareMatches);
}
