import { RULE_CATEGORIES } from "@codeguard/shared";
import type { RuleCategory } from "@codeguard/shared";
import type { Rule } from "./types.js";

/**
 * Immutable set of rules, one per category. Built by `loadCatalog` and passed
 * explicitly to every scan; there is no process-wide instance.
 */
export class RuleCatalog {
  readonly name: string;
  readonly version: string;
  readonly fingerprint: string;
  private readonly byCategory: ReadonlyMap<RuleCategory, Rule>;
  private readonly ordered: readonly Rule[];

  constructor(
    name: string,
    version: string,
    fingerprint: string,
    rules: Map<RuleCategory, Rule>,
  ) {
    this.name = name;
    this.version = version;
    this.fingerprint = fingerprint;

    const ordered: Rule[] = [];
    for (const category of RULE_CATEGORIES) {
      const rule = rules.get(category);
      if (!rule) throw new Error(`No rule for category ${category}`);
      ordered.push(deepFreezeRule(rule));
    }
    this.ordered = Object.freeze(ordered);
    this.byCategory = new Map(ordered.map((rule) => [rule.category, rule]));
    Object.freeze(this);
  }

  rulesFor(category: RuleCategory): Rule {
    const rule = this.byCategory.get(category);
    if (!rule) throw new Error(`No rule for category ${category}`);
    return rule;
  }

  allRules(): readonly Rule[] {
    return this.ordered;
  }

  ruleById(id: string): Rule | undefined {
    return this.ordered.find((rule) => rule.id === id);
  }

  /** Position of an indicator within its rule; used as a stable tie-breaker. */
  indicatorRank(ruleId: string, indicatorId: string): number {
    const rule = this.ruleById(ruleId);
    if (!rule) return Number.MAX_SAFE_INTEGER;
    const idx = rule.indicators.findIndex((i) => i.id === indicatorId);
    return idx === -1 ? Number.MAX_SAFE_INTEGER : idx;
  }
}

function deepFreezeRule(rule: Rule): Rule {
  for (const indicator of rule.indicators) Object.freeze(indicator);
  Object.freeze(rule.indicators);
  Object.freeze(rule.guidance);
  return Object.freeze(rule);
}
