import { readFileSync } from "node:fs";
import { createRequire } from "node:module";
import { RULE_CATEGORIES } from "@codeguard/shared";
import type { RuleCategory } from "@codeguard/shared";
import { CatalogDocumentSchema } from "./schema.js";
import type { CatalogDocument } from "./schema.js";
import { compileIndicator } from "./compile.js";
import { MalformedCatalogError } from "./errors.js";
import { RuleCatalog } from "./catalog.js";
import type { Indicator, Rule } from "./types.js";
import { fingerprint } from "../crypto/checksum.js";

export const DEFAULT_CATALOG_SPECIFIER = "@codeguard/core/catalog/security-rules.json";

function parseSource(source: unknown): unknown {
  if (typeof source !== "string") return source;
  try {
    return JSON.parse(source);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedCatalogError([`not valid JSON (${reason})`]);
  }
}

function validateDocument(raw: unknown): CatalogDocument {
  const result = CatalogDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new MalformedCatalogError(
      result.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${path}: ${issue.message}`;
      }),
    );
  }
  return result.data;
}

/**
 * Builds a RuleCatalog from a JSON string or an already-parsed document.
 *
 * The document must hold exactly one rule for each of the five categories.
 * Anything outside the schema, including free-text directives, is rejected
 * rather than interpreted.
 */
export function loadCatalog(source: unknown): RuleCatalog {
  const doc = validateDocument(parseSource(source));
  const issues: string[] = [];
  const rules = new Map<RuleCategory, Rule>();
  const seenRuleIds = new Set<string>();
  const seenIndicatorIds = new Set<string>();

  for (const ruleDoc of doc.rules) {
    if (rules.has(ruleDoc.category)) {
      issues.push(`duplicate category ${ruleDoc.category} (rule ${ruleDoc.id})`);
      continue;
    }
    if (seenRuleIds.has(ruleDoc.id)) {
      issues.push(`duplicate rule id ${ruleDoc.id}`);
      continue;
    }
    seenRuleIds.add(ruleDoc.id);

    const indicators: Indicator[] = [];
    for (const indicatorDoc of ruleDoc.indicators) {
      if (seenIndicatorIds.has(indicatorDoc.id)) {
        issues.push(`duplicate indicator id ${indicatorDoc.id}`);
        continue;
      }
      seenIndicatorIds.add(indicatorDoc.id);
      const compiled = compileIndicator(indicatorDoc, issues);
      if (compiled) indicators.push(compiled);
    }

    rules.set(ruleDoc.category, {
      id: ruleDoc.id,
      category: ruleDoc.category,
      tier: ruleDoc.tier,
      title: ruleDoc.title,
      summary: ruleDoc.summary,
      remediation: ruleDoc.remediation,
      guidance: [...ruleDoc.guidance],
      indicators,
    });
  }

  for (const category of RULE_CATEGORIES) {
    if (!rules.has(category)) issues.push(`missing category ${category}`);
  }

  if (issues.length > 0) throw new MalformedCatalogError(issues);

  return new RuleCatalog(doc.name, doc.catalog_version, fingerprint(doc), rules);
}

export function readCatalogFile(path: string): RuleCatalog {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedCatalogError([`cannot read ${path} (${reason})`]);
  }
  return loadCatalog(text);
}

/** The catalog shipped with this package. */
export function loadDefaultCatalog(): RuleCatalog {
  const require = createRequire(import.meta.url);
  return readCatalogFile(require.resolve(DEFAULT_CATALOG_SPECIFIER));
}
