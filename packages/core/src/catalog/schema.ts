import { z } from "zod";
import {
  CATALOG_FORMAT_VERSION,
  RULE_CATEGORIES,
  SCORING_FACTORS,
  SEVERITY_TIERS,
} from "@codeguard/shared";

const ruleIdRegex = /^[A-Z]{2,8}\d{3}$/;
const indicatorIdRegex = /^[A-Z]{2,8}\d{3}-[A-Z]$/;

export const CategoryEnum = z.enum(RULE_CATEGORIES);
export const TierEnum = z.enum(SEVERITY_TIERS);
export const FactorEnum = z.enum(SCORING_FACTORS);

const IndicatorBase = z.object({
  id: z.string().regex(indicatorIdRegex, "Must look like 'CRED001-A'"),
  name: z.string().min(1),
  weight: z.number().min(0).max(1),
  factor: FactorEnum,
});

export const KeywordIndicatorSchema = IndicatorBase.extend({
  kind: z.literal("keyword"),
  words: z.array(z.string().min(1)).min(1),
  case_sensitive: z.boolean().default(false),
}).strict();

export const PatternIndicatorSchema = IndicatorBase.extend({
  kind: z.literal("pattern"),
  pattern: z.string().min(1),
  ignore_case: z.boolean().default(false),
}).strict();

// Identifier matched case-insensitively, then a string literal on the same
// line or on one of the following look-around lines.
export const AssignmentIndicatorSchema = IndicatorBase.extend({
  kind: z.literal("assignment"),
  target: z.string().min(1),
}).strict();

export const CooccurrenceIndicatorSchema = IndicatorBase.extend({
  kind: z.literal("cooccurrence"),
  first: z.string().min(1),
  second: z.string().min(1),
  window: z.number().int().min(0).max(10).default(0),
}).strict();

export const UnguardedIndicatorSchema = IndicatorBase.extend({
  kind: z.literal("unguarded"),
  pattern: z.string().min(1),
  absent: z.string().min(1),
  within: z.number().int().min(0).max(20).default(5),
}).strict();

export const IndicatorSchema = z.discriminatedUnion("kind", [
  KeywordIndicatorSchema,
  PatternIndicatorSchema,
  AssignmentIndicatorSchema,
  CooccurrenceIndicatorSchema,
  UnguardedIndicatorSchema,
]);

export const RuleSchema = z
  .object({
    id: z.string().regex(ruleIdRegex, "Must look like 'CRED001'"),
    category: CategoryEnum,
    tier: TierEnum,
    title: z.string().min(1).max(120),
    summary: z.string().min(1).max(500),
    remediation: z.string().min(1),
    // Review prompts for humans; carried into report annotations only.
    guidance: z.array(z.string().min(1)).default([]),
    indicators: z.array(IndicatorSchema).min(1, "Rule needs at least one indicator"),
  })
  .strict();

export const CatalogDocumentSchema = z
  .object({
    catalog_version: z.literal(CATALOG_FORMAT_VERSION),
    name: z.string().min(1).max(100),
    description: z.string().optional(),
    rules: z.array(RuleSchema),
  })
  .strict();

export type CatalogDocument = z.infer<typeof CatalogDocumentSchema>;
export type RuleDocument = z.infer<typeof RuleSchema>;
export type IndicatorDocument = z.infer<typeof IndicatorSchema>;
export type KeywordIndicatorDocument = z.infer<typeof KeywordIndicatorSchema>;
export type PatternIndicatorDocument = z.infer<typeof PatternIndicatorSchema>;
export type AssignmentIndicatorDocument = z.infer<typeof AssignmentIndicatorSchema>;
export type CooccurrenceIndicatorDocument = z.infer<typeof CooccurrenceIndicatorSchema>;
export type UnguardedIndicatorDocument = z.infer<typeof UnguardedIndicatorSchema>;
