// Catalog
export {
  CatalogDocumentSchema,
  RuleSchema,
  IndicatorSchema,
  KeywordIndicatorSchema,
  PatternIndicatorSchema,
  AssignmentIndicatorSchema,
  CooccurrenceIndicatorSchema,
  UnguardedIndicatorSchema,
  CategoryEnum,
  TierEnum,
  FactorEnum,
} from "./catalog/schema.js";
export type {
  CatalogDocument,
  RuleDocument,
  IndicatorDocument,
} from "./catalog/schema.js";
export type {
  Rule,
  Indicator,
  KeywordIndicator,
  PatternIndicator,
  AssignmentIndicator,
  CooccurrenceIndicator,
  UnguardedIndicator,
} from "./catalog/types.js";
export { RuleCatalog } from "./catalog/catalog.js";
export { MalformedCatalogError } from "./catalog/errors.js";
export { LEADING_STRING_LITERAL } from "./catalog/compile.js";
export {
  loadCatalog,
  readCatalogFile,
  loadDefaultCatalog,
  DEFAULT_CATALOG_SPECIFIER,
} from "./catalog/load.js";

// Crypto
export { sha256, canonicalJson, fingerprint } from "./crypto/checksum.js";
