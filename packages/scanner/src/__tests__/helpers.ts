import { readFileSync } from "node:fs";
import { createRequire } from "node:module";
import pino from "pino";
import {
  CatalogDocumentSchema,
  DEFAULT_CATALOG_SPECIFIER,
  loadDefaultCatalog,
} from "@codeguard/core";
import type { CatalogDocument, RuleCatalog } from "@codeguard/core";
import { resolveConfig } from "../config/config.js";
import type { EngineConfig } from "../config/config.js";
import { decodeUnit } from "../engine/source.js";
import type { DecodedUnit } from "../engine/types.js";

export const catalog: RuleCatalog = loadDefaultCatalog();

export const config: EngineConfig = resolveConfig({ concurrency: 2 }, {});

export const silentLogger = pino({ level: "silent" });

export function unit(id: string, ...lines: string[]): DecodedUnit {
  return decodeUnit({ id, content: lines.join("\n") });
}

/** Fresh, mutable copy of the bundled catalog document. */
export function defaultDocument(): CatalogDocument {
  const require = createRequire(import.meta.url);
  const text = readFileSync(require.resolve(DEFAULT_CATALOG_SPECIFIER), "utf-8");
  return CatalogDocumentSchema.parse(JSON.parse(text));
}
