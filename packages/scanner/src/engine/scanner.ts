import type { RuleCatalog } from "@codeguard/core";
import { resolveConfig } from "../config/config.js";
import type { EngineConfig, EngineConfigInput } from "../config/config.js";
import { defaultLogger } from "../logging/logger.js";
import type { Logger } from "../logging/logger.js";
import { PartialReport, aggregate } from "../report/aggregate.js";
import type { Report } from "../report/report.js";
import { filterMatches } from "./filter.js";
import { matchUnit } from "./matcher.js";
import { scoreMatches } from "./scorer.js";
import { ScanUnitError, decodeUnit } from "./source.js";
import type { SourceUnit, UnitResult } from "./types.js";

export interface ScanOptions {
  config?: EngineConfigInput;
  logger?: Logger;
  /** Checked between units; an aborted scan returns an incomplete report. */
  signal?: AbortSignal;
}

/**
 * Match, filter and score a single unit. Throws ScanUnitError when the content
 * is not text.
 */
export function scanUnit(unit: SourceUnit, catalog: RuleCatalog, config: EngineConfig): UnitResult {
  const decoded = decodeUnit(unit);
  const raw = matchUnit(decoded, catalog, config);
  const filtered = filterMatches(raw, decoded, catalog, config);
  const { findings, diagnostics } = scoreMatches(filtered, decoded, catalog, config);
  return { unit: unit.id, findings, diagnostics };
}

type Pull = () => Promise<IteratorResult<SourceUnit>>;

function isAsyncIterable<T>(value: Iterable<T> | AsyncIterable<T>): value is AsyncIterable<T> {
  return Symbol.asyncIterator in value;
}

// Workers pull from one shared iterator; async pulls are chained so a source
// that cannot handle overlapping next() calls still sees them one at a time.
function createPull(units: Iterable<SourceUnit> | AsyncIterable<SourceUnit>): Pull {
  if (isAsyncIterable(units)) {
    const iterator = units[Symbol.asyncIterator]();
    let tail: Promise<unknown> = Promise.resolve();
    return () => {
      const next = tail.then(() => iterator.next());
      tail = next.catch(() => undefined);
      return next;
    };
  }
  const iterator = units[Symbol.iterator]();
  return async () => iterator.next();
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

type WorkerStop = "exhausted" | "cancelled" | "source-failed";

interface WorkerOutcome {
  partial: PartialReport;
  stop: WorkerStop;
}

async function runWorker(
  pull: Pull,
  catalog: RuleCatalog,
  config: EngineConfig,
  logger: Logger,
  signal: AbortSignal | undefined,
): Promise<WorkerOutcome> {
  const partial = new PartialReport();

  for (;;) {
    if (signal?.aborted) return { partial, stop: "cancelled" };

    let next: IteratorResult<SourceUnit>;
    try {
      next = await pull();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ err }, `Source failed; no further units will be scanned: ${message}`);
      partial.addDiagnostic({ kind: "source-failed", message: `Source failed: ${message}` });
      return { partial, stop: "source-failed" };
    }
    if (next.done) return { partial, stop: "exhausted" };
    // A unit fetched after cancellation is dropped unprocessed.
    if (signal?.aborted) return { partial, stop: "cancelled" };

    const unit = next.value;
    try {
      const result = scanUnit(unit, catalog, config);
      partial.addUnit(unit.id, result.findings, result.diagnostics);
      for (const d of result.diagnostics) {
        logger.warn({ unit: unit.id, line: d.line }, d.message);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (err instanceof ScanUnitError) {
        logger.warn({ unit: unit.id }, `Skipping unit: ${message}`);
      } else {
        logger.error({ unit: unit.id, err }, `Unexpected failure scanning unit: ${message}`);
      }
      partial.addSkipped(unit.id, { kind: "unit-skipped", unit: unit.id, message });
    }

    await yieldToEventLoop();
  }
}

/**
 * Scan any number of source units with a bounded pool of workers. Each worker
 * keeps its own partial report; the partials are merged and sorted once all
 * workers stop, so the result does not depend on completion order.
 */
export async function scanUnits(
  units: Iterable<SourceUnit> | AsyncIterable<SourceUnit>,
  catalog: RuleCatalog,
  options: ScanOptions = {},
): Promise<Report> {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? defaultLogger(config.logLevel);
  const pull = createPull(units);

  const outcomes = await Promise.all(
    Array.from({ length: config.concurrency }, () =>
      runWorker(pull, catalog, config, logger, options.signal),
    ),
  );

  const cancelled = outcomes.some((o) => o.stop === "cancelled");
  const sourceFailed = outcomes.some((o) => o.stop === "source-failed");
  const partials = outcomes.map((o) => o.partial);
  if (cancelled) {
    logger.info("Scan cancelled; reporting completed units only");
    partials.push(
      new PartialReport().addDiagnostic({
        kind: "scan-cancelled",
        message: "Scan cancelled before all units were processed",
      }),
    );
  }

  const report = aggregate(partials, { catalog, incomplete: cancelled || sourceFailed });
  logger.debug(
    { units: report.scannedUnits.length, skipped: report.skippedUnits.length, findings: report.total },
    "Scan finished",
  );
  return report;
}

/** Scan one in-memory snippet, e.g. code pasted into a review tool. */
export function scanSource(
  id: string,
  content: string,
  catalog: RuleCatalog,
  options: ScanOptions = {},
): Promise<Report> {
  return scanUnits([{ id, content }], catalog, options);
}
