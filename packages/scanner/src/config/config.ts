import { availableParallelism } from "node:os";
import { z } from "zod";
import {
  DEFAULT_BLOCK_WINDOW,
  DEFAULT_EXCERPT_LENGTH,
  DEFAULT_LOOKAROUND,
  FIXTURE_PATH_SEGMENTS,
  TEST_PATH_SEGMENTS,
} from "@codeguard/shared";

export const LogLevelEnum = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const EngineConfigSchema = z
  .object({
    concurrency: z.number().int().min(1).default(availableParallelism()),
    lookaround: z.number().int().min(0).max(10).default(DEFAULT_LOOKAROUND),
    blockWindow: z.number().int().min(1).max(50).default(DEFAULT_BLOCK_WINDOW),
    maxExcerptLength: z.number().int().min(20).default(DEFAULT_EXCERPT_LENGTH),
    fixtureSegments: z.array(z.string().min(1)).default([...FIXTURE_PATH_SEGMENTS]),
    testSegments: z.array(z.string().min(1)).default([...TEST_PATH_SEGMENTS]),
    logLevel: LogLevelEnum.default("warn"),
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelEnum>;

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  const concurrency = env["CODEGUARD_CONCURRENCY"];
  if (concurrency) values.concurrency = Number(concurrency);
  const logLevel = env["CODEGUARD_LOG_LEVEL"];
  if (logLevel) values.logLevel = logLevel;
  return values;
}

/**
 * Resolve engine settings: built-in defaults, then CODEGUARD_* environment
 * variables, then explicit overrides. Throws ZodError on invalid values.
 */
export function resolveConfig(
  overrides: EngineConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): EngineConfig {
  return EngineConfigSchema.parse({ ...readEnv(env), ...overrides });
}
