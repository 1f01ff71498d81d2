import { z } from "zod";

import { GraphConfigurationError } from "../errors.js";
import { StructuredLogger, type LogLevel } from "../logger.js";
import { readOptionalBool, readOptionalInt, readOptionalString } from "./env.js";

/** Environment variables understood by {@link loadGraphSettingsFromEnv}. */
export const GRAPH_ENV = {
  LOG_LEVEL: "GRAPH_LOG_LEVEL",
  LOG_FILE: "GRAPH_LOG_FILE",
  LOG_STDOUT: "GRAPH_LOG_STDOUT",
  LOG_MAX_FILE_BYTES: "GRAPH_LOG_MAX_FILE_BYTES",
  MATRIX_GROWTH: "GRAPH_MATRIX_GROWTH",
} as const;

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);
const MatrixGrowthSchema = z.enum(["double", "exact"]).default("double");

export const GraphSettingsSchema = z
  .object({
    logLevel: z.preprocess(
      (value) => (typeof value === "string" ? value.toLowerCase() : value),
      LogLevelSchema,
    ).default("warn"),
    logFile: z.string().min(1).nullable().default(null),
    logStdout: z.boolean().default(true),
    logMaxFileBytes: z.number().int().positive().optional(),
    matrixGrowth: MatrixGrowthSchema,
  })
  .strict();

export type GraphSettings = z.infer<typeof GraphSettingsSchema>;
export type GraphSettingsInput = z.input<typeof GraphSettingsSchema>;

/**
 * Validates raw settings, turning zod failures into a
 * {@link GraphConfigurationError}.
 */
export function parseGraphSettings(input: unknown): GraphSettings {
  const result = GraphSettingsSchema.safeParse(input);
  if (!result.success) {
    throw new GraphConfigurationError(result.error.issues);
  }
  return result.data;
}

/**
 * Reads the `GRAPH_*` environment variables. Level and growth literals are
 * validated strictly; the boolean and numeric switches ignore unrecognised
 * values like the rest of the env helpers.
 */
export function loadGraphSettingsFromEnv(): GraphSettings {
  return parseGraphSettings(collectEnv());
}

/**
 * Reads `GRAPH_MATRIX_GROWTH` alone, so unrelated logging variables cannot
 * make matrix construction fail.
 */
export function loadMatrixGrowthFromEnv(): GraphSettings["matrixGrowth"] {
  const result = z
    .object({ matrixGrowth: MatrixGrowthSchema })
    .safeParse({ matrixGrowth: readOptionalString(GRAPH_ENV.MATRIX_GROWTH)?.toLowerCase() });
  if (!result.success) {
    throw new GraphConfigurationError(result.error.issues);
  }
  return result.data.matrixGrowth;
}

/** Environment settings with `overrides` applied on top. */
export function resolveGraphSettings(overrides: GraphSettingsInput = {}): GraphSettings {
  return parseGraphSettings({ ...collectEnv(), ...stripUndefined(overrides) });
}

/** Structured logger configured from the settings. */
export function createLoggerFromSettings(settings: GraphSettings): StructuredLogger {
  const minLevel: LogLevel = settings.logLevel;
  return new StructuredLogger({
    minLevel,
    logFile: settings.logFile,
    stdout: settings.logStdout,
    ...(settings.logMaxFileBytes !== undefined ? { maxFileSizeBytes: settings.logMaxFileBytes } : {}),
  });
}

function collectEnv(): Record<string, unknown> {
  return stripUndefined({
    logLevel: readOptionalString(GRAPH_ENV.LOG_LEVEL),
    logFile: readOptionalString(GRAPH_ENV.LOG_FILE),
    logStdout: readOptionalBool(GRAPH_ENV.LOG_STDOUT),
    logMaxFileBytes: readOptionalInt(GRAPH_ENV.LOG_MAX_FILE_BYTES, { min: 1 }),
    matrixGrowth: readOptionalString(GRAPH_ENV.MATRIX_GROWTH)?.toLowerCase(),
  });
}

function stripUndefined(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}
