// src/api/settings.ts
// Application settings and levelled logging

import { z } from "zod";
import { LOG_ROTATE_BYTES } from "../constants";

export type LogLevel = "off" | "info" | "debug" | "verbose";
export type SinkKind = "serial" | "none";

export interface AppSettings {
  /** Serial device for capture and replay */
  port: string;
  baud_rate: number;
  /** Capture log path (base path; rotated files sit beside it) */
  output_csv: string;
  /** Log file replayed by default */
  input_csv: string;
  /** Catalog used for decode annotation and as the merge target of `catalog` */
  catalog_path: string | null;
  sink: SinkKind;
  rate: number;
  loop: boolean;
  log_level: LogLevel;
  log_rotate_bytes: number;
  sentry_dsn: string | null;
}

const LOG_LEVELS = ["off", "info", "debug", "verbose"] as const;

const envBoolean = z
  .enum(["1", "0", "true", "false", "yes", "no", "on", "off"])
  .transform((v) => v === "1" || v === "true" || v === "yes" || v === "on");

/** Environment overrides; every key is optional and validated before use */
const envSchema = z.object({
  CANTRACE_PORT: z.string().min(1).optional(),
  CANTRACE_BAUD: z.coerce.number().int().positive().optional(),
  CANTRACE_OUTPUT_CSV: z.string().min(1).optional(),
  CANTRACE_INPUT_CSV: z.string().min(1).optional(),
  CANTRACE_CATALOG: z.string().min(1).optional(),
  CANTRACE_SINK: z.enum(["serial", "none"]).optional(),
  CANTRACE_RATE: z.coerce.number().positive().optional(),
  CANTRACE_LOOP: envBoolean.optional(),
  CANTRACE_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  CANTRACE_LOG_ROTATE_BYTES: z.coerce.number().int().positive().optional(),
  CANTRACE_SENTRY_DSN: z.string().url().optional(),
});

/**
 * Normalizes partial settings, applying defaults for missing fields
 */
export function normalizeSettings(settings: Partial<AppSettings>): AppSettings {
  return {
    port: settings.port || "/dev/ttyUSB0",
    baud_rate: settings.baud_rate ?? 115200,
    output_csv: settings.output_csv || "canlog.csv",
    input_csv: settings.input_csv || "canlog.csv",
    catalog_path: settings.catalog_path ?? null,
    sink: settings.sink ?? "serial",
    rate: settings.rate ?? 1.0,
    loop: settings.loop ?? false,
    log_level: settings.log_level ?? "info",
    log_rotate_bytes: settings.log_rotate_bytes ?? LOG_ROTATE_BYTES,
    sentry_dsn: settings.sentry_dsn ?? null,
  };
}

/**
 * Load settings from `CANTRACE_*` environment variables over the defaults.
 * Throws a ZodError naming the offending variable when a value is invalid.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  const parsed = envSchema.parse(env);
  return normalizeSettings({
    port: parsed.CANTRACE_PORT,
    baud_rate: parsed.CANTRACE_BAUD,
    output_csv: parsed.CANTRACE_OUTPUT_CSV,
    input_csv: parsed.CANTRACE_INPUT_CSV,
    catalog_path: parsed.CANTRACE_CATALOG,
    sink: parsed.CANTRACE_SINK,
    rate: parsed.CANTRACE_RATE,
    loop: parsed.CANTRACE_LOOP,
    log_level: parsed.CANTRACE_LOG_LEVEL,
    log_rotate_bytes: parsed.CANTRACE_LOG_ROTATE_BYTES,
    sentry_dsn: parsed.CANTRACE_SENTRY_DSN,
  });
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// ============================================================================
// Logging
// ============================================================================

const LEVEL_RANK: Record<LogLevel, number> = { off: 0, info: 1, debug: 2, verbose: 3 };

let currentLevel: LogLevel = "info";
let writeLine: (line: string) => void = (line) => {
  process.stderr.write(line + "\n");
};

/**
 * Set the log level threshold.
 * Levels: "off" | "info" | "debug" | "verbose". Warnings and errors print unless "off".
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/** Redirect log output (tests capture lines here). Returns the previous writer. */
export function setLogWriter(writer: (line: string) => void): (line: string) => void {
  const previous = writeLine;
  writeLine = writer;
  return previous;
}

function emit(level: string, rank: number, message: string): void {
  if (LEVEL_RANK[currentLevel] < rank) return;
  writeLine(`[${level}] ${message}`);
}

/**
 * Levelled logging to stderr, keeping stdout free for frame output.
 * Messages are filtered by the current log level threshold.
 */
export const tlog = {
  error: (message: string): void => emit("error", 1, message),
  warn: (message: string): void => emit("warn", 1, message),
  info: (message: string): void => emit("info", 1, message),
  debug: (message: string): void => emit("debug", 2, message),
  verbose: (message: string): void => emit("verbose", 3, message),
};
