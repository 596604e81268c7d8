// src/api/telemetry.ts
//
// Optional error reporting. Sentry only initialises when a DSN is configured;
// otherwise errors are logged and nothing leaves the process.

import * as Sentry from "@sentry/node";
import { tlog, type AppSettings } from "./settings";
import { errorMessage } from "./errors";

let enabled = false;

export function initTelemetry(settings: Pick<AppSettings, "sentry_dsn">, release: string): void {
  enabled = !!settings.sentry_dsn;
  if (!enabled) return;
  Sentry.init({
    dsn: settings.sentry_dsn ?? undefined,
    release: `cantrace@${release}`,
    environment: process.env.NODE_ENV ?? "production",
    enabled,
  });
  tlog.debug("[telemetry] Sentry error reporting enabled");
}

export function isTelemetryEnabled(): boolean {
  return enabled;
}

/**
 * Log an error and forward it to Sentry when reporting is enabled.
 * @param context - Short label for where the error happened (e.g., "capture")
 */
export function captureError(err: unknown, context: string): void {
  tlog.error(`[${context}] ${errorMessage(err)}`);
  if (enabled) {
    Sentry.captureException(err, { tags: { context } });
  }
}

/** Flush pending reports before exit. */
export async function flushTelemetry(timeoutMs = 2000): Promise<void> {
  if (!enabled) return;
  await Sentry.flush(timeoutMs);
}
