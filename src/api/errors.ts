// src/api/errors.ts
//
// Error types surfaced by sessions and stores. Each keeps the underlying cause.

export class CantraceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Capture session could not acquire or keep a resource */
export class CaptureError extends CantraceError {}

/** Replay was misconfigured or its record could not be played */
export class ReplayError extends CantraceError {}

/** Frame log could not be opened, written, rotated or read */
export class LogStoreError extends CantraceError {}

/** Catalog could not be read, parsed or written */
export class CatalogError extends CantraceError {}

/** Transport (line source or frame sink) failure */
export class TransportError extends CantraceError {}

/** Message text for any thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
