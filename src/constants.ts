// src/constants.ts
// Global constants for cantrace
// Add new constants here for maintainability and single source of truth

// =============================================================================
// CAN Protocol Constants
// =============================================================================

/** Maximum data bytes for classic CAN frames */
export const CAN_MAX_BYTES = 8;

/** Largest standard (11-bit) identifier */
export const CAN_STD_ID_MAX = 0x7ff;

/** Largest extended (29-bit) identifier */
export const CAN_EXT_ID_MAX = 0x1fffffff;

// =============================================================================
// Log Store Constants
// =============================================================================

/** Header row of every frame log file */
export const LOG_HEADER = "timestamp_ms,id_hex,dlc,data_hex";

/** Rotate the active log file once it grows past this many bytes (100 MiB) */
export const LOG_ROTATE_BYTES = 100 * 1024 * 1024;

// =============================================================================
// Statistics Constants
// =============================================================================

/**
 * Weight of the newest instantaneous frequency in the per-ID moving average.
 * 0.2 gives an 0.8/0.2 blend. The first positive delta seeds the average.
 */
export const EMA_WEIGHT = 0.2;

// =============================================================================
// Replay Constants
// =============================================================================

/** Replay rates below this are raised to it */
export const MIN_REPLAY_RATE = 0.0001;

// =============================================================================
// OBD-II Constants
// =============================================================================

/** First payload byte of a mode 01 (current data) positive response */
export const OBD_RESPONSE_MARKER = 0x41;

/** Functional broadcast request identifier */
export const OBD_REQUEST_ID = 0x7df;

/** Start bit of the PID-specific value in a mode 01 response */
export const OBD_VALUE_START_BIT = 16;

// =============================================================================
// Locale Constants
// =============================================================================

/** Locale for 24-hour time formatting (HH:mm:ss) */
export const LOCALE_TIME_24H = "en-GB";

// =============================================================================
// Application Constants
// =============================================================================

export const APP_NAME = "cantrace";
export const APP_VERSION = "0.1.0";
