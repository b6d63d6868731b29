// =============================================================================
// Error codes
// =============================================================================

/**
 * Deterministic error codes for daemon faults.
 * These are surfaced as BarlineError instances.
 */
export type BarlineErrorCode =
  | "BARLINE_INVALID_CONFIG"
  | "BARLINE_INVALID_STATE"
  | "BARLINE_UNKNOWN_FIELD"
  | "BARLINE_INVALID_REQUEST"
  | "BARLINE_REENTRANT_DISPATCH"
  | "BARLINE_SPAWN_FAILED"
  | "BARLINE_CHANNEL_BIND"
  | "BARLINE_SINK_OPEN";

/**
 * Error class for configuration and resource-setup faults.
 * The `code` property identifies the specific violation.
 */
export class BarlineError extends Error {
  override readonly name = "BarlineError";
  readonly code: BarlineErrorCode;

  constructor(code: BarlineErrorCode, message?: string, options?: Readonly<{ cause?: unknown }>) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BarlineError);
    }
  }
}

export function isBarlineError(v: unknown, code?: BarlineErrorCode): v is BarlineError {
  if (!(v instanceof BarlineError)) return false;
  return code === undefined || v.code === code;
}

export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}
