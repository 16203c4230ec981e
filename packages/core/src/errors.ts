/**
 * packages/core/src/errors.ts — Error taxonomy shared by every package.
 *
 * All failures the overlay surfaces carry a deterministic `code` so callers can
 * branch on the kind of failure without string matching.
 */

/**
 * Deterministic error codes.
 *
 *   - CONFIG_LOAD_ERROR: persisted settings could not be read (recovered with defaults)
 *   - PERSISTENCE_ERROR: settings could not be written
 *   - NOT_FOUND: unknown animation or menu entry
 *   - INJECTION_ERROR: the OS refused a synthesized key or clipboard write
 *   - INVALID_PROPS: a caller passed arguments outside the documented contract
 */
export type CommwheelErrorCode =
  | "CONFIG_LOAD_ERROR"
  | "PERSISTENCE_ERROR"
  | "NOT_FOUND"
  | "INJECTION_ERROR"
  | "INVALID_PROPS";

export type CommwheelErrorOptions = Readonly<{
  cause?: unknown;
}>;

export class CommwheelError extends Error {
  override readonly name = "CommwheelError";
  readonly code: CommwheelErrorCode;

  constructor(code: CommwheelErrorCode, message?: string, opts?: CommwheelErrorOptions) {
    super(message ?? code, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CommwheelError);
    }
  }
}

export function isCommwheelError(err: unknown, code?: CommwheelErrorCode): err is CommwheelError {
  if (!(err instanceof CommwheelError)) return false;
  return code === undefined || err.code === code;
}

export function safeErr(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function describeError(err: unknown): string {
  if (err instanceof CommwheelError) return `${err.code}: ${err.message}`;
  return safeErr(err).message;
}
