/**
 * QoS dispatch error class (shared).
 */

/**
 * Standardized error codes for the dispatch engine and its hosts.
 */
export type QosErrorCode =
  | "INVALID_ARGUMENT"
  | "INVARIANT_VIOLATION"
  | "TRANSPORT_ERROR"
  | "DECODE_ERROR"
  | "CONFIG_ERROR"
  | "INTERNAL_ERROR";

/**
 * Structured error raised by the dispatcher, link transports and the daemon.
 */
export class QosError extends Error {
  public readonly code: QosErrorCode;
  public readonly retryable: boolean;
  public readonly details?: unknown;
  public readonly cause?: unknown;

  constructor(args: {
    code: QosErrorCode;
    message: string;
    retryable?: boolean;
    details?: unknown;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "QosError";
    this.code = args.code;
    this.retryable = args.retryable ?? false;
    this.details = args.details;
    this.cause = args.cause;
  }
}

/** Best-effort message extraction for logging. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
