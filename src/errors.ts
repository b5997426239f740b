/** Error codes for all retry-kit error types */
export enum RetryKitErrorCode {
  CANCELLED = "CANCELLED",
  TERMINAL_ERROR = "TERMINAL_ERROR",
  ATTEMPTS_EXHAUSTED = "ATTEMPTS_EXHAUSTED",

  INVALID_CONFIG = "INVALID_CONFIG",
}

export type RetryFailureCode =
  | RetryKitErrorCode.CANCELLED
  | RetryKitErrorCode.TERMINAL_ERROR
  | RetryKitErrorCode.ATTEMPTS_EXHAUSTED;

/** Structured error with a machine-readable code and optional cause/context */
export class RetryKitError<C extends RetryKitErrorCode = RetryKitErrorCode> extends Error {
  readonly code: C;
  override readonly cause?: Error | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(
    code: C,
    message: string,
    options?: { cause?: Error | undefined; context?: Record<string, unknown> | undefined },
  ) {
    super(message);
    this.name = "RetryKitError";
    this.code = code;
    this.cause = options?.cause;
    this.context = options?.context;
  }
}

/**
 * Why a retry sequence ended without an accepted result.
 * Returned inside a failed `Result`, not thrown, unless the caller asks for it.
 */
export class RetryFailure extends RetryKitError<RetryFailureCode> {
  /** Number of times the operation was invoked */
  readonly attempts: number;

  constructor(
    code: RetryFailureCode,
    message: string,
    options: { attempts: number; cause?: Error | undefined; context?: Record<string, unknown> | undefined },
  ) {
    super(code, message, options);
    this.name = "RetryFailure";
    this.attempts = options.attempts;
  }
}
