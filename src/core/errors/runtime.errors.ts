export type RuntimeErrorCode =
  | "InstanceNotAuthorized"
  | "AmbiguousInstance"
  | "NoInstanceForBackend"
  | "NoEligibleBackend"
  | "SessionClosed"
  | "SessionExpired"
  | "SessionBackendMismatch"
  | "InvalidRequestShape"
  | "BatchTooLarge"
  | "InvalidOptions"
  | "InvalidConfig"
  | "TransientTransportError"
  | "NonTransientTransportError"
  | "JobFailed"
  | "Cancelled"
  | "WaitTimeout"
  | "WaitAborted";

export type RuntimeErrorContext = Record<string, string | number | boolean | null>;

type RuntimeErrorArgs = {
  message: string;
  context?: RuntimeErrorContext;
  cause?: unknown;
};

/**
 * Base class for every failure this client raises. `code` is stable and meant
 * for programmatic handling; `context` only ever holds ids and counters.
 */
export abstract class RuntimeClientError extends Error {
  abstract readonly code: RuntimeErrorCode;
  readonly context: RuntimeErrorContext;
  readonly cause?: unknown;

  constructor(args: RuntimeErrorArgs) {
    super(args.message);
    this.name = new.target.name;
    this.context = args.context ?? {};
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InstanceNotAuthorizedError extends RuntimeClientError {
  readonly code = "InstanceNotAuthorized";
}

export class AmbiguousInstanceError extends RuntimeClientError {
  readonly code = "AmbiguousInstance";
}

export class NoInstanceForBackendError extends RuntimeClientError {
  readonly code = "NoInstanceForBackend";
}

export class NoEligibleBackendError extends RuntimeClientError {
  readonly code = "NoEligibleBackend";
}

export class SessionClosedError extends RuntimeClientError {
  readonly code = "SessionClosed";
}

export class SessionExpiredError extends RuntimeClientError {
  readonly code = "SessionExpired";
}

export class SessionBackendMismatchError extends RuntimeClientError {
  readonly code = "SessionBackendMismatch";
}

export class InvalidRequestShapeError extends RuntimeClientError {
  readonly code = "InvalidRequestShape";
}

export class BatchTooLargeError extends RuntimeClientError {
  readonly code = "BatchTooLarge";
}

export class InvalidOptionsError extends RuntimeClientError {
  readonly code = "InvalidOptions";
}

export class InvalidConfigError extends RuntimeClientError {
  readonly code = "InvalidConfig";
}

export type TransportErrorDetails = {
  status?: number;
  isTimeout?: boolean;
  retryDelayMs?: number;
  requestUrl?: string;
};

type TransportErrorArgs = RuntimeErrorArgs & TransportErrorDetails;

abstract class TransportError extends RuntimeClientError {
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly retryDelayMs?: number;
  readonly requestUrl?: string;

  constructor(args: TransportErrorArgs) {
    super(args);
    this.status = args.status;
    this.isTimeout = args.isTimeout ?? false;
    this.retryDelayMs = args.retryDelayMs;
    this.requestUrl = args.requestUrl;
  }
}

export class TransientTransportError extends TransportError {
  readonly code = "TransientTransportError";
}

export class NonTransientTransportError extends TransportError {
  readonly code = "NonTransientTransportError";
}

export class JobFailedError extends RuntimeClientError {
  readonly code = "JobFailed";
}

export class CancelledError extends RuntimeClientError {
  readonly code = "Cancelled";
}

export class WaitTimeoutError extends RuntimeClientError {
  readonly code = "WaitTimeout";
}

export class WaitAbortedError extends RuntimeClientError {
  readonly code = "WaitAborted";
}

export const isRuntimeClientError = (value: unknown): value is RuntimeClientError =>
  value instanceof RuntimeClientError;

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
