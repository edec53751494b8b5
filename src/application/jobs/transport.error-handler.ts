import {
  NonTransientTransportError,
  RuntimeClientError,
  TransientTransportError,
  toErrorMessage
} from "../../core/errors/runtime.errors";
import { retry, type RetryDecision } from "../../shared/retry/retry";
import type { SchedulerConfig } from "./scheduler.config";

export type TransportOperation =
  | "submitJob"
  | "getStatus"
  | "getResult"
  | "cancelJob"
  | "listBackends"
  | "listInstances"
  | "closeSession";

export type TransportFailure = {
  transient: boolean;
  status?: number;
  retryDelayMs?: number;
  requestUrl?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

const readNumber = (record: Record<string, unknown>, key: string): number | undefined => {
  const value = record[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
};

/**
 * Transient: network failures, timeouts, 429 and 5xx. Everything else, including
 * malformed responses, is non-transient and must not be retried.
 */
export const classifyTransportFailure = (err: unknown): TransportFailure => {
  if (err instanceof TransientTransportError || err instanceof NonTransientTransportError) {
    return {
      transient: err instanceof TransientTransportError,
      status: err.status,
      retryDelayMs: err.retryDelayMs,
      requestUrl: err.requestUrl
    };
  }

  const record = isRecord(err) ? err : {};
  const status = readNumber(record, "status");
  if (status != null) {
    return { transient: status === 429 || status >= 500, status, retryDelayMs: readNumber(record, "retryDelayMs") };
  }
  if (record.isTimeout === true || err instanceof TypeError) {
    return { transient: true };
  }
  return { transient: false };
};

export const toRetryDecision = (err: unknown): RetryDecision => {
  const failure = classifyTransportFailure(err);
  return { retry: failure.transient, delayMs: failure.retryDelayMs };
};

/** Normalizes whatever escaped the retry loop into the client's taxonomy. */
export const wrapTransportFailure = (
  err: unknown,
  ctx: { operation: TransportOperation; attempts: number }
): RuntimeClientError => {
  if (err instanceof RuntimeClientError && !(err instanceof TransientTransportError)) {
    return err;
  }

  const failure = classifyTransportFailure(err);
  const message = failure.transient
    ? `${ctx.operation} failed after ${ctx.attempts} attempts: ${toErrorMessage(err)}`
    : `${ctx.operation} failed: ${toErrorMessage(err)}`;
  return new NonTransientTransportError({
    message,
    status: failure.status,
    requestUrl: failure.requestUrl,
    context: { operation: ctx.operation, attempts: ctx.attempts },
    cause: err
  });
};

type TransportLog = {
  event: "transport.retry" | "transport.give_up";
  operation: TransportOperation;
  status: number | null;
  url: string | null;
  attempt: number;
  maxAttempts: number;
};

const logTransport = (log: TransportLog) => {
  // eslint-disable-next-line no-console
  console.warn(JSON.stringify(log));
};

export type CallTransportOptions = {
  randomFn?: () => number;
  signal?: AbortSignal;
};

/**
 * Runs one transport call with bounded retries on transient failures. Any
 * failure that escapes is a RuntimeClientError; exhausted transient failures
 * surface as NonTransientTransportError.
 */
export const callTransport = async <T>(
  operation: TransportOperation,
  fn: () => Promise<T>,
  config: SchedulerConfig,
  opts: CallTransportOptions = {}
): Promise<T> => {
  let attempts = 0;
  try {
    return await retry(
      async (attempt) => {
        attempts = attempt;
        return fn();
      },
      {
        retries: config.transportRetries,
        minDelayMs: config.retryMinDelayMs,
        maxDelayMs: config.retryMaxDelayMs,
        randomFn: opts.randomFn,
        signal: opts.signal,
        shouldRetry: toRetryDecision,
        onRetry: ({ attempt, maxAttempts, error }) => {
          const failure = classifyTransportFailure(error);
          logTransport({
            event: "transport.retry",
            operation,
            status: failure.status ?? null,
            url: failure.requestUrl ?? null,
            attempt,
            maxAttempts
          });
        },
        onGiveUp: ({ attempt, maxAttempts, error }) => {
          const failure = classifyTransportFailure(error);
          logTransport({
            event: "transport.give_up",
            operation,
            status: failure.status ?? null,
            url: failure.requestUrl ?? null,
            attempt,
            maxAttempts
          });
        }
      }
    );
  } catch (err) {
    if (opts.signal?.aborted && err === opts.signal.reason) throw err;
    throw wrapTransportFailure(err, { operation, attempts });
  }
};
