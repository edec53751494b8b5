import type { Backend } from "../../core/backend/backend.types";
import {
  NonTransientTransportError,
  SessionClosedError,
  SessionExpiredError,
  toErrorMessage
} from "../../core/errors/runtime.errors";
import type { Instance } from "../../core/instance/instance.types";
import type { JobHandle } from "../../core/job/job.types";
import type { PrimitiveRequest } from "../../core/primitives/primitive.types";
import type { RemoteTransport } from "../../ports/RemoteTransport";
import { withTimeout } from "../../shared/retry/timeout";
import type { JobScheduler, SessionBinding } from "../jobs/jobScheduler";
import { resolveSessionConfig, type SessionConfig, type SessionConfigInput } from "./session.config";

export type SessionState = "Pending" | "Active" | "Closing" | "Closed";

export type SessionCloseReason = "explicit" | "idle_timeout" | "max_time" | "transport_error";

export type SessionDeps = {
  scheduler: JobScheduler;
  transport: RemoteTransport;
  now?: () => number;
};

export type OpenSessionArgs = SessionConfigInput & {
  backend: Backend;
  instance: Instance;
};

type SessionLog = {
  event: "session.activated" | "session.expired" | "session.close_failed" | "session.closed";
  sessionId: string | null;
  backendId: string;
  reason?: SessionCloseReason;
  message?: string;
};

const logSession = (log: SessionLog) => {
  const line = JSON.stringify(log);
  if (log.event === "session.close_failed") {
    // eslint-disable-next-line no-console
    console.warn(line);
    return;
  }
  // eslint-disable-next-line no-console
  console.log(line);
};

const isExpiry = (reason: SessionCloseReason | null): reason is "idle_timeout" | "max_time" =>
  reason === "idle_timeout" || reason === "max_time";

/**
 * A time-boxed priority window bound to one backend and one instance.
 *
 * Pending until the service accepts the first job and hands out an id, then
 * Active. Idle timeout, max time, explicit close and fatal transport errors all
 * end in Closed; local state reaches Closed even if the service never answers.
 * Single owner: do not share one Session between concurrent callers.
 */
export class Session implements SessionBinding {
  readonly backend: Backend;
  readonly instance: Instance;
  readonly createdAt: Date;
  readonly config: SessionConfig;

  private readonly scheduler: JobScheduler;
  private readonly transport: RemoteTransport;
  private readonly now: () => number;
  private sessionId: string | null = null;
  private currentState: SessionState = "Pending";
  private reason: SessionCloseReason | null = null;
  private lastActivityAt: number;
  private readonly accepted: JobHandle[] = [];
  private tail: Promise<void> = Promise.resolve();
  private closing: Promise<void> | null = null;
  private idleTimer: ReturnType<typeof setTimeout> | null = null;
  private maxTimer: ReturnType<typeof setTimeout> | null = null;

  private constructor(deps: SessionDeps, args: OpenSessionArgs) {
    this.scheduler = deps.scheduler;
    this.transport = deps.transport;
    this.now = deps.now ?? Date.now;
    this.backend = args.backend;
    this.instance = args.instance;
    this.config = resolveSessionConfig({
      maxTimeMs: args.maxTimeMs,
      idleTimeoutMs: args.idleTimeoutMs,
      closeTimeoutMs: args.closeTimeoutMs
    });
    this.createdAt = new Date(this.now());
    this.lastActivityAt = this.createdAt.getTime();
  }

  /** Allocates a local Pending handle; nothing is sent to the service yet. */
  static open(deps: SessionDeps, args: OpenSessionArgs): Session {
    const session = new Session(deps, args);
    session.maxTimer = session.schedule(session.config.maxTimeMs, "max_time");
    session.idleTimer = session.schedule(session.config.idleTimeoutMs, "idle_timeout");
    return session;
  }

  get id(): string | null {
    return this.sessionId;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get backendId(): string {
    return this.backend.id;
  }

  get instanceId(): string {
    return this.instance.id;
  }

  get closeReason(): SessionCloseReason | null {
    return this.reason;
  }

  /** Handles accepted through this session, in acceptance order. */
  jobs(): readonly JobHandle[] {
    return [...this.accepted];
  }

  submit(request: PrimitiveRequest): Promise<JobHandle> {
    return this.scheduler.submit(request, this.backend, this);
  }

  /**
   * Idempotent. Tells the service the window can be released and always ends
   * in Closed, waiting at most `closeTimeoutMs` for the acknowledgement.
   */
  close(): Promise<void> {
    if (this.closing) return this.closing;
    if (this.currentState === "Closed") return Promise.resolve();
    this.closing = this.shutdown("explicit");
    return this.closing;
  }

  assertAcceptingJobs(): void {
    if (this.currentState === "Closing" || this.currentState === "Closed") {
      throw this.rejection();
    }

    const expired = this.dueExpiry();
    if (expired) {
      this.expire(expired);
      throw this.rejection();
    }
  }

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // the queue only orders work; failures reach the caller through `run`
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  recordAcceptance(sessionId: string | null, handle: JobHandle): void {
    this.accepted.push(handle);
    this.lastActivityAt = this.now();

    // a close may already be waiting on this submission; it still needs the id
    if (this.sessionId == null && sessionId != null) {
      this.sessionId = sessionId;
      if (this.currentState === "Pending") this.currentState = "Active";
      logSession({ event: "session.activated", sessionId, backendId: this.backend.id });
    }

    if (this.currentState === "Pending" || this.currentState === "Active") {
      this.clearTimer(this.idleTimer);
      this.idleTimer = this.schedule(this.config.idleTimeoutMs, "idle_timeout");
    }
  }

  recordFatalError(err: unknown): void {
    if (!(err instanceof NonTransientTransportError)) return;
    if (this.currentState === "Closed" || this.closing) return;

    this.reason = "transport_error";
    this.finish();
  }

  private dueExpiry(): "idle_timeout" | "max_time" | null {
    const now = this.now();
    if (now - this.createdAt.getTime() >= this.config.maxTimeMs) return "max_time";
    if (now - this.lastActivityAt >= this.config.idleTimeoutMs) return "idle_timeout";
    return null;
  }

  private expire(reason: "idle_timeout" | "max_time"): void {
    if (this.closing || this.currentState === "Closed") return;
    logSession({ event: "session.expired", sessionId: this.sessionId, backendId: this.backend.id, reason });
    this.closing = this.shutdown(reason);
  }

  private rejection(): SessionClosedError | SessionExpiredError {
    const context = { sessionId: this.sessionId, backend: this.backend.id, reason: this.reason };
    if (isExpiry(this.reason)) {
      const limit = this.reason === "max_time" ? "max time" : "idle timeout";
      return new SessionExpiredError({ message: `Session exceeded its ${limit}`, context });
    }
    return new SessionClosedError({ message: "Session is closed", context });
  }

  private async shutdown(reason: SessionCloseReason): Promise<void> {
    this.reason = reason;
    this.currentState = "Closing";
    this.clearTimers();

    try {
      await withTimeout(this.release(), this.config.closeTimeoutMs);
    } catch (err) {
      logSession({
        event: "session.close_failed",
        sessionId: this.sessionId,
        backendId: this.backend.id,
        reason,
        message: toErrorMessage(err)
      });
    }
    this.finish();
  }

  /** Lets in-flight submissions settle so the id is known, then releases it. */
  private async release(): Promise<void> {
    await this.tail;
    const sessionId = this.sessionId;
    if (sessionId != null) await this.transport.closeSession(sessionId);
  }

  private finish(): void {
    this.clearTimers();
    if (this.currentState === "Closed") return;
    this.currentState = "Closed";
    logSession({
      event: "session.closed",
      sessionId: this.sessionId,
      backendId: this.backend.id,
      reason: this.reason ?? "explicit"
    });
  }

  private schedule(delayMs: number, reason: "idle_timeout" | "max_time"): ReturnType<typeof setTimeout> {
    const timer = setTimeout(() => this.expire(reason), delayMs);
    timer.unref();
    return timer;
  }

  private clearTimer(timer: ReturnType<typeof setTimeout> | null): void {
    if (timer) clearTimeout(timer);
  }

  private clearTimers(): void {
    this.clearTimer(this.idleTimer);
    this.clearTimer(this.maxTimer);
    this.idleTimer = null;
    this.maxTimer = null;
  }
}

/**
 * Runs `fn` inside the session and closes it on every exit path, including
 * errors thrown by nested submissions.
 */
export const withSession = async <T>(session: Session, fn: (session: Session) => Promise<T>): Promise<T> => {
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
};
