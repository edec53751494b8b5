import type { Backend } from "../../core/backend/backend.types";
import {
  CancelledError,
  JobFailedError,
  NonTransientTransportError,
  SessionBackendMismatchError,
  WaitAbortedError,
  WaitTimeoutError
} from "../../core/errors/runtime.errors";
import {
  isTerminalState,
  type Job,
  type JobErrorDetail,
  type JobHandle,
  type JobResult
} from "../../core/job/job.types";
import { toJobPayload } from "../../core/primitives/jobPayload";
import { normalizePrimitiveRequest } from "../../core/primitives/normalizePrimitiveRequest";
import type { PrimitiveRequest } from "../../core/primitives/primitive.types";
import type { RemoteTransport, SubmitJobResult } from "../../ports/RemoteTransport";
import { createLimiter } from "../../shared/concurrency/limiter";
import { computeBackoffDelay, sleep } from "../../shared/retry/retry";
import { resolveSchedulerConfig, type SchedulerConfig, type SchedulerConfigInput } from "./scheduler.config";
import { callTransport, type TransportOperation } from "./transport.error-handler";

/**
 * What the scheduler needs from a session. Submissions go through `enqueue`
 * so that acceptance order matches call order and later jobs see the id the
 * first one obtained.
 */
export interface SessionBinding {
  readonly backendId: string;
  readonly id: string | null;
  assertAcceptingJobs(): void;
  enqueue<T>(task: () => Promise<T>): Promise<T>;
  recordAcceptance(sessionId: string | null, handle: JobHandle): void;
  recordFatalError(err: unknown): void;
}

export type WaitOptions = {
  timeoutMs?: number;
  /** Stops waiting; the remote job keeps running. */
  signal?: AbortSignal;
};

export type JobSchedulerDeps = {
  transport: RemoteTransport;
  config?: SchedulerConfigInput;
  randomFn?: () => number;
  now?: () => number;
};

type JobTransition =
  | { state: "Queued" | "Running" | "Cancelled"; detail?: string }
  | { state: "Done"; result: JobResult; detail?: string }
  | { state: "Failed"; error: JobErrorDetail; detail?: string };

const CANCEL_REJECTED_STATUSES = new Set([400, 409]);

const logJob = (event: string, fields: Record<string, string | number | null>) => {
  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ event, ...fields }));
};

/**
 * Per-job state machine driven solely by polling the transport. Jobs are
 * independent: any number of handles may be polled or awaited concurrently.
 */
export class JobScheduler {
  readonly config: SchedulerConfig;
  private readonly transport: RemoteTransport;
  private readonly randomFn: () => number;
  private readonly now: () => number;
  private readonly jobs = new Map<string, Job>();

  constructor(deps: JobSchedulerDeps) {
    this.transport = deps.transport;
    this.config = resolveSchedulerConfig(deps.config);
    this.randomFn = deps.randomFn ?? Math.random;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Validates the request against the backend and submits it. Nothing reaches
   * the transport when validation fails.
   */
  async submit(request: PrimitiveRequest, backend: Backend, session?: SessionBinding): Promise<JobHandle> {
    const validated = normalizePrimitiveRequest(request, { maxBatch: backend.maxBatch });
    const payload = toJobPayload(validated);

    if (!session) {
      const accepted = await this.call("submitJob", () => this.transport.submitJob(backend.id, payload));
      return this.accept(accepted.jobId, backend.id, accepted.sessionId);
    }

    if (session.backendId !== backend.id) {
      throw new SessionBackendMismatchError({
        message: `Session is bound to backend ${session.backendId}, not ${backend.id}`,
        context: { sessionBackend: session.backendId, backend: backend.id }
      });
    }
    session.assertAcceptingJobs();

    return session.enqueue(async () => {
      session.assertAcceptingJobs();
      const sessionId = session.id ?? undefined;
      let accepted: SubmitJobResult;
      try {
        accepted = await this.call("submitJob", () =>
          this.transport.submitJob(backend.id, payload, sessionId, { startSession: sessionId == null })
        );
      } catch (err) {
        if (err instanceof NonTransientTransportError) session.recordFatalError(err);
        throw err;
      }
      const handle = this.accept(accepted.jobId, backend.id, accepted.sessionId ?? session.id);
      session.recordAcceptance(accepted.sessionId, handle);
      return handle;
    });
  }

  /**
   * One status check. Terminal states the service reported are answered
   * locally. Transport failures are thrown and leave the recorded state as it
   * was, so later polls and cancel still reach the service.
   */
  async poll(handle: JobHandle, signal?: AbortSignal): Promise<Job> {
    const known = this.jobs.get(handle.jobId);
    if (known && isTerminalState(known.state)) return known;

    const status = await this.call("getStatus", () => this.transport.getStatus(handle.jobId), signal);

    if (status.state === "Done") {
      const result = await this.call("getResult", () => this.transport.getResult(handle.jobId), signal);
      return this.record(handle, { state: "Done", result, detail: status.detail });
    }

    if (status.state === "Failed") {
      return this.record(handle, {
        state: "Failed",
        error: { code: "JobFailed", message: status.detail ?? "job failed on the service" },
        detail: status.detail
      });
    }

    return this.record(handle, { state: status.state, detail: status.detail });
  }

  /**
   * Polls with capped exponential backoff until the job is terminal. Throws
   * WaitTimeout or WaitAborted without touching the remote job, also while a
   * status call is still outstanding.
   */
  async wait(handle: JobHandle, opts: WaitOptions = {}): Promise<Job> {
    const { timeoutMs, signal } = opts;
    const deadline = timeoutMs != null ? this.now() + timeoutMs : undefined;
    const backoff = {
      minDelayMs: this.config.pollInitialDelayMs,
      maxDelayMs: this.config.pollMaxDelayMs,
      jitterRatio: this.config.pollJitterRatio,
      randomFn: this.randomFn
    };

    for (let attempt = 0; ; attempt += 1) {
      if (signal?.aborted) throw this.aborted(handle);

      const job = await this.pollUntil(handle, deadline, timeoutMs, signal);
      if (isTerminalState(job.state)) return job;

      let delayMs = computeBackoffDelay(attempt, backoff);
      if (deadline != null) {
        const remaining = deadline - this.now();
        if (remaining <= 0) throw this.timedOut(handle, timeoutMs);
        delayMs = Math.min(delayMs, remaining);
      }

      try {
        await sleep(delayMs, signal);
      } catch {
        throw this.aborted(handle);
      }
    }
  }

  /** Waits, then returns the payload of a Done job or throws its failure. */
  async result(handle: JobHandle, opts: WaitOptions = {}): Promise<JobResult> {
    const job = await this.wait(handle, opts);
    switch (job.state) {
      case "Done":
        return job.result;
      case "Failed":
        throw new JobFailedError({ message: job.error.message, context: { jobId: job.jobId } });
      default:
        throw new CancelledError({ message: `Job ${job.jobId} was cancelled`, context: { jobId: job.jobId } });
    }
  }

  /** Waits on several jobs with bounded concurrency; results keep input order. */
  async waitAll(handles: readonly JobHandle[], opts: WaitOptions = {}): Promise<Job[]> {
    const limit = createLimiter(this.config.waitConcurrency);
    return Promise.all(handles.map((handle) => limit(() => this.wait(handle, opts))));
  }

  /**
   * Asks the service to cancel. Advisory: a rejected cancellation is logged and
   * the job's final state is whatever polling later reports.
   */
  async cancel(handle: JobHandle): Promise<void> {
    const known = this.jobs.get(handle.jobId);
    if (known && isTerminalState(known.state)) return;

    try {
      await this.call("cancelJob", () => this.transport.cancelJob(handle.jobId));
    } catch (err) {
      if (err instanceof NonTransientTransportError && err.status != null && CANCEL_REJECTED_STATUSES.has(err.status)) {
        logJob("job.cancel_rejected", { jobId: handle.jobId, status: err.status });
        return;
      }
      throw err;
    }
  }

  /** Last locally known snapshot; no network. */
  job(handle: JobHandle): Job | undefined {
    return this.jobs.get(handle.jobId);
  }

  private call<T>(operation: TransportOperation, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return callTransport(operation, fn, this.config, { randomFn: this.randomFn, signal });
  }

  private accept(jobId: string, backendId: string, sessionId: string | null): JobHandle {
    const handle: JobHandle = { jobId, backendId, sessionId, submittedAt: new Date(this.now()) };
    this.record(handle, { state: "Queued" });
    logJob("job.submitted", { jobId, backendId, sessionId });
    return handle;
  }

  /**
   * One poll raced against the wait deadline and the caller's signal. The
   * losing poll stops retrying; a late answer still updates the local record.
   */
  private async pollUntil(
    handle: JobHandle,
    deadline: number | undefined,
    timeoutMs: number | undefined,
    signal: AbortSignal | undefined
  ): Promise<Job> {
    const controller = new AbortController();
    let rejectStopped: (err: WaitTimeoutError | WaitAbortedError) => void = () => undefined;
    const stopped = new Promise<never>((_resolve, reject) => {
      rejectStopped = reject;
    });
    const stop = (err: WaitTimeoutError | WaitAbortedError) => {
      controller.abort();
      rejectStopped(err);
    };

    const timer =
      deadline != null
        ? setTimeout(() => stop(this.timedOut(handle, timeoutMs)), Math.max(0, deadline - this.now()))
        : undefined;
    const onAbort = () => stop(this.aborted(handle));
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      return await Promise.race([this.poll(handle, controller.signal), stopped]);
    } catch (err) {
      if (signal?.aborted) throw this.aborted(handle);
      throw err;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private record(handle: JobHandle, transition: JobTransition): Job {
    const base = {
      jobId: handle.jobId,
      backendId: handle.backendId,
      sessionId: handle.sessionId,
      submittedAt: handle.submittedAt,
      updatedAt: new Date(this.now())
    };
    const job: Job = { ...base, ...transition };
    this.jobs.set(handle.jobId, job);

    if (isTerminalState(job.state)) {
      logJob("job.terminal", { jobId: job.jobId, state: job.state });
    }
    return job;
  }

  private timedOut(handle: JobHandle, timeoutMs: number | undefined): WaitTimeoutError {
    const lastState = this.jobs.get(handle.jobId)?.state ?? "Queued";
    return new WaitTimeoutError({
      message: `Job ${handle.jobId} still ${lastState} after ${String(timeoutMs)}ms`,
      context: { jobId: handle.jobId, timeoutMs: timeoutMs ?? null, lastState }
    });
  }

  private aborted(handle: JobHandle): WaitAbortedError {
    return new WaitAbortedError({
      message: `Stopped waiting for job ${handle.jobId}; the job itself was not cancelled`,
      context: { jobId: handle.jobId }
    });
  }
}
