import type { z } from "zod";

import type { Backend } from "../../core/backend/backend.types";
import { NonTransientTransportError, TransientTransportError } from "../../core/errors/runtime.errors";
import type { Instance } from "../../core/instance/instance.types";
import type { JobResult } from "../../core/job/job.types";
import type { JobPayload } from "../../core/primitives/jobPayload";
import type {
  RemoteJobStatus,
  RemoteTransport,
  SubmitJobOptions,
  SubmitJobResult
} from "../../ports/RemoteTransport";
import type { AccountContext } from "../../shared/config/account";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "../../shared/config/runtime.config";
import {
  normalizeRemoteStatus,
  zBackendsResponse,
  zInstancesResponse,
  zJobResultResponse,
  zJobStatusResponse,
  zSubmitJobResponse
} from "./runtimeApi.schemas";

type HttpMethod = "GET" | "POST" | "PATCH";

type RequestSpec = {
  method: HttpMethod;
  path: string[];
  query?: Record<string, string>;
  body?: unknown;
};

type RawResponse = {
  status: number;
  text: string;
  requestUrl: string;
};

const parseRetryAfter = (value: string | null): number | undefined => {
  if (value && /^\d+$/.test(value)) return Number(value) * 1000;
  return undefined;
};

/**
 * JSON-over-HTTP adapter for the execution service using native fetch.
 * One attempt per call; failures are classified, never retried here.
 * Errors carry the request URL without credentials and never the body.
 */
export class RuntimeApiHttpTransport implements RemoteTransport {
  constructor(
    private readonly account: AccountContext,
    private readonly timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS
  ) {}

  async submitJob(
    backendId: string,
    payload: JobPayload,
    sessionId?: string,
    opts: SubmitJobOptions = {}
  ): Promise<SubmitJobResult> {
    const body: Record<string, unknown> = {
      backend: backendId,
      program_id: payload.programId,
      params: payload.params
    };
    if (sessionId != null) body.session_id = sessionId;
    else if (opts.startSession) body.start_session = true;

    const res = await this.send({ method: "POST", path: ["jobs"], body });
    const parsed = this.parse(zSubmitJobResponse, res);
    return { jobId: parsed.id, sessionId: parsed.session_id ?? null };
  }

  async getStatus(jobId: string): Promise<RemoteJobStatus> {
    const res = await this.send({ method: "GET", path: ["jobs", jobId] });
    const parsed = this.parse(zJobStatusResponse, res);
    const state = normalizeRemoteStatus(parsed.status);
    if (!state) {
      throw new NonTransientTransportError({
        message: `Unknown status "${parsed.status}" reported for job ${jobId}`,
        status: res.status,
        requestUrl: res.requestUrl,
        context: { jobId }
      });
    }
    return parsed.reason ? { state, detail: parsed.reason } : { state };
  }

  async getResult(jobId: string): Promise<JobResult> {
    const res = await this.send({ method: "GET", path: ["jobs", jobId, "results"] });
    return this.parse(zJobResultResponse, res);
  }

  async cancelJob(jobId: string): Promise<void> {
    await this.send({ method: "POST", path: ["jobs", jobId, "cancel"] });
  }

  async listBackends(instanceId: string): Promise<Backend[]> {
    const res = await this.send({ method: "GET", path: ["backends"], query: { instance: instanceId } });
    const parsed = this.parse(zBackendsResponse, res);
    return parsed.backends.map((raw) => ({
      id: raw.name,
      operational: raw.operational,
      simulator: raw.simulator,
      queueLength: raw.pending_jobs,
      maxBatch: raw.max_batch
    }));
  }

  async listInstances(): Promise<Instance[]> {
    const res = await this.send({ method: "GET", path: ["instances"] });
    const parsed = this.parse(zInstancesResponse, res);
    return parsed.instances.map((raw) =>
      raw.priority ? { id: raw.id, backends: raw.backends, priorityClass: raw.priority } : { id: raw.id, backends: raw.backends }
    );
  }

  async closeSession(sessionId: string): Promise<void> {
    await this.send({ method: "PATCH", path: ["sessions", sessionId], body: { accepting_jobs: false } });
  }

  private buildUrl(spec: RequestSpec): URL {
    const url = new URL(this.account.url);
    const prefix = url.pathname.endsWith("/") ? url.pathname : `${url.pathname}/`;
    url.pathname = `${prefix}${spec.path.map((segment) => encodeURIComponent(segment)).join("/")}`;
    for (const [key, value] of Object.entries(spec.query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  private headers(withBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      Authorization: `Bearer ${this.account.token}`
    };
    if (withBody) headers["Content-Type"] = "application/json";
    if (this.account.instance) headers["X-Service-Instance"] = this.account.instance;
    return headers;
  }

  private async send(spec: RequestSpec): Promise<RawResponse> {
    const url = this.buildUrl(spec);
    const requestUrl = `${url.origin}${url.pathname}${url.search}`;
    const label = `${spec.method} ${url.pathname}`;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    let status: number;
    let retryAfter: string | null;
    let text: string;
    try {
      const res = await fetch(url.toString(), {
        method: spec.method,
        headers: this.headers(spec.body !== undefined),
        body: spec.body === undefined ? undefined : JSON.stringify(spec.body),
        signal: controller.signal
      });
      status = res.status;
      retryAfter = res.headers.get("retry-after");
      text = await res.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new TransientTransportError({
          message: `${label} timed out after ${this.timeoutMs}ms`,
          isTimeout: true,
          requestUrl
        });
      }
      throw new TransientTransportError({ message: `${label} could not reach the service`, requestUrl, cause: err });
    } finally {
      clearTimeout(timeout);
    }

    if (status === 429 || status >= 500) {
      throw new TransientTransportError({
        message: `${label} returned ${status}`,
        status,
        retryDelayMs: status === 429 ? parseRetryAfter(retryAfter) : undefined,
        requestUrl
      });
    }
    if (status >= 400) {
      throw new NonTransientTransportError({ message: `${label} returned ${status}`, status, requestUrl });
    }

    return { status, text, requestUrl };
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, res: RawResponse): T {
    let json: unknown;
    try {
      json = JSON.parse(res.text);
    } catch (err) {
      throw new NonTransientTransportError({
        message: `Response from ${res.requestUrl} is not valid JSON`,
        status: res.status,
        requestUrl: res.requestUrl,
        cause: err
      });
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
        .join("; ");
      throw new NonTransientTransportError({
        message: `Response from ${res.requestUrl} is malformed: ${issues}`,
        status: res.status,
        requestUrl: res.requestUrl
      });
    }
    return result.data;
  }
}
