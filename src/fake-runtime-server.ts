import http from "http";
import { URL } from "url";

/**
 * Minimal in-memory execution service for local runs and E2E.
 * - GET /instances, GET /backends?instance=...
 * - POST /jobs, GET /jobs/:id, GET /jobs/:id/results, POST /jobs/:id/cancel
 * - PATCH /sessions/:id
 * Each status read advances a job one step along `statusSequence`.
 */
export type FakeInstance = { id: string; backends: string[]; priority?: string };

export type FakeBackend = {
  name: string;
  operational: boolean;
  simulator: boolean;
  pending_jobs: number;
  max_batch: number;
};

export type FakeJob = {
  id: string;
  backend: string;
  programId: string;
  sessionId: string | null;
  pubCount: number;
  statusReads: number;
  cancelled: boolean;
};

export type FakeRequest = { method: string; path: string; sessionId: string | null };

export type FakeRuntimeOptions = {
  token?: string;
  instances?: FakeInstance[];
  backends?: FakeBackend[];
  statusSequence?: string[];
};

export type FakeRuntimeState = {
  jobs: Map<string, FakeJob>;
  sessions: Map<string, { backend: string; acceptingJobs: boolean }>;
  requests: FakeRequest[];
};

export type FakeRuntimeServer = {
  baseUrl: string;
  state: FakeRuntimeState;
  close: () => Promise<void>;
};

const defaultInstances: FakeInstance[] = [
  { id: "open/main/main", backends: ["sim_a", "device_a", "device_b"] },
  { id: "research/team/project", backends: ["device_a", "device_b"], priority: "premium" }
];

const defaultBackends: FakeBackend[] = [
  { name: "sim_a", operational: true, simulator: true, pending_jobs: 0, max_batch: 300 },
  { name: "device_a", operational: true, simulator: false, pending_jobs: 12, max_batch: 100 },
  { name: "device_b", operational: true, simulator: false, pending_jobs: 4, max_batch: 100 }
];

const TERMINAL = new Set(["COMPLETED", "CANCELLED", "FAILED"]);

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

const readBody = (req: http.IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });

const sendJson = (res: http.ServerResponse, status: number, body: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
};

const sendEmpty = (res: http.ServerResponse, status: number) => {
  res.writeHead(status);
  res.end();
};

export const createFakeRuntimeHandler = (options: FakeRuntimeOptions = {}) => {
  const token = options.token ?? "test-token";
  const instances = options.instances ?? defaultInstances;
  const backends = options.backends ?? defaultBackends;
  const statusSequence = options.statusSequence ?? ["QUEUED", "RUNNING", "COMPLETED"];
  const state: FakeRuntimeState = { jobs: new Map(), sessions: new Map(), requests: [] };
  let jobCounter = 0;
  let sessionCounter = 0;

  const statusOf = (job: FakeJob): string => {
    if (job.cancelled) return "CANCELLED";
    return statusSequence[Math.min(job.statusReads, statusSequence.length - 1)] ?? "QUEUED";
  };

  const submitJob = (res: http.ServerResponse, raw: string) => {
    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch {
      return sendJson(res, 400, { error: "invalid_json" });
    }
    if (!isRecord(body) || typeof body.backend !== "string" || typeof body.program_id !== "string") {
      return sendJson(res, 400, { error: "invalid_job" });
    }
    const backend = body.backend;
    if (!backends.some((candidate) => candidate.name === backend)) {
      return sendJson(res, 404, { error: "unknown_backend" });
    }

    let sessionId: string | null = null;
    if (typeof body.session_id === "string") {
      const session = state.sessions.get(body.session_id);
      if (!session || !session.acceptingJobs || session.backend !== backend) {
        return sendJson(res, 409, { error: "session_not_accepting_jobs" });
      }
      sessionId = body.session_id;
    } else if (body.start_session === true) {
      sessionCounter += 1;
      sessionId = `session-${sessionCounter}`;
      state.sessions.set(sessionId, { backend, acceptingJobs: true });
    }

    const params = isRecord(body.params) ? body.params : {};
    const pubs = Array.isArray(params.pubs) ? params.pubs : [];
    jobCounter += 1;
    const job: FakeJob = {
      id: `job-${jobCounter}`,
      backend,
      programId: body.program_id,
      sessionId,
      pubCount: pubs.length,
      statusReads: 0,
      cancelled: false
    };
    state.jobs.set(job.id, job);
    state.requests.push({ method: "POST", path: "/jobs", sessionId });
    return sendJson(res, 200, { id: job.id, session_id: sessionId });
  };

  const handler = (req: http.IncomingMessage, res: http.ServerResponse, raw: string) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";
    const segments = url.pathname.split("/").filter((segment) => segment !== "");

    if (req.headers.authorization !== `Bearer ${token}`) {
      return sendJson(res, 401, { error: "unauthorized" });
    }

    if (method === "GET" && url.pathname === "/instances") {
      return sendJson(res, 200, { instances });
    }

    if (method === "GET" && url.pathname === "/backends") {
      const instance = instances.find((candidate) => candidate.id === url.searchParams.get("instance"));
      if (!instance) return sendJson(res, 404, { error: "unknown_instance" });
      return sendJson(res, 200, {
        backends: backends.filter((backend) => instance.backends.includes(backend.name))
      });
    }

    if (method === "POST" && url.pathname === "/jobs") {
      return submitJob(res, raw);
    }

    if (segments[0] === "jobs" && segments[1]) {
      const job = state.jobs.get(segments[1]);
      if (!job) return sendJson(res, 404, { error: "unknown_job" });

      if (method === "GET" && segments.length === 2) {
        const status = statusOf(job);
        job.statusReads += 1;
        return sendJson(res, 200, { id: job.id, status });
      }
      if (method === "GET" && segments[2] === "results") {
        if (statusOf(job) !== "COMPLETED") return sendJson(res, 409, { error: "not_completed" });
        return sendJson(res, 200, { job_id: job.id, backend: job.backend, program_id: job.programId, pubs: job.pubCount });
      }
      if (method === "POST" && segments[2] === "cancel") {
        if (TERMINAL.has(statusOf(job))) return sendJson(res, 409, { error: "already_terminal" });
        job.cancelled = true;
        return sendEmpty(res, 204);
      }
    }

    if (method === "PATCH" && segments[0] === "sessions" && segments[1]) {
      const session = state.sessions.get(segments[1]);
      if (!session) return sendJson(res, 404, { error: "unknown_session" });
      session.acceptingJobs = false;
      return sendEmpty(res, 204);
    }

    return sendJson(res, 404, { error: "not_found" });
  };

  const listener = (req: http.IncomingMessage, res: http.ServerResponse) => {
    readBody(req).then(
      (raw) => handler(req, res, raw),
      () => sendJson(res, 400, { error: "unreadable_body" })
    );
  };

  return { listener, state };
};

export const startFakeRuntimeServer = async (
  options: FakeRuntimeOptions = {},
  port = 0
): Promise<FakeRuntimeServer> => {
  const { listener, state } = createFakeRuntimeHandler(options);
  const server = http.createServer(listener);
  await new Promise<void>((resolve) => {
    server.listen(port, "127.0.0.1", () => resolve());
  });

  const address = server.address();
  const boundPort = typeof address === "object" && address !== null ? address.port : port;
  return {
    baseUrl: `http://127.0.0.1:${boundPort}`,
    state,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};

if (require.main === module) {
  startFakeRuntimeServer({}, Number(process.env.FAKE_RUNTIME_PORT ?? 3999)).then(
    (fake) => {
      // eslint-disable-next-line no-console
      console.log(`Fake runtime service on ${fake.baseUrl}`);
    },
    (err: unknown) => {
      // eslint-disable-next-line no-console
      console.error(err);
      process.exit(1);
    }
  );
}
