import { createRuntimeClient } from "../../src/composition/root";
import { NonTransientTransportError, SessionClosedError } from "../../src/core/errors/runtime.errors";
import type { PrimitiveRequest } from "../../src/core/primitives/primitive.types";
import { startFakeRuntimeServer, type FakeRuntimeServer } from "../../src/fake-runtime-server";

const bell: PrimitiveRequest = {
  primitive: "sampler",
  pubs: { name: "bell", source: "h 0; cx 0 1; measure", numQubits: 2 },
  options: { defaultShots: 256 }
};

const env = { RUNTIME_POLL_INITIAL_MS: "5", RUNTIME_POLL_MAX_MS: "20" };

describe("RuntimeClient against the fake runtime service (e2e)", () => {
  let fake: FakeRuntimeServer;
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(async () => {
    fake = await startFakeRuntimeServer();
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
    await fake.close();
  });

  const client = (token = "test-token") =>
    createRuntimeClient({ channel: "cloud", token, url: fake.baseUrl }, env);

  it("submits to a named backend and returns its result", async () => {
    const runtime = client();

    const handle = await runtime.run(bell, { backend: "device_b" });
    const result = await runtime.scheduler.result(handle);

    expect(handle).toMatchObject({ jobId: "job-1", backendId: "device_b", sessionId: null });
    expect(result).toEqual({ job_id: "job-1", backend: "device_b", program_id: "sampler", pubs: 1 });
    expect(runtime.scheduler.job(handle)?.state).toBe("Done");
  });

  it("picks the least busy hardware backend of an instance", async () => {
    const backend = await client().leastBusy({}, { instance: "open/main/main" });

    expect(backend).toEqual({ id: "device_b", operational: true, simulator: false, queueLength: 4, maxBatch: 100 });
  });

  it("runs jobs in one session and stops it from accepting more on exit", async () => {
    const runtime = client();

    const handles = await runtime.withSession({ backend: "device_a" }, async (session) => {
      const first = await runtime.run(bell, { session });
      const second = await session.submit(bell);
      await runtime.scheduler.waitAll([first, second]);
      return [first, second];
    });

    expect(handles.map((handle) => handle.sessionId)).toEqual(["session-1", "session-1"]);
    expect(fake.state.sessions.get("session-1")).toEqual({ backend: "device_a", acceptingJobs: false });
    expect(fake.state.requests.map((request) => request.sessionId)).toEqual(["session-1", "session-1"]);
  });

  it("rejects submissions after the session is closed", async () => {
    const runtime = client();
    const session = await runtime.openSession({ backend: "device_b" });
    await session.submit(bell);
    await session.close();

    await expect(session.submit(bell)).rejects.toBeInstanceOf(SessionClosedError);
    expect(session.state).toBe("Closed");
    expect(fake.state.jobs.size).toBe(1);
  });

  it("cancels a queued job", async () => {
    const runtime = client();
    const handle = await runtime.run(bell, { backend: "device_b" });

    await runtime.scheduler.cancel(handle);
    const job = await runtime.scheduler.wait(handle);

    expect(job.state).toBe("Cancelled");
    expect(fake.state.jobs.get(handle.jobId)?.cancelled).toBe(true);
  });

  it("surfaces a rejected token as a non-transient error", async () => {
    await expect(client("wrong-token").listInstances()).rejects.toBeInstanceOf(NonTransientTransportError);
  });
});
