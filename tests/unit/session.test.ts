import { JobScheduler } from "../../src/application/jobs/jobScheduler";
import { Session, withSession } from "../../src/application/session/session";
import {
  NonTransientTransportError,
  SessionClosedError,
  SessionExpiredError
} from "../../src/core/errors/runtime.errors";
import type { Instance } from "../../src/core/instance/instance.types";
import type { PrimitiveRequest } from "../../src/core/primitives/primitive.types";
import { createTransportStub, fastSchedulerConfig, makeBackend, type TransportStub } from "../helpers/transportStub";

const backend = makeBackend({ id: "device_a", maxBatch: 10 });
const instance: Instance = { id: "team/lab/project", backends: ["device_a"] };
const request: PrimitiveRequest = {
  primitive: "estimator",
  pubs: { name: "ghz", source: "h 0; cx 0 1", numQubits: 2 },
  observables: [["ZZ"]]
};

describe("Session", () => {
  let transport: TransportStub;
  let scheduler: JobScheduler;
  let clock: number;
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  const opened: Session[] = [];

  const open = (overrides: { idleTimeoutMs?: number; maxTimeMs?: number; closeTimeoutMs?: number } = {}) => {
    const session = Session.open(
      { scheduler, transport, now: () => clock },
      { backend, instance, idleTimeoutMs: 1000, maxTimeMs: 10000, closeTimeoutMs: 50, ...overrides }
    );
    opened.push(session);
    return session;
  };

  beforeEach(() => {
    clock = 0;
    transport = createTransportStub();
    transport.closeSession.mockResolvedValue(undefined);
    scheduler = new JobScheduler({ transport, config: fastSchedulerConfig, randomFn: () => 0 });
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await Promise.all(opened.splice(0).map((session) => session.close()));
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it("opens in Pending without contacting the service", () => {
    const session = open();

    expect(session.state).toBe("Pending");
    expect(session.id).toBeNull();
    expect(session.backendId).toBe("device_a");
    expect(session.instanceId).toBe("team/lab/project");
    expect(transport.submitJob).not.toHaveBeenCalled();
  });

  it("becomes Active with the id from the first acceptance and tags later jobs with it", async () => {
    transport.submitJob
      .mockResolvedValueOnce({ jobId: "job-1", sessionId: "session-9" })
      .mockResolvedValueOnce({ jobId: "job-2", sessionId: "session-9" });
    const session = open();

    const first = await session.submit(request);
    const second = await session.submit(request);

    expect(session.state).toBe("Active");
    expect(session.id).toBe("session-9");
    expect(first.sessionId).toBe("session-9");
    expect(second.sessionId).toBe("session-9");
    expect(transport.submitJob.mock.calls.map(([, , sessionId, opts]) => [sessionId, opts])).toEqual([
      [undefined, { startSession: true }],
      ["session-9", { startSession: false }]
    ]);
    expect(logSpy).toHaveBeenCalledWith(
      JSON.stringify({ event: "session.activated", sessionId: "session-9", backendId: "device_a" })
    );
  });

  it("accepts concurrent submissions in call order", async () => {
    transport.submitJob
      .mockImplementationOnce(
        () => new Promise((resolve) => setTimeout(() => resolve({ jobId: "job-1", sessionId: "session-3" }), 20))
      )
      .mockResolvedValueOnce({ jobId: "job-2", sessionId: "session-3" });
    const session = open();

    const [first, second] = await Promise.all([session.submit(request), session.submit(request)]);

    expect([first.jobId, second.jobId]).toEqual(["job-1", "job-2"]);
    expect(session.jobs().map((handle) => handle.jobId)).toEqual(["job-1", "job-2"]);
    expect(transport.submitJob.mock.calls[1]?.[2]).toBe("session-3");
  });

  it("rejects submissions after the idle timeout without calling the service", async () => {
    transport.submitJob.mockResolvedValueOnce({ jobId: "job-1", sessionId: "session-9" });
    const session = open();
    await session.submit(request);

    clock = 1000;
    const rejected = session.submit(request);

    await expect(rejected).rejects.toBeInstanceOf(SessionExpiredError);
    await expect(rejected).rejects.toThrow("Session exceeded its idle timeout");
    expect(transport.submitJob).toHaveBeenCalledTimes(1);

    await session.close();
    expect(session.state).toBe("Closed");
    expect(session.closeReason).toBe("idle_timeout");
    expect(transport.closeSession).toHaveBeenCalledWith("session-9");
  });

  it("restarts the idle window on every accepted job", async () => {
    transport.submitJob.mockResolvedValue({ jobId: "job-1", sessionId: "session-9" });
    const session = open();

    clock = 900;
    await session.submit(request);
    clock = 1800;
    await session.submit(request);

    expect(transport.submitJob).toHaveBeenCalledTimes(2);
    expect(session.state).toBe("Active");
  });

  it("rejects submissions past the max time even when active", async () => {
    transport.submitJob.mockResolvedValue({ jobId: "job-1", sessionId: "session-9" });
    const session = open({ idleTimeoutMs: 5000 });
    for (const now of [0, 4000, 8000]) {
      clock = now;
      await session.submit(request);
    }

    clock = 10000;

    await expect(session.submit(request)).rejects.toThrow("Session exceeded its max time");
    expect(transport.submitJob).toHaveBeenCalledTimes(3);
  });

  it("expires a pending session without notifying the service", async () => {
    const session = open();

    clock = 1000;
    await expect(session.submit(request)).rejects.toThrow(SessionExpiredError);
    await session.close();

    expect(transport.submitJob).not.toHaveBeenCalled();
    expect(transport.closeSession).not.toHaveBeenCalled();
    expect(session.state).toBe("Closed");
  });

  it("closes on its own once the idle timer fires", async () => {
    const session = open({ idleTimeoutMs: 20 });

    await new Promise((resolve) => setTimeout(resolve, 60));

    expect(session.state).toBe("Closed");
    expect(session.closeReason).toBe("idle_timeout");
  });

  describe("close", () => {
    it("is idempotent and rejects later submissions with SessionClosed", async () => {
      transport.submitJob.mockResolvedValueOnce({ jobId: "job-1", sessionId: "session-9" });
      const session = open();
      await session.submit(request);

      await Promise.all([session.close(), session.close()]);
      await session.close();

      expect(session.state).toBe("Closed");
      expect(session.closeReason).toBe("explicit");
      expect(transport.closeSession).toHaveBeenCalledTimes(1);
      await expect(session.submit(request)).rejects.toThrow(new SessionClosedError({ message: "Session is closed" }));
    });

    it("reaches Closed even when the service never acknowledges", async () => {
      transport.submitJob.mockResolvedValueOnce({ jobId: "job-1", sessionId: "session-9" });
      transport.closeSession.mockImplementation(() => new Promise<void>(() => undefined));
      const session = open({ closeTimeoutMs: 20 });
      await session.submit(request);

      await session.close();

      expect(session.state).toBe("Closed");
      expect(warnSpy).toHaveBeenCalledWith(
        JSON.stringify({
          event: "session.close_failed",
          sessionId: "session-9",
          backendId: "device_a",
          reason: "explicit",
          message: "operation did not settle within 20ms"
        })
      );
    });

    it("reaches Closed when the service rejects the close", async () => {
      transport.submitJob.mockResolvedValueOnce({ jobId: "job-1", sessionId: "session-9" });
      transport.closeSession.mockRejectedValue(new Error("connection reset"));
      const session = open();
      await session.submit(request);

      await expect(session.close()).resolves.toBeUndefined();
      expect(session.state).toBe("Closed");
    });

    it("reaches Closed within the close timeout when a submission never settles", async () => {
      transport.submitJob.mockImplementation(() => new Promise(() => undefined));
      const session = open({ closeTimeoutMs: 30 });
      void session.submit(request).catch(() => undefined);
      await Promise.resolve();

      await session.close();

      expect(session.state).toBe("Closed");
      expect(transport.closeSession).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledWith(
        JSON.stringify({
          event: "session.close_failed",
          sessionId: null,
          backendId: "device_a",
          reason: "explicit",
          message: "operation did not settle within 30ms"
        })
      );
    });

    it("waits for an in-flight submission before notifying the service", async () => {
      transport.submitJob.mockImplementationOnce(
        () => new Promise((resolve) => setTimeout(() => resolve({ jobId: "job-1", sessionId: "session-4" }), 20))
      );
      const session = open();

      const submitted = session.submit(request);
      await Promise.resolve();
      const closed = session.close();

      await expect(submitted).resolves.toMatchObject({ jobId: "job-1" });
      await closed;
      expect(transport.closeSession).toHaveBeenCalledWith("session-4");
    });
  });

  it("closes directly on a fatal transport error", async () => {
    transport.submitJob.mockRejectedValueOnce(
      new NonTransientTransportError({ message: "POST /jobs returned 403", status: 403 })
    );
    const session = open();

    await expect(session.submit(request)).rejects.toThrow("POST /jobs returned 403");

    expect(session.state).toBe("Closed");
    expect(session.closeReason).toBe("transport_error");
    await expect(session.submit(request)).rejects.toThrow(SessionClosedError);
    expect(transport.closeSession).not.toHaveBeenCalled();
  });

  describe("withSession", () => {
    it("closes the session after the scope returns", async () => {
      transport.submitJob.mockResolvedValueOnce({ jobId: "job-1", sessionId: "session-9" });
      const session = open();

      const handle = await withSession(session, (s) => s.submit(request));

      expect(handle.jobId).toBe("job-1");
      expect(session.state).toBe("Closed");
      expect(transport.closeSession).toHaveBeenCalledWith("session-9");
    });

    it("closes the session when the scope throws", async () => {
      transport.submitJob
        .mockResolvedValueOnce({ jobId: "job-1", sessionId: "session-9" })
        .mockResolvedValueOnce({ jobId: "job-2", sessionId: "session-9" });
      const session = open();

      await expect(
        withSession(session, async (s) => {
          await s.submit(request);
          await s.submit({ primitive: "estimator", pubs: [] });
        })
      ).rejects.toThrow("Request contains no pubs");

      expect(session.state).toBe("Closed");
      expect(transport.submitJob).toHaveBeenCalledTimes(1);
      expect(transport.closeSession).toHaveBeenCalledTimes(1);
    });
  });
});
