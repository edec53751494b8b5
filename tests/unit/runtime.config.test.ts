import { defaultSchedulerConfig } from "../../src/application/jobs/scheduler.config";
import { defaultSessionConfig } from "../../src/application/session/session.config";
import { loadRuntimeConfigFromEnv } from "../../src/shared/config/runtime.config";

describe("runtime config caps", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadRuntimeConfigFromEnv({})).toEqual({
      scheduler: defaultSchedulerConfig,
      session: defaultSessionConfig,
      requestTimeoutMs: 30000
    });
  });

  it("treats blank values as unset", () => {
    expect(loadRuntimeConfigFromEnv({ RUNTIME_POLL_INITIAL_MS: " " }).scheduler.pollInitialDelayMs).toBe(500);
  });

  it("accepts boundary values within allowed caps", () => {
    const runtime = loadRuntimeConfigFromEnv({
      RUNTIME_POLL_INITIAL_MS: "1",
      RUNTIME_POLL_MAX_MS: "120000",
      RUNTIME_TRANSPORT_RETRIES: "0",
      RUNTIME_SESSION_MAX_TIME_MS: "604800000",
      RUNTIME_SESSION_IDLE_TIMEOUT_MS: "1",
      RUNTIME_REQUEST_TIMEOUT_MS: "1000"
    });

    expect(runtime).toEqual({
      scheduler: { ...defaultSchedulerConfig, pollInitialDelayMs: 1, pollMaxDelayMs: 120000, transportRetries: 0 },
      session: { ...defaultSessionConfig, maxTimeMs: 604800000, idleTimeoutMs: 1 },
      requestTimeoutMs: 1000
    });
  });

  it.each([
    ["RUNTIME_POLL_INITIAL_MS", "0", "[1..10000]"],
    ["RUNTIME_POLL_MAX_MS", "120001", "[1..120000]"],
    ["RUNTIME_TRANSPORT_RETRIES", "11", "[0..10]"],
    ["RUNTIME_SESSION_MAX_TIME_MS", "604800001", "[1..604800000]"],
    ["RUNTIME_SESSION_IDLE_TIMEOUT_MS", "1.5", "[1..86400000]"],
    ["RUNTIME_REQUEST_TIMEOUT_MS", "999", "[1000..300000]"],
    ["RUNTIME_REQUEST_TIMEOUT_MS", "abc", "[1000..300000]"]
  ])("rejects %s=%s", (name, value, range) => {
    expect(() => loadRuntimeConfigFromEnv({ [name]: value })).toThrow(`${name}=${value} is out of allowed range ${range}`);
  });

  it("rejects a poll ceiling below the initial delay", () => {
    expect(() => loadRuntimeConfigFromEnv({ RUNTIME_POLL_INITIAL_MS: "6000", RUNTIME_POLL_MAX_MS: "5000" })).toThrow(
      "pollMaxDelayMs=5000 must be >= pollInitialDelayMs=6000"
    );
  });
});
