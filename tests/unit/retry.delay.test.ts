import { defaultSchedulerConfig } from "../../src/application/jobs/scheduler.config";
import { toRetryDecision } from "../../src/application/jobs/transport.error-handler";
import { NonTransientTransportError, TransientTransportError } from "../../src/core/errors/runtime.errors";
import { computeBackoffDelay, retry } from "../../src/shared/retry/retry";

const rateLimited = (retryDelayMs?: number) =>
  new TransientTransportError({ message: "POST /jobs returned 429", status: 429, retryDelayMs });

describe("transport retry delays", () => {
  const failThenSucceed = async (failures: unknown[], delays: number[]) => {
    let calls = 0;
    const result = await retry(
      async () => {
        const failure = failures[calls];
        calls += 1;
        if (failure) throw failure;
        return { jobId: "job-1" };
      },
      {
        retries: 3,
        minDelayMs: 5,
        maxDelayMs: 10,
        jitterRatio: 0,
        shouldRetry: toRetryDecision,
        onRetry: ({ delayMs }) => {
          delays.push(delayMs);
        }
      }
    );
    return { result, calls };
  };

  it("waits as long as Retry-After asks, within the retry ceiling", async () => {
    const delays: number[] = [];

    const { result, calls } = await failThenSucceed([rateLimited(7), rateLimited(60000)], delays);

    expect(result).toEqual({ jobId: "job-1" });
    expect(calls).toBe(3);
    expect(delays).toEqual([7, 10]);
  });

  it("falls back to exponential backoff without Retry-After", async () => {
    const delays: number[] = [];

    await failThenSucceed([rateLimited(), rateLimited()], delays);

    expect(delays).toEqual([5, 10]);
  });

  it("does not wait on a non-transient failure", async () => {
    const delays: number[] = [];
    const forbidden = new NonTransientTransportError({ message: "POST /jobs returned 403", status: 403 });

    await expect(failThenSucceed([forbidden], delays)).rejects.toBe(forbidden);
    expect(delays).toEqual([]);
  });
});

describe("poll backoff with default scheduler settings", () => {
  const opts = {
    minDelayMs: defaultSchedulerConfig.pollInitialDelayMs,
    maxDelayMs: defaultSchedulerConfig.pollMaxDelayMs,
    jitterRatio: defaultSchedulerConfig.pollJitterRatio
  };

  it("doubles from the initial delay and caps at the maximum", () => {
    const delays = [0, 1, 2, 3, 4, 5].map((attempt) => computeBackoffDelay(attempt, { ...opts, randomFn: () => 0 }));

    expect(delays).toEqual([500, 1000, 2000, 4000, 5000, 5000]);
  });

  it("adds at most jitterRatio of the capped delay", () => {
    expect(computeBackoffDelay(3, { ...opts, randomFn: () => 1 })).toBe(4800);
    expect(computeBackoffDelay(5, { ...opts, randomFn: () => 0.5 })).toBe(5500);
  });

  it("caps a caller-provided delay as well", () => {
    expect(computeBackoffDelay(0, { ...opts, randomFn: () => 0 }, 60000)).toBe(5000);
  });
});
