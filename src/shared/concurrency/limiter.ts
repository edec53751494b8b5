export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Runs at most `concurrency` tasks at once; the rest wait in FIFO order.
 *   const limit = createLimiter(5);
 *   await Promise.all(handles.map((h) => limit(() => scheduler.wait(h))));
 */
export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be an integer >= 1, got ${String(concurrency)}`);
  }

  let running = 0;
  const waiting: Array<() => void> = [];

  const release = () => {
    running -= 1;
    const nextTask = waiting.shift();
    if (nextTask) {
      running += 1;
      nextTask();
    }
  };

  const acquire = (): Promise<void> => {
    if (running < concurrency) {
      running += 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => waiting.push(resolve));
  };

  return async <T>(task: () => Promise<T>): Promise<T> => {
    await acquire();
    try {
      return await task();
    } finally {
      release();
    }
  };
};
