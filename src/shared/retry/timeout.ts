export class TimeoutElapsedError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`operation did not settle within ${timeoutMs}ms`);
    this.name = "TimeoutElapsedError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Races `promise` against a timer; the timer is always cleared. */
export const withTimeout = async <T>(promise: Promise<T>, timeoutMs: number): Promise<T> => {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutElapsedError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
};
