import { InvalidConfigError } from "../../core/errors/runtime.errors";

export type SessionConfig = {
  /** Hard ceiling measured from open(). */
  maxTimeMs: number;
  /** Soft ceiling, restarted by every accepted job. */
  idleTimeoutMs: number;
  /** How long close() waits for the service to acknowledge. */
  closeTimeoutMs: number;
};

export type SessionConfigInput = Partial<SessionConfig>;

export const defaultSessionConfig: SessionConfig = {
  maxTimeMs: 8 * 60 * 60 * 1000,
  idleTimeoutMs: 5 * 60 * 1000,
  closeTimeoutMs: 5000
};

export const sessionCaps = {
  maxTimeMs: { min: 1, max: 7 * 24 * 60 * 60 * 1000 },
  idleTimeoutMs: { min: 1, max: 24 * 60 * 60 * 1000 },
  closeTimeoutMs: { min: 1, max: 60000 }
} as const;

export const resolveSessionConfig = (input: SessionConfigInput = {}): SessionConfig => {
  const config: SessionConfig = {
    maxTimeMs: input.maxTimeMs ?? defaultSessionConfig.maxTimeMs,
    idleTimeoutMs: input.idleTimeoutMs ?? defaultSessionConfig.idleTimeoutMs,
    closeTimeoutMs: input.closeTimeoutMs ?? defaultSessionConfig.closeTimeoutMs
  };
  for (const name of ["maxTimeMs", "idleTimeoutMs", "closeTimeoutMs"] as const) {
    const value = config[name];
    const range = sessionCaps[name];
    if (!Number.isInteger(value) || value < range.min || value > range.max) {
      throw new InvalidConfigError({
        message: `${name}=${String(value)} is out of allowed range [${range.min}..${range.max}]`,
        context: { name }
      });
    }
  }
  return config;
};
