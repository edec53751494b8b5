import {
  defaultSchedulerConfig,
  schedulerCaps,
  type SchedulerConfig,
  validateSchedulerConfig
} from "../../application/jobs/scheduler.config";
import {
  defaultSessionConfig,
  resolveSessionConfig,
  sessionCaps,
  type SessionConfig
} from "../../application/session/session.config";
import { InvalidConfigError } from "../../core/errors/runtime.errors";

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export const runtimeCaps = {
  requestTimeoutMs: { min: 1000, max: 300000 }
} as const;

export type RuntimeConfig = {
  scheduler: SchedulerConfig;
  session: SessionConfig;
  requestTimeoutMs: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new InvalidConfigError({
      message: `${name}=${raw} is out of allowed range [${range.min}..${range.max}]`,
      context: { name }
    });
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const scheduler = validateSchedulerConfig({
    ...defaultSchedulerConfig,
    pollInitialDelayMs:
      parseOptionalIntInRange(env, "RUNTIME_POLL_INITIAL_MS", schedulerCaps.pollInitialDelayMs) ??
      defaultSchedulerConfig.pollInitialDelayMs,
    pollMaxDelayMs:
      parseOptionalIntInRange(env, "RUNTIME_POLL_MAX_MS", schedulerCaps.pollMaxDelayMs) ??
      defaultSchedulerConfig.pollMaxDelayMs,
    transportRetries:
      parseOptionalIntInRange(env, "RUNTIME_TRANSPORT_RETRIES", schedulerCaps.transportRetries) ??
      defaultSchedulerConfig.transportRetries
  });

  const session = resolveSessionConfig({
    maxTimeMs:
      parseOptionalIntInRange(env, "RUNTIME_SESSION_MAX_TIME_MS", sessionCaps.maxTimeMs) ??
      defaultSessionConfig.maxTimeMs,
    idleTimeoutMs:
      parseOptionalIntInRange(env, "RUNTIME_SESSION_IDLE_TIMEOUT_MS", sessionCaps.idleTimeoutMs) ??
      defaultSessionConfig.idleTimeoutMs
  });

  const requestTimeoutMs =
    parseOptionalIntInRange(env, "RUNTIME_REQUEST_TIMEOUT_MS", runtimeCaps.requestTimeoutMs) ??
    DEFAULT_REQUEST_TIMEOUT_MS;

  return { scheduler, session, requestTimeoutMs };
};
