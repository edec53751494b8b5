import { InvalidConfigError } from "../../core/errors/runtime.errors";

export type SchedulerConfig = {
  pollInitialDelayMs: number;
  pollMaxDelayMs: number;
  pollJitterRatio: number;
  transportRetries: number;
  retryMinDelayMs: number;
  retryMaxDelayMs: number;
  waitConcurrency: number;
};

export type SchedulerConfigInput = Partial<SchedulerConfig>;

export const defaultSchedulerConfig: SchedulerConfig = {
  pollInitialDelayMs: 500,
  pollMaxDelayMs: 5000,
  pollJitterRatio: 0.2,
  transportRetries: 3,
  retryMinDelayMs: 250,
  retryMaxDelayMs: 5000,
  waitConcurrency: 5
};

export const schedulerCaps = {
  pollInitialDelayMs: { min: 1, max: 10000 },
  pollMaxDelayMs: { min: 1, max: 120000 },
  transportRetries: { min: 0, max: 10 },
  retryMinDelayMs: { min: 0, max: 10000 },
  retryMaxDelayMs: { min: 0, max: 120000 },
  waitConcurrency: { min: 1, max: 50 }
} as const;

const assertIntegerInRange = (name: string, value: number, range: { min: number; max: number }) => {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new InvalidConfigError({
      message: `${name}=${String(value)} is out of allowed range [${range.min}..${range.max}]`,
      context: { name }
    });
  }
};

export const validateSchedulerConfig = (config: SchedulerConfig): SchedulerConfig => {
  assertIntegerInRange("pollInitialDelayMs", config.pollInitialDelayMs, schedulerCaps.pollInitialDelayMs);
  assertIntegerInRange("pollMaxDelayMs", config.pollMaxDelayMs, schedulerCaps.pollMaxDelayMs);
  assertIntegerInRange("transportRetries", config.transportRetries, schedulerCaps.transportRetries);
  assertIntegerInRange("retryMinDelayMs", config.retryMinDelayMs, schedulerCaps.retryMinDelayMs);
  assertIntegerInRange("retryMaxDelayMs", config.retryMaxDelayMs, schedulerCaps.retryMaxDelayMs);
  assertIntegerInRange("waitConcurrency", config.waitConcurrency, schedulerCaps.waitConcurrency);

  if (config.pollMaxDelayMs < config.pollInitialDelayMs) {
    throw new InvalidConfigError({
      message: `pollMaxDelayMs=${config.pollMaxDelayMs} must be >= pollInitialDelayMs=${config.pollInitialDelayMs}`,
      context: { name: "pollMaxDelayMs" }
    });
  }
  if (!(config.pollJitterRatio >= 0 && config.pollJitterRatio <= 1)) {
    throw new InvalidConfigError({
      message: `pollJitterRatio=${String(config.pollJitterRatio)} is out of allowed range [0..1]`,
      context: { name: "pollJitterRatio" }
    });
  }
  return config;
};

export const resolveSchedulerConfig = (input: SchedulerConfigInput = {}): SchedulerConfig =>
  validateSchedulerConfig({
    pollInitialDelayMs: input.pollInitialDelayMs ?? defaultSchedulerConfig.pollInitialDelayMs,
    pollMaxDelayMs: input.pollMaxDelayMs ?? defaultSchedulerConfig.pollMaxDelayMs,
    pollJitterRatio: input.pollJitterRatio ?? defaultSchedulerConfig.pollJitterRatio,
    transportRetries: input.transportRetries ?? defaultSchedulerConfig.transportRetries,
    retryMinDelayMs: input.retryMinDelayMs ?? defaultSchedulerConfig.retryMinDelayMs,
    retryMaxDelayMs: input.retryMaxDelayMs ?? defaultSchedulerConfig.retryMaxDelayMs,
    waitConcurrency: input.waitConcurrency ?? defaultSchedulerConfig.waitConcurrency
  });
