import { z } from "zod";
import { InvalidOptionsError } from "../errors/runtime.errors";
import type { PrimitiveKind } from "./primitive.types";

const zAutoOrPositiveInt = z.union([z.literal("auto"), z.number().int().min(1)]);

const zExecutionOptions = z
  .object({
    initQubits: z.boolean().optional(),
    repDelay: z.number().min(0).optional()
  })
  .strict();

const zTwirlingOptions = z
  .object({
    enableGates: z.boolean().optional(),
    enableMeasure: z.boolean().optional(),
    numRandomizations: zAutoOrPositiveInt.optional(),
    shotsPerRandomization: zAutoOrPositiveInt.optional(),
    strategy: z.enum(["active", "active-accum", "active-circuit", "all"]).optional()
  })
  .strict();

const zDynamicalDecouplingOptions = z
  .object({
    enable: z.boolean().optional(),
    sequenceType: z.enum(["XX", "XpXm", "XY4"]).optional(),
    extraSlackDistribution: z.enum(["middle", "edges"]).optional(),
    schedulingMethod: z.enum(["alap", "asap"]).optional()
  })
  .strict();

/**
 * Recognized per-request options. Unknown keys are rejected.
 *
 * - `defaultShots`: sampling repetition count
 * - `defaultPrecision`: target standard-error bound for estimation
 * - `resilienceLevel`: built-in error-mitigation strategy (0 none, 1 readout, 2 extrapolation)
 * - `execution`, `twirling`, `dynamicalDecoupling`: forwarded to the service as-is
 * - `maxExecutionTimeSec`: service-side execution ceiling for the job
 * - `jobTags`: labels attached to the job for later filtering
 */
export const zPrimitiveOptions = z
  .object({
    defaultShots: z.number().int().min(1).optional(),
    defaultPrecision: z.number().gt(0).max(1).optional(),
    resilienceLevel: z.union([z.literal(0), z.literal(1), z.literal(2)]).optional(),
    execution: zExecutionOptions.optional(),
    twirling: zTwirlingOptions.optional(),
    dynamicalDecoupling: zDynamicalDecouplingOptions.optional(),
    maxExecutionTimeSec: z.number().int().min(1).optional(),
    jobTags: z.array(z.string().trim().min(1)).optional()
  })
  .strict();

export type PrimitiveOptionsInput = z.input<typeof zPrimitiveOptions>;
export type PrimitiveOptions = z.output<typeof zPrimitiveOptions>;

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");

export const parsePrimitiveOptions = (input: unknown, primitive: PrimitiveKind): PrimitiveOptions => {
  const parsed = zPrimitiveOptions.safeParse(input ?? {});
  if (!parsed.success) {
    throw new InvalidOptionsError({
      message: `Invalid ${primitive} options: ${formatIssues(parsed.error)}`,
      context: { primitive }
    });
  }

  if (primitive === "sampler" && parsed.data.defaultPrecision != null) {
    throw new InvalidOptionsError({
      message: "Invalid sampler options: defaultPrecision only applies to estimator requests",
      context: { primitive }
    });
  }

  return parsed.data;
};

export type WireOptions = Record<string, string | number | boolean | string[] | Record<string, string | number | boolean>>;

const toSnakeCase = (key: string): string => key.replace(/[A-Z]/g, (ch) => `_${ch.toLowerCase()}`);

const compactGroup = (
  group: Record<string, string | number | boolean | undefined> | undefined
): Record<string, string | number | boolean> | undefined => {
  if (group == null) return undefined;
  const entries = Object.entries(group).flatMap(([key, value]) =>
    value === undefined ? [] : [[toSnakeCase(key), value] as const]
  );
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
};

/** Snake-case wire form; unset keys are left out. */
export const toWireOptions = (options: PrimitiveOptions): WireOptions => {
  const wire: WireOptions = {};
  if (options.defaultShots != null) wire.default_shots = options.defaultShots;
  if (options.defaultPrecision != null) wire.default_precision = options.defaultPrecision;
  if (options.resilienceLevel != null) wire.resilience_level = options.resilienceLevel;
  if (options.maxExecutionTimeSec != null) wire.max_execution_time = options.maxExecutionTimeSec;
  if (options.jobTags != null && options.jobTags.length > 0) wire.job_tags = [...options.jobTags];

  const execution = compactGroup(options.execution);
  if (execution) wire.execution = execution;
  const twirling = compactGroup(options.twirling);
  if (twirling) wire.twirling = twirling;
  const dynamicalDecoupling = compactGroup(options.dynamicalDecoupling);
  if (dynamicalDecoupling) wire.dynamical_decoupling = dynamicalDecoupling;

  return wire;
};
