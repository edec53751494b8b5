import type { PrimitiveOptions, PrimitiveOptionsInput } from "./primitiveOptions";

export type PrimitiveKind = "sampler" | "estimator";

/**
 * An already-transpiled program. `parameters` declares the order in which
 * bound values are applied; `numQubits`, when known, constrains observables.
 */
export type ProgramReference = {
  readonly name: string;
  readonly source: string;
  readonly parameters?: readonly string[];
  readonly numQubits?: number;
};

/** One binding set (`[p0, p1, ...]`) or a sweep of them (`[[...], [...]]`). */
export type ParameterValues = readonly number[] | readonly (readonly number[])[];

/** A Pauli label such as `"XZI"`, or a weighted sum `{ XZI: 0.5, ZZI: -1 }`. */
export type ObservableSpec = string | Readonly<Record<string, number>>;

export type PubTuple = readonly [
  program: ProgramReference,
  parameterValues?: ParameterValues | undefined,
  observables?: readonly ObservableSpec[] | undefined
];

export type PubLike = ProgramReference | PubTuple;

/**
 * Caller-facing request. Bare programs in `pubs` may take their parameter
 * values and observables from the positionally aligned arrays instead.
 */
export type PrimitiveRequest = {
  primitive: PrimitiveKind;
  pubs: ProgramReference | readonly PubLike[];
  parameterValues?: readonly (ParameterValues | undefined)[];
  observables?: readonly (readonly ObservableSpec[] | undefined)[];
  options?: PrimitiveOptionsInput;
};

export type ObservableTerms = Readonly<Record<string, number>>;

export type NormalizedPub = {
  readonly program: ProgramReference;
  /** Always rows of length `program.parameters.length`. */
  readonly parameterValues: readonly (readonly number[])[];
  readonly observables?: readonly ObservableTerms[];
  /** Broadcast shape of the pub; `[]` for a single evaluation. */
  readonly shape: readonly number[];
};

export type ValidatedRequest = {
  readonly primitive: PrimitiveKind;
  readonly pubs: readonly NormalizedPub[];
  readonly options: PrimitiveOptions;
};
