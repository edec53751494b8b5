import { BatchTooLargeError, InvalidRequestShapeError } from "../errors/runtime.errors";
import { parsePrimitiveOptions } from "./primitiveOptions";
import type {
  NormalizedPub,
  ObservableSpec,
  ObservableTerms,
  ParameterValues,
  PrimitiveKind,
  PrimitiveRequest,
  ProgramReference,
  PubLike,
  ValidatedRequest
} from "./primitive.types";

export type NormalizeLimits = {
  /** Advertised maximum batch size of the target backend. */
  maxBatch?: number;
};

const PAULI_LABEL = /^[IXYZ]+$/;

const shapeError = (pubIndex: number, message: string) =>
  new InvalidRequestShapeError({ message: `pub[${pubIndex}]: ${message}`, context: { pubIndex } });

export const isProgramReference = (value: unknown): value is ProgramReference =>
  typeof value === "object" && value !== null && !Array.isArray(value) && "source" in value;

const validateProgram = (program: ProgramReference, pubIndex: number): readonly string[] => {
  if (typeof program.name !== "string" || program.name.trim() === "") {
    throw shapeError(pubIndex, "program name must be a non-empty string");
  }
  if (typeof program.source !== "string" || program.source.trim() === "") {
    throw shapeError(pubIndex, `program ${program.name} has no source`);
  }
  if (program.numQubits != null && (!Number.isInteger(program.numQubits) || program.numQubits < 1)) {
    throw shapeError(pubIndex, `program ${program.name} numQubits must be a positive integer`);
  }

  const parameters = program.parameters ?? [];
  if (new Set(parameters).size !== parameters.length) {
    throw shapeError(pubIndex, `program ${program.name} declares duplicate parameters`);
  }
  return parameters;
};

const assertFiniteRow = (row: readonly unknown[], pubIndex: number): readonly number[] => {
  const numbers: number[] = [];
  for (const value of row) {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw shapeError(pubIndex, "parameter values must be finite numbers");
    }
    numbers.push(value);
  }
  return numbers;
};

/**
 * Broadcasts the given values against the declared parameters. A flat array
 * is one binding set (shape `[]`); an array of rows is a sweep (shape `[n]`).
 */
const normalizeParameterValues = (
  values: ParameterValues | undefined,
  declared: readonly string[],
  pubIndex: number
): { rows: readonly (readonly number[])[]; shape: readonly number[] } => {
  if (values == null || values.length === 0) {
    if (declared.length > 0) {
      throw shapeError(pubIndex, `program declares ${declared.length} parameters but no values were given`);
    }
    return { rows: [[]], shape: [] };
  }

  const entries: readonly (number | readonly number[])[] = values;
  const nested = entries.every((entry) => Array.isArray(entry));
  const flat = entries.every((entry) => typeof entry === "number");
  if (!nested && !flat) {
    throw shapeError(pubIndex, "parameter values mix scalars and arrays");
  }

  if (flat) {
    const row = assertFiniteRow(entries, pubIndex);
    if (row.length !== declared.length) {
      throw shapeError(pubIndex, `expected ${declared.length} parameter values, got ${row.length}`);
    }
    return { rows: [row], shape: [] };
  }

  const rows = entries.map((entry) => assertFiniteRow(typeof entry === "number" ? [entry] : entry, pubIndex));
  rows.forEach((row, rowIndex) => {
    if (row.length !== declared.length) {
      throw shapeError(
        pubIndex,
        `binding ${rowIndex} has ${row.length} values but the program declares ${declared.length} parameters`
      );
    }
  });
  return { rows, shape: [rows.length] };
};

const toObservableTerms = (spec: ObservableSpec, pubIndex: number): ObservableTerms => {
  if (typeof spec === "string") {
    if (!PAULI_LABEL.test(spec)) throw shapeError(pubIndex, `invalid Pauli label "${spec}"`);
    return { [spec]: 1 };
  }

  const entries = Object.entries(spec);
  if (entries.length === 0) throw shapeError(pubIndex, "observable has no terms");
  for (const [label, coefficient] of entries) {
    if (!PAULI_LABEL.test(label)) throw shapeError(pubIndex, `invalid Pauli label "${label}"`);
    if (typeof coefficient !== "number" || !Number.isFinite(coefficient)) {
      throw shapeError(pubIndex, `coefficient of ${label} must be a finite number`);
    }
  }
  return { ...spec };
};

const normalizeObservables = (
  specs: readonly ObservableSpec[] | undefined,
  program: ProgramReference,
  pubIndex: number
): readonly ObservableTerms[] => {
  if (specs == null || specs.length === 0) {
    throw shapeError(pubIndex, "estimator pubs need at least one observable");
  }

  const terms = specs.map((spec) => toObservableTerms(spec, pubIndex));
  const widths = new Set(terms.flatMap((term) => Object.keys(term).map((label) => label.length)));
  if (widths.size > 1) {
    throw shapeError(pubIndex, "observables act on different numbers of qubits");
  }
  const [width] = [...widths];
  if (program.numQubits != null && width !== program.numQubits) {
    throw shapeError(pubIndex, `observables act on ${String(width)} qubits but program has ${program.numQubits}`);
  }
  return terms;
};

const broadcastShapes = (
  parameterShape: readonly number[],
  observableCount: number,
  pubIndex: number
): readonly number[] => {
  const [bindings] = parameterShape;
  if (bindings == null) return [observableCount];
  if (observableCount === 1 || observableCount === bindings) return [bindings];
  throw shapeError(
    pubIndex,
    `cannot broadcast ${bindings} parameter bindings against ${observableCount} observables`
  );
};

type PubParts = {
  program: ProgramReference;
  parameterValues?: ParameterValues;
  observables?: readonly ObservableSpec[];
};

const splitPub = (
  pub: PubLike,
  pubIndex: number,
  alignedValues: ParameterValues | undefined,
  alignedObservables: readonly ObservableSpec[] | undefined
): PubParts => {
  if (isProgramReference(pub)) {
    return { program: pub, parameterValues: alignedValues, observables: alignedObservables };
  }
  const size: number = pub.length;
  if (size === 0 || size > 3 || !isProgramReference(pub[0])) {
    throw shapeError(pubIndex, "expected a program or a [program, parameterValues?, observables?] tuple");
  }

  const [program, parameterValues, observables] = pub;
  if (alignedValues != null && parameterValues != null) {
    throw shapeError(pubIndex, "parameter values given both in the tuple and alongside it");
  }
  if (alignedObservables != null && observables != null) {
    throw shapeError(pubIndex, "observables given both in the tuple and alongside it");
  }
  return {
    program,
    parameterValues: parameterValues ?? alignedValues,
    observables: observables ?? alignedObservables
  };
};

const normalizePub = (parts: PubParts, primitive: PrimitiveKind, pubIndex: number): NormalizedPub => {
  const declared = validateProgram(parts.program, pubIndex);
  const parameters = normalizeParameterValues(parts.parameterValues, declared, pubIndex);

  if (primitive === "sampler") {
    if (parts.observables != null) {
      throw shapeError(pubIndex, "sampler pubs do not take observables");
    }
    return { program: parts.program, parameterValues: parameters.rows, shape: parameters.shape };
  }

  const observables = normalizeObservables(parts.observables, parts.program, pubIndex);
  return {
    program: parts.program,
    parameterValues: parameters.rows,
    observables,
    shape: broadcastShapes(parameters.shape, observables.length, pubIndex)
  };
};

/**
 * Validates and normalizes a primitive request before anything is sent.
 * Throws InvalidRequestShape, BatchTooLarge or InvalidOptions.
 */
export const normalizePrimitiveRequest = (
  request: PrimitiveRequest,
  limits: NormalizeLimits = {}
): ValidatedRequest => {
  const pubs: readonly PubLike[] = isProgramReference(request.pubs) ? [request.pubs] : request.pubs;
  if (pubs.length === 0) {
    throw new InvalidRequestShapeError({ message: "Request contains no pubs", context: { pubs: 0 } });
  }

  const alignedLengths: number[] = [];
  if (request.parameterValues) alignedLengths.push(request.parameterValues.length);
  if (request.observables) alignedLengths.push(request.observables.length);
  if (alignedLengths.some((length) => length !== pubs.length)) {
    throw new InvalidRequestShapeError({
      message: `Aligned parameterValues/observables must have one entry per pub (${pubs.length})`,
      context: { pubs: pubs.length }
    });
  }

  if (limits.maxBatch != null && pubs.length > limits.maxBatch) {
    throw new BatchTooLargeError({
      message: `Request has ${pubs.length} pubs but the backend accepts at most ${limits.maxBatch}`,
      context: { pubs: pubs.length, maxBatch: limits.maxBatch }
    });
  }

  const options = parsePrimitiveOptions(request.options, request.primitive);
  const normalized = pubs.map((pub, index) =>
    normalizePub(
      splitPub(pub, index, request.parameterValues?.[index], request.observables?.[index]),
      request.primitive,
      index
    )
  );

  return { primitive: request.primitive, pubs: normalized, options };
};
