import { toWireOptions, type WireOptions } from "./primitiveOptions";
import type { NormalizedPub, PrimitiveKind, ValidatedRequest } from "./primitive.types";

export type WirePub = {
  program: { name: string; source: string; parameters: string[] };
  parameter_values: number[][];
  observables?: Record<string, number>[];
  shape: number[];
};

export type JobPayload = {
  programId: PrimitiveKind;
  params: {
    version: 2;
    pubs: WirePub[];
    options: WireOptions;
  };
};

const toWirePub = (pub: NormalizedPub): WirePub => {
  const wire: WirePub = {
    program: {
      name: pub.program.name,
      source: pub.program.source,
      parameters: [...(pub.program.parameters ?? [])]
    },
    parameter_values: pub.parameterValues.map((row) => [...row]),
    shape: [...pub.shape]
  };
  if (pub.observables) {
    wire.observables = pub.observables.map((terms) => ({ ...terms }));
  }
  return wire;
};

/** Backend-agnostic payload the transport ships as-is. */
export const toJobPayload = (request: ValidatedRequest): JobPayload => ({
  programId: request.primitive,
  params: {
    version: 2,
    pubs: request.pubs.map(toWirePub),
    options: toWireOptions(request.options)
  }
});
