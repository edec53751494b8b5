/**
 * Status snapshot of a remote execution target. Load changes continuously, so
 * a Backend is only trusted for the call that fetched it.
 */
export type Backend = {
  readonly id: string;
  readonly operational: boolean;
  readonly simulator: boolean;
  readonly queueLength: number;
  readonly maxBatch: number;
};

export type BackendFilter = {
  operational?: boolean;
  simulator?: boolean;
};

export const matchesFilter = (backend: Backend, filter: BackendFilter): boolean => {
  if (filter.operational != null && backend.operational !== filter.operational) return false;
  if (filter.simulator != null && backend.simulator !== filter.simulator) return false;
  return true;
};
