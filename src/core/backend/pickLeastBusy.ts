import type { Backend } from "./backend.types";

const compareByLoad = (a: Backend, b: Backend): number => {
  if (a.queueLength !== b.queueLength) return a.queueLength - b.queueLength;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
};

/**
 * Smallest queue length wins, ties go to the lexically smallest id.
 * Returns undefined for an empty list.
 */
export const pickLeastBusy = (backends: readonly Backend[]): Backend | undefined =>
  backends.reduce<Backend | undefined>(
    (best, candidate) => (best == null || compareByLoad(candidate, best) < 0 ? candidate : best),
    undefined
  );
