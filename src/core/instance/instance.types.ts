/**
 * An access scope through which backends are reached. Listed by the service,
 * never mutated client-side; refresh by listing again.
 */
export type Instance = {
  readonly id: string;
  readonly backends: readonly string[];
  readonly priorityClass?: string;
};

export const DEFAULT_OPEN_INSTANCE_ID = "open/main/main";

export const canReach = (instance: Instance, backendId: string): boolean => instance.backends.includes(backendId);
