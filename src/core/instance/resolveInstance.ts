import {
  AmbiguousInstanceError,
  InstanceNotAuthorizedError,
  NoInstanceForBackendError
} from "../errors/runtime.errors";
import { canReach, DEFAULT_OPEN_INSTANCE_ID, type Instance } from "./instance.types";

export type ResolveInstanceInput = {
  explicitInstance?: string;
  availableInstances: readonly Instance[];
  targetBackend?: string;
  /** Id of the shared open instance that is only picked as a last resort. */
  defaultInstanceId?: string;
};

/**
 * Picks exactly one instance. Pure: same input, same instance or same error.
 *
 * Order (first match wins):
 * 1. explicit instance that is listed and reaches the target backend
 * 2. explicit instance otherwise -> InstanceNotAuthorized
 * 3. the only listed instance
 * 4. with a target backend: the only instance reaching it, none -> NoInstanceForBackend,
 *    several -> first non-default one in listing order (default when all are default)
 * 5. AmbiguousInstance
 */
export const resolveInstance = (input: ResolveInstanceInput): Instance => {
  const { explicitInstance, availableInstances, targetBackend } = input;
  const defaultInstanceId = input.defaultInstanceId ?? DEFAULT_OPEN_INSTANCE_ID;

  if (explicitInstance != null) {
    const listed = availableInstances.find((instance) => instance.id === explicitInstance);
    if (listed && (targetBackend == null || canReach(listed, targetBackend))) {
      return listed;
    }

    const reason = listed
      ? `cannot reach backend ${String(targetBackend)}`
      : "is not in the list of available instances";
    throw new InstanceNotAuthorizedError({
      message: `Instance ${explicitInstance} ${reason}`,
      context: { instance: explicitInstance, backend: targetBackend ?? null }
    });
  }

  const [only] = availableInstances;
  if (availableInstances.length === 1 && only) {
    return only;
  }

  if (targetBackend != null) {
    const reaching = availableInstances.filter((instance) => canReach(instance, targetBackend));
    const [first] = reaching;
    if (!first) {
      throw new NoInstanceForBackendError({
        message: `No available instance can reach backend ${targetBackend}`,
        context: { backend: targetBackend, available: availableInstances.length }
      });
    }
    if (reaching.length === 1) return first;

    return reaching.find((instance) => instance.id !== defaultInstanceId) ?? first;
  }

  throw new AmbiguousInstanceError({
    message:
      availableInstances.length === 0
        ? "No instances are available to this account"
        : `Cannot choose between ${availableInstances.length} instances without an instance or backend`,
    context: { available: availableInstances.length }
  });
};
