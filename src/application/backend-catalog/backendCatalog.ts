import { matchesFilter, type Backend, type BackendFilter } from "../../core/backend/backend.types";
import { pickLeastBusy } from "../../core/backend/pickLeastBusy";
import { NoEligibleBackendError } from "../../core/errors/runtime.errors";
import type { Instance } from "../../core/instance/instance.types";
import type { RemoteTransport } from "../../ports/RemoteTransport";
import { callTransport } from "../jobs/transport.error-handler";
import type { SchedulerConfig } from "../jobs/scheduler.config";

export type BackendCatalogDeps = {
  transport: RemoteTransport;
  config: SchedulerConfig;
  randomFn?: () => number;
};

const describeFilter = (filter: BackendFilter): string => {
  const parts: string[] = [];
  if (filter.operational != null) parts.push(`operational=${String(filter.operational)}`);
  if (filter.simulator != null) parts.push(`simulator=${String(filter.simulator)}`);
  return parts.length > 0 ? parts.join(", ") : "no filter";
};

/**
 * Read-only view of the backends an instance can reach. Nothing is cached:
 * every call lists again, since queue lengths go stale immediately.
 */
export class BackendCatalog {
  private readonly transport: RemoteTransport;
  private readonly config: SchedulerConfig;
  private readonly randomFn?: () => number;

  constructor(deps: BackendCatalogDeps) {
    this.transport = deps.transport;
    this.config = deps.config;
    this.randomFn = deps.randomFn;
  }

  async list(instance: Instance, filter: BackendFilter = {}): Promise<Backend[]> {
    const backends = await callTransport("listBackends", () => this.transport.listBackends(instance.id), this.config, {
      randomFn: this.randomFn
    });
    return backends.filter((backend) => matchesFilter(backend, filter));
  }

  async get(instance: Instance, backendId: string): Promise<Backend> {
    const backends = await this.list(instance);
    const found = backends.find((backend) => backend.id === backendId);
    if (!found) {
      throw new NoEligibleBackendError({
        message: `Backend ${backendId} is not visible to instance ${instance.id}`,
        context: { instance: instance.id, backend: backendId }
      });
    }
    return found;
  }

  /** Defaults to operational, non-simulator backends. */
  async leastBusy(instance: Instance, filter: BackendFilter = {}): Promise<Backend> {
    const effective: BackendFilter = {
      operational: filter.operational ?? true,
      simulator: filter.simulator ?? false
    };
    const chosen = pickLeastBusy(await this.list(instance, effective));
    if (!chosen) {
      throw new NoEligibleBackendError({
        message: `No backend of instance ${instance.id} matches ${describeFilter(effective)}`,
        context: { instance: instance.id }
      });
    }
    return chosen;
  }
}
