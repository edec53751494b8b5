import type { Backend, BackendFilter } from "../../core/backend/backend.types";
import type { Instance } from "../../core/instance/instance.types";
import { resolveInstance } from "../../core/instance/resolveInstance";
import type { JobHandle } from "../../core/job/job.types";
import { isProgramReference } from "../../core/primitives/normalizePrimitiveRequest";
import type { PrimitiveRequest, PubLike } from "../../core/primitives/primitive.types";
import type { PassManager } from "../../ports/PassManager";
import type { RemoteTransport } from "../../ports/RemoteTransport";
import type { AccountContext } from "../../shared/config/account";
import type { BackendCatalog } from "../backend-catalog/backendCatalog";
import type { JobScheduler } from "../jobs/jobScheduler";
import { callTransport } from "../jobs/transport.error-handler";
import type { SessionConfigInput } from "../session/session.config";
import { Session, withSession } from "../session/session";

export type TargetSelection = {
  /** Instance id; falls back to the account's preferred instance. */
  instance?: string;
  /** Backend id; least-busy selection applies when omitted. */
  backend?: string;
};

export type RunTarget = TargetSelection & {
  /** Submit inside this session instead; instance and backend are then ignored. */
  session?: Session;
};

export type SessionTarget = TargetSelection & SessionConfigInput;

export type RuntimeClientDeps = {
  account: AccountContext;
  transport: RemoteTransport;
  scheduler: JobScheduler;
  catalog: BackendCatalog;
  sessionDefaults?: SessionConfigInput;
  passManager?: PassManager;
  defaultInstanceId?: string;
  randomFn?: () => number;
  now?: () => number;
};

/**
 * Entry point tying resolution, backend selection, sessions and the job
 * scheduler together. Instances and backends are listed again for every
 * selection; nothing is cached between calls.
 */
export class RuntimeClient {
  readonly scheduler: JobScheduler;
  readonly catalog: BackendCatalog;

  private readonly account: AccountContext;
  private readonly transport: RemoteTransport;
  private readonly sessionDefaults: SessionConfigInput;
  private readonly passManager?: PassManager;
  private readonly defaultInstanceId?: string;
  private readonly randomFn?: () => number;
  private readonly now?: () => number;

  constructor(deps: RuntimeClientDeps) {
    this.account = deps.account;
    this.transport = deps.transport;
    this.scheduler = deps.scheduler;
    this.catalog = deps.catalog;
    this.sessionDefaults = deps.sessionDefaults ?? {};
    this.passManager = deps.passManager;
    this.defaultInstanceId = deps.defaultInstanceId;
    this.randomFn = deps.randomFn;
    this.now = deps.now;
  }

  listInstances(): Promise<Instance[]> {
    return callTransport("listInstances", () => this.transport.listInstances(), this.scheduler.config, {
      randomFn: this.randomFn
    });
  }

  async resolveInstance(selection: TargetSelection = {}): Promise<Instance> {
    const availableInstances = await this.listInstances();
    return resolveInstance({
      explicitInstance: selection.instance ?? this.account.instance,
      availableInstances,
      targetBackend: selection.backend,
      defaultInstanceId: this.defaultInstanceId
    });
  }

  async leastBusy(filter: BackendFilter = {}, selection: Pick<TargetSelection, "instance"> = {}): Promise<Backend> {
    const instance = await this.resolveInstance(selection);
    return this.catalog.leastBusy(instance, filter);
  }

  async selectTarget(selection: TargetSelection = {}): Promise<{ instance: Instance; backend: Backend }> {
    const instance = await this.resolveInstance(selection);
    const backend =
      selection.backend != null
        ? await this.catalog.get(instance, selection.backend)
        : await this.catalog.leastBusy(instance);
    return { instance, backend };
  }

  async run(request: PrimitiveRequest, target: RunTarget = {}): Promise<JobHandle> {
    const { session } = target;
    if (session) {
      return session.submit(await this.transpile(request, session.backend));
    }

    const { backend } = await this.selectTarget(target);
    return this.scheduler.submit(await this.transpile(request, backend), backend);
  }

  async openSession(target: SessionTarget = {}): Promise<Session> {
    const { instance, backend } = await this.selectTarget(target);
    return Session.open(
      { scheduler: this.scheduler, transport: this.transport, now: this.now },
      {
        backend,
        instance,
        maxTimeMs: target.maxTimeMs ?? this.sessionDefaults.maxTimeMs,
        idleTimeoutMs: target.idleTimeoutMs ?? this.sessionDefaults.idleTimeoutMs,
        closeTimeoutMs: target.closeTimeoutMs ?? this.sessionDefaults.closeTimeoutMs
      }
    );
  }

  async withSession<T>(target: SessionTarget, fn: (session: Session) => Promise<T>): Promise<T> {
    return withSession(await this.openSession(target), fn);
  }

  private async transpile(request: PrimitiveRequest, backend: Backend): Promise<PrimitiveRequest> {
    const passManager = this.passManager;
    if (!passManager) return request;

    const pubs: readonly PubLike[] = isProgramReference(request.pubs) ? [request.pubs] : request.pubs;
    const rewritten = await Promise.all(
      pubs.map(async (pub): Promise<PubLike> => {
        if (isProgramReference(pub)) return passManager.run(pub, backend);

        // malformed tuples are left for normalization to report
        const size: number = pub.length;
        const [program, parameterValues, observables] = pub;
        if (size > 3 || !isProgramReference(program)) return pub;
        return [await passManager.run(program, backend), parameterValues, observables];
      })
    );
    return { ...request, pubs: rewritten };
  }
}
