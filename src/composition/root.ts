import { BackendCatalog } from "../application/backend-catalog/backendCatalog";
import { JobScheduler } from "../application/jobs/jobScheduler";
import { RuntimeClient } from "../application/runtime/runtimeClient";
import { RuntimeApiHttpTransport } from "../infrastructure/runtime-api/RuntimeApiHttpTransport";
import type { PassManager } from "../ports/PassManager";
import type { RemoteTransport } from "../ports/RemoteTransport";
import { type AccountContext, validateAccountContext } from "../shared/config/account";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export type CreateRuntimeClientOptions = {
  passManager?: PassManager;
  defaultInstanceId?: string;
  /** Replaces the HTTP transport, e.g. with an in-memory one. */
  transport?: RemoteTransport;
};

/**
 * Builds a RuntimeClient for one account. Tunables come from RUNTIME_* env
 * variables; the account itself is never read from env or disk.
 */
export const createRuntimeClient = (
  account: AccountContext,
  env: NodeJS.ProcessEnv = process.env,
  options: CreateRuntimeClientOptions = {}
): RuntimeClient => {
  const validated = validateAccountContext(account);
  const config = loadRuntimeConfigFromEnv(env);

  const transport = options.transport ?? new RuntimeApiHttpTransport(validated, config.requestTimeoutMs);
  const scheduler = new JobScheduler({ transport, config: config.scheduler });
  const catalog = new BackendCatalog({ transport, config: scheduler.config });

  return new RuntimeClient({
    account: validated,
    transport,
    scheduler,
    catalog,
    sessionDefaults: config.session,
    passManager: options.passManager,
    defaultInstanceId: options.defaultInstanceId
  });
};
