export * from "./core/errors/runtime.errors";
export type { Instance } from "./core/instance/instance.types";
export { DEFAULT_OPEN_INSTANCE_ID } from "./core/instance/instance.types";
export { resolveInstance, type ResolveInstanceInput } from "./core/instance/resolveInstance";
export type { Backend, BackendFilter } from "./core/backend/backend.types";
export { pickLeastBusy } from "./core/backend/pickLeastBusy";
export type { Job, JobErrorDetail, JobHandle, JobResult, JobState } from "./core/job/job.types";
export { isTerminalState } from "./core/job/job.types";
export type {
  ObservableSpec,
  ParameterValues,
  PrimitiveKind,
  PrimitiveRequest,
  ProgramReference,
  PubLike,
  PubTuple,
  ValidatedRequest
} from "./core/primitives/primitive.types";
export type { PrimitiveOptions, PrimitiveOptionsInput } from "./core/primitives/primitiveOptions";
export { normalizePrimitiveRequest } from "./core/primitives/normalizePrimitiveRequest";
export { toJobPayload, type JobPayload } from "./core/primitives/jobPayload";

export type {
  RemoteJobStatus,
  RemoteTransport,
  SubmitJobOptions,
  SubmitJobResult
} from "./ports/RemoteTransport";
export type { PassManager } from "./ports/PassManager";

export { BackendCatalog } from "./application/backend-catalog/backendCatalog";
export { JobScheduler, type WaitOptions } from "./application/jobs/jobScheduler";
export type { SchedulerConfig, SchedulerConfigInput } from "./application/jobs/scheduler.config";
export { Session, withSession, type SessionCloseReason, type SessionState } from "./application/session/session";
export type { SessionConfig, SessionConfigInput } from "./application/session/session.config";
export { RuntimeClient, type RunTarget, type SessionTarget, type TargetSelection } from "./application/runtime/runtimeClient";

export { RuntimeApiHttpTransport } from "./infrastructure/runtime-api/RuntimeApiHttpTransport";
export { validateAccountContext, type AccountChannel, type AccountContext } from "./shared/config/account";
export { loadRuntimeConfigFromEnv, type RuntimeConfig } from "./shared/config/runtime.config";
export { createRuntimeClient, type CreateRuntimeClientOptions } from "./composition/root";
