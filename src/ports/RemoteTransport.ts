import type { Instance } from "../core/instance/instance.types";
import type { Backend } from "../core/backend/backend.types";
import type { JobResult, JobState } from "../core/job/job.types";
import type { JobPayload } from "../core/primitives/jobPayload";

export type SubmitJobResult = {
  jobId: string;
  sessionId: string | null;
};

export type SubmitJobOptions = {
  /** Ask the service to open a session with this job; set on a session's first submission. */
  startSession?: boolean;
};

export type RemoteJobStatus = {
  state: JobState;
  detail?: string;
};

/**
 * Authenticated channel to the execution service. Implementations make one
 * attempt per call and throw TransientTransportError / NonTransientTransportError;
 * retrying is the caller's job.
 */
export interface RemoteTransport {
  submitJob(backendId: string, payload: JobPayload, sessionId?: string, opts?: SubmitJobOptions): Promise<SubmitJobResult>;
  getStatus(jobId: string): Promise<RemoteJobStatus>;
  getResult(jobId: string): Promise<JobResult>;
  cancelJob(jobId: string): Promise<void>;
  listBackends(instanceId: string): Promise<Backend[]>;
  listInstances(): Promise<Instance[]>;
  closeSession(sessionId: string): Promise<void>;
}
