export type JobState = "Queued" | "Running" | "Done" | "Cancelled" | "Failed";

export const TERMINAL_JOB_STATES: ReadonlySet<JobState> = new Set<JobState>(["Done", "Cancelled", "Failed"]);

export const isTerminalState = (state: JobState): boolean => TERMINAL_JOB_STATES.has(state);

export type JobResult = Readonly<Record<string, unknown>>;

/** Failure the service reported for the job itself. */
export type JobErrorDetail = {
  code: "JobFailed";
  message: string;
};

/** Returned by submit; identifies the job for every later call. */
export type JobHandle = {
  readonly jobId: string;
  readonly backendId: string;
  readonly sessionId: string | null;
  readonly submittedAt: Date;
};

type JobBase = JobHandle & {
  readonly updatedAt: Date;
  /** Service-provided explanation of the current state, if any. */
  readonly detail?: string;
};

export type Job =
  | (JobBase & { readonly state: "Queued" | "Running" | "Cancelled" })
  | (JobBase & { readonly state: "Done"; readonly result: JobResult })
  | (JobBase & { readonly state: "Failed"; readonly error: JobErrorDetail });
