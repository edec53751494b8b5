import { z } from "zod";

import type { JobState } from "../../core/job/job.types";

export const zSubmitJobResponse = z.object({
  id: z.string().min(1),
  session_id: z.string().min(1).nullish()
});

export const zJobStatusResponse = z.object({
  id: z.string().min(1),
  status: z.string(),
  reason: z.string().nullish()
});

export const zJobResultResponse = z.record(z.unknown());

export const zBackendsResponse = z.object({
  backends: z.array(
    z.object({
      name: z.string().min(1),
      operational: z.boolean(),
      simulator: z.boolean(),
      pending_jobs: z.number().int().min(0),
      max_batch: z.number().int().min(1)
    })
  )
});

export const zInstancesResponse = z.object({
  instances: z.array(
    z.object({
      id: z.string().min(1),
      backends: z.array(z.string().min(1)),
      priority: z.string().nullish()
    })
  )
});

/** Maps the service's status vocabulary onto job states; undefined when unknown. */
export const normalizeRemoteStatus = (raw: string): JobState | undefined => {
  switch (raw.trim().toUpperCase()) {
    case "QUEUED":
      return "Queued";
    case "RUNNING":
      return "Running";
    case "COMPLETED":
    case "DONE":
      return "Done";
    case "CANCELLED":
    case "CANCELED":
      return "Cancelled";
    case "FAILED":
    case "ERROR":
      return "Failed";
    default:
      return undefined;
  }
};
