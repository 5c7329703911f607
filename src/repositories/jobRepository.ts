/**
 * Job Repository
 * In-memory store of download jobs. Nothing is persisted: a job lives from
 * submission until its artifact is served, it fails, or it expires.
 */

import type { JobStage, ProgressEvent } from "../utils/progressParser.js";
import type { QualityProfile } from "../config/profiles.js";

export type JobStatus = JobStage;

export interface DownloadJob {
  id: string;
  url: string;
  profile: QualityProfile;
  format: string | null;
  status: JobStatus;
  progress: ProgressEvent;
  /** Directory owned by this job; removed on cleanup */
  workDir: string | null;
  filename: string | null;
  filepath: string | null;
  error: string | null;
  /** Set once the artifact has been handed to a client */
  served: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateJobInput {
  id: string;
  url: string;
  profile: QualityProfile;
  format?: string;
}

export type JobUpdate = Partial<
  Pick<DownloadJob, "status" | "progress" | "workDir" | "filename" | "filepath" | "error" | "served">
>;

const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set(["finished", "error", "cancelled"]);

const jobs = new Map<string, DownloadJob>();

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * Creates a new job record in the queued state.
 */
export function createJob(input: CreateJobInput): DownloadJob {
  if (jobs.has(input.id)) {
    throw new Error(`Job ${input.id} already exists`);
  }

  const now = new Date();
  const job: DownloadJob = {
    id: input.id,
    url: input.url,
    profile: input.profile,
    format: input.format ?? null,
    status: "queued",
    progress: { percent: 0, stage: "queued", message: "Waiting for a free download slot" },
    workDir: null,
    filename: null,
    filepath: null,
    error: null,
    served: false,
    createdAt: now,
    updatedAt: now,
  };
  jobs.set(job.id, job);
  return job;
}

export function findById(id: string): DownloadJob | null {
  return jobs.get(id) ?? null;
}

/**
 * Applies a partial update and returns the updated job, or null if the job is gone.
 */
export function updateJob(id: string, update: JobUpdate): DownloadJob | null {
  const job = jobs.get(id);
  if (!job) {
    return null;
  }
  Object.assign(job, update, { updatedAt: new Date() });
  return job;
}

export function deleteJob(id: string): boolean {
  return jobs.delete(id);
}

export function listJobs(): DownloadJob[] {
  return [...jobs.values()];
}

/**
 * Jobs created before the cutoff.
 */
export function findCreatedBefore(cutoff: Date): DownloadJob[] {
  return listJobs().filter((job) => job.createdAt.getTime() < cutoff.getTime());
}

/**
 * Drops every job. Used on shutdown and between tests.
 */
export function clearJobs(): void {
  jobs.clear();
}
