/**
 * Public representation of a download job.
 * Server-side paths never leave the process.
 */

import type { DownloadJob, JobStatus } from "../../repositories/jobRepository.js";
import type { QualityProfile } from "../../config/profiles.js";

export interface JobView {
  jobId: string;
  url: string;
  profile: QualityProfile;
  format: string | null;
  status: JobStatus;
  percent: number;
  stage: string;
  message: string;
  speed: string | null;
  eta: string | null;
  downloadedBytes: number | null;
  totalBytes: number | null;
  filename: string | null;
  error: string | null;
  createdAt: string;
  updatedAt: string;
}

export function toJobView(job: DownloadJob): JobView {
  return {
    jobId: job.id,
    url: job.url,
    profile: job.profile,
    format: job.format,
    status: job.status,
    percent: job.progress.percent,
    stage: job.progress.stage,
    message: job.progress.message,
    speed: job.progress.speed ?? null,
    eta: job.progress.eta ?? null,
    downloadedBytes: job.progress.downloadedBytes ?? null,
    totalBytes: job.progress.totalBytes ?? null,
    filename: job.filename,
    error: job.error,
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
  };
}
