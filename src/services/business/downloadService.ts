/**
 * Download Service
 * Business logic for download jobs: start one yt-dlp process per job, relay its
 * progress, hand the finished file out once and clean up after it.
 */

import { randomUUID } from "crypto";
import path from "path";
import { FFMPEG_FASTSTART, MAX_CONCURRENT_DOWNLOADS, MAX_FILE_SIZE } from "../../config/env.js";
import { resolveFormatArgs } from "../../config/profiles.js";
import type { QualityProfile } from "../../config/profiles.js";
import {
  createJob,
  deleteJob,
  findById,
  findCreatedBefore,
  isTerminalStatus,
  listJobs,
  updateJob,
  clearJobs,
  type DownloadJob,
  type JobUpdate,
} from "../../repositories/jobRepository.js";
import { runDownload } from "../external/ytdlp.js";
import { ensureFaststart } from "../external/ffmpeg.js";
import { assertWithinSizeLimit, resolveArtifact } from "./artifactService.js";
import { publishProgress } from "./progressStreamService.js";
import { isMaxFilesizeAbort, parseProgressLine } from "../../utils/progressParser.js";
import { createJobDir, removeJobDir } from "../../utils/cleanupTemp.js";
import { Limiter } from "../../utils/concurrency.js";
import { AppError, ConflictError, NotFoundError } from "../../utils/errors.js";

export interface StartDownloadInput {
  url: string;
  profile: QualityProfile;
  format?: string;
}

export interface Artifact {
  filepath: string;
  filename: string;
}

const limiter = new Limiter(MAX_CONCURRENT_DOWNLOADS);
const controllers = new Map<string, AbortController>();
const running = new Map<string, Promise<void>>();

/**
 * Applies an update to a live job and publishes it.
 * Updates to jobs that are gone or already terminal are dropped.
 */
function transition(jobId: string, update: JobUpdate): DownloadJob | null {
  const current = findById(jobId);
  if (!current || isTerminalStatus(current.status)) {
    return null;
  }
  const job = updateJob(jobId, update);
  if (job) {
    publishProgress(job);
  }
  return job;
}

class JobCancelledError extends Error {
  constructor() {
    super("Download cancelled");
    this.name = "JobCancelledError";
  }
}

async function runJob(job: DownloadJob, signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return;
  }

  const workDir = await createJobDir(job.id);
  transition(job.id, {
    status: "starting",
    workDir,
    progress: { percent: 0, stage: "starting", message: "Starting downloader" },
  });

  const { format, extraArgs } = resolveFormatArgs(job.profile, job.format ?? undefined);
  let skippedAsTooLarge = false;

  try {
    await runDownload({
      url: job.url,
      format,
      extraArgs,
      outputDir: workDir,
      signal,
      onLine: (line) => {
        if (isMaxFilesizeAbort(line)) {
          skippedAsTooLarge = true;
        }
        const event = parseProgressLine(line);
        if (event) {
          transition(job.id, { status: event.stage, progress: event });
        }
      },
    });

    if (skippedAsTooLarge) {
      throw new AppError(`File too large: over the ${(MAX_FILE_SIZE / 1024 / 1024).toFixed(1)}MB limit`, 413);
    }

    transition(job.id, {
      status: "postprocessing",
      progress: { percent: 100, stage: "postprocessing", message: "Preparing file" },
    });

    let filepath = await resolveArtifact(workDir);
    await assertWithinSizeLimit(filepath, MAX_FILE_SIZE);
    if (FFMPEG_FASTSTART) {
      filepath = await ensureFaststart(filepath);
    }
    const size = await assertWithinSizeLimit(filepath, MAX_FILE_SIZE);

    if (signal.aborted) {
      throw new JobCancelledError();
    }

    const filename = path.basename(filepath);
    transition(job.id, {
      status: "finished",
      filepath,
      filename,
      progress: { percent: 100, stage: "finished", message: "Ready to download", totalBytes: size, downloadedBytes: size },
    });
    console.log(`[download] ✓ Job ${job.id} finished: ${filename} (${(size / 1024 / 1024).toFixed(1)}MB)`);
  } catch (error) {
    await removeJobDir(workDir);

    if (signal.aborted) {
      console.log(`[download] Job ${job.id} cancelled, temp files removed`);
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    console.error(`[download] ✗ Job ${job.id} failed: ${message}`);
    transition(job.id, {
      status: "error",
      error: message,
      workDir: null,
      progress: { percent: job.progress.percent, stage: "error", message },
    });
  }
}

/**
 * Creates a job and starts its download in the background.
 * The request has already been validated; the returned job is in the queued state.
 */
export function startDownload(input: StartDownloadInput): DownloadJob {
  const job = createJob({ id: randomUUID(), ...input });
  const controller = new AbortController();
  controllers.set(job.id, controller);

  console.log(`[download] Job ${job.id} queued: ${job.url} (${job.format ?? job.profile})`);

  const done = limiter
    .run(() => runJob(job, controller.signal))
    .catch((error) => {
      console.error(`[download] Job ${job.id} crashed:`, error);
      transition(job.id, {
        status: "error",
        error: "Internal error",
        progress: { percent: 0, stage: "error", message: "Internal error" },
      });
    })
    .finally(() => {
      controllers.delete(job.id);
      running.delete(job.id);
    });
  running.set(job.id, done);

  return job;
}

/**
 * Resolves once the job's background task has settled. Never rejects.
 */
export async function whenSettled(jobId: string): Promise<void> {
  await running.get(jobId);
}

export function getJob(jobId: string): DownloadJob {
  const job = findById(jobId);
  if (!job) {
    throw new NotFoundError("Job", jobId);
  }
  return job;
}

/**
 * Cancels a queued or running download by terminating its process.
 */
export async function cancelDownload(jobId: string): Promise<DownloadJob> {
  const job = getJob(jobId);
  if (isTerminalStatus(job.status)) {
    throw new ConflictError(`Download is already ${job.status}`);
  }

  const wasQueued = job.status === "queued";
  transition(jobId, {
    status: "cancelled",
    progress: { percent: job.progress.percent, stage: "cancelled", message: "Cancelled" },
  });
  controllers.get(jobId)?.abort();
  // A queued job only settles once a slot frees up; it has no process or files yet
  if (!wasQueued) {
    await whenSettled(jobId);
  }

  console.log(`[download] Job ${jobId} cancelled`);
  return job;
}

/**
 * Claims the finished artifact of a job. Each artifact can be claimed once;
 * the caller must call releaseArtifact when it is done sending the file.
 */
export function claimArtifact(jobId: string): Artifact {
  const job = getJob(jobId);
  if (job.status !== "finished") {
    throw new ConflictError("File is not ready");
  }
  if (job.served) {
    throw new NotFoundError("File", jobId);
  }
  if (!job.filepath || !job.filename) {
    throw new NotFoundError("File", jobId);
  }

  updateJob(jobId, { served: true });
  return { filepath: job.filepath, filename: job.filename };
}

/**
 * Removes a job and its temp directory. Cleanup failures are logged and ignored.
 */
export async function releaseArtifact(jobId: string): Promise<void> {
  const job = findById(jobId);
  if (!job) {
    return;
  }
  deleteJob(jobId);
  if (job.workDir) {
    await removeJobDir(job.workDir);
  }
  console.log(`[download] Job ${jobId} released`);
}

/**
 * Removes jobs older than ttlHours, cancelling any that are still running.
 */
export async function expireJobs(ttlHours: number, now: Date = new Date()): Promise<number> {
  const cutoff = new Date(now.getTime() - ttlHours * 60 * 60 * 1000);
  const expired = findCreatedBefore(cutoff);

  for (const job of expired) {
    if (!isTerminalStatus(job.status)) {
      const wasQueued = job.status === "queued";
      transition(job.id, {
        status: "cancelled",
        progress: { percent: job.progress.percent, stage: "cancelled", message: "Expired" },
      });
      controllers.get(job.id)?.abort();
      if (!wasQueued) {
        await whenSettled(job.id);
      }
    }
    await releaseArtifact(job.id);
  }

  return expired.length;
}

/**
 * Terminates every running download and forgets all jobs.
 */
export async function shutdownDownloads(): Promise<void> {
  for (const controller of controllers.values()) {
    controller.abort();
  }
  await Promise.all([...running.values()]);

  await Promise.all(listJobs().map((job) => releaseArtifact(job.id)));
  clearJobs();
}

export function getDownloadStats(): { active: number; queued: number; jobs: number } {
  return {
    active: limiter.activeCount,
    queued: limiter.pendingCount,
    jobs: listJobs().length,
  };
}
