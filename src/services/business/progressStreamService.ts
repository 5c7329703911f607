/**
 * Progress Stream Service
 *
 * Relays job progress to browsers over Server-Sent Events.
 *
 * ## Flow
 *
 * 1. **Download service** calls `publishProgress(job)` every time the job
 *    changes (a parsed yt-dlp line, a status transition, a failure).
 * 2. Updates are emitted on an in-process channel: `job:progress:{jobId}`.
 * 3. **SSE controller** calls `streamJobProgress(jobId, res, signal)`, which
 *    subscribes to the channel and writes each update to the response.
 * 4. The stream closes once the job reaches a terminal status
 *    (`finished`, `error` or `cancelled`).
 *
 * ## SSE Protocol Format
 *
 * ```
 * data: {"type":"connected","jobId":"..."}\n\n
 * data: {"type":"progress","status":"downloading","percent":42,...}\n\n
 * data: {"type":"complete","status":"finished"}\n\n
 * ```
 *
 * Updates are not stored: a subscriber only sees what is published after it
 * connects, plus the job snapshot sent on connect.
 */

import { EventEmitter, on } from "events";
import type { Response } from "express";
import { findById, isTerminalStatus } from "../../repositories/jobRepository.js";
import type { DownloadJob } from "../../repositories/jobRepository.js";
import { toJobView } from "./jobView.js";
import type { JobView } from "./jobView.js";

export interface ProgressUpdate extends JobView {
  timestamp: number;
}

const channels = new EventEmitter();
// One listener per open SSE connection
channels.setMaxListeners(0);

function channelName(jobId: string): string {
  return `job:progress:${jobId}`;
}

function writeEvent(res: Response, payload: Record<string, unknown>): void {
  res.write(`data: ${JSON.stringify(payload)}\n\n`);
}

/**
 * Publishes the job's current state to every connected subscriber.
 * If nobody is listening the update is dropped.
 */
export function publishProgress(job: DownloadJob): void {
  const update: ProgressUpdate = { ...toJobView(job), timestamp: Date.now() };
  channels.emit(channelName(job.id), update);
}

/**
 * Number of open subscriptions for a job.
 */
export function subscriberCount(jobId: string): number {
  return channels.listenerCount(channelName(jobId));
}

/**
 * Yields updates for a job until it reaches a terminal status or the signal aborts.
 *
 * The listener is attached when the generator is first advanced.
 */
async function* subscribeToProgress(jobId: string, signal: AbortSignal): AsyncGenerator<ProgressUpdate> {
  const channel = channelName(jobId);
  const ac = new AbortController();
  const abort = () => ac.abort();
  signal.addEventListener("abort", abort, { once: true });

  try {
    for await (const [payload] of on(channels, channel, { signal: ac.signal })) {
      const update: ProgressUpdate = payload;
      yield update;
      if (isTerminalStatus(update.status)) {
        break;
      }
    }
  } catch (error) {
    if (!(error instanceof Error && error.name === "AbortError")) {
      throw error;
    }
  } finally {
    signal.removeEventListener("abort", abort);
    ac.abort();
  }
}

/**
 * Streams a job's progress to an SSE response and ends the response when the job is done.
 */
export async function streamJobProgress(jobId: string, res: Response, signal: AbortSignal): Promise<void> {
  writeEvent(res, { type: "connected", jobId });

  const job = findById(jobId);
  if (!job) {
    writeEvent(res, { type: "error", message: "Job not found" });
    res.end();
    return;
  }

  const snapshot = toJobView(job);
  writeEvent(res, { type: "progress", ...snapshot, timestamp: Date.now() });

  if (isTerminalStatus(snapshot.status)) {
    writeEvent(res, { type: "complete", status: snapshot.status });
    res.end();
    return;
  }

  // The loop attaches its listener synchronously, before any later update is emitted
  for await (const update of subscribeToProgress(jobId, signal)) {
    writeEvent(res, { type: "progress", ...update });

    if (isTerminalStatus(update.status)) {
      writeEvent(res, { type: "complete", status: update.status });
      console.log(`[sse] Job ${jobId} ${update.status}, closing connection`);
      break;
    }
  }

  if (!res.writableEnded) {
    res.end();
  }
}
