/**
 * Download Controller
 * Handles HTTP requests for submitting, inspecting, cancelling and fetching downloads.
 */

import { Request, Response, NextFunction } from "express";
import {
  startDownload,
  getJob,
  cancelDownload,
  claimArtifact,
  releaseArtifact,
  type Artifact,
} from "../services/business/downloadService.js";
import { toJobView } from "../services/business/jobView.js";
import type { DownloadRequestBody } from "../middlewares/schemas/downloadSchemas.js";

/**
 * POST /downloads
 * Starts a download and returns a handle to follow it
 */
export async function submitDownload(
  req: Request<Request["params"], unknown, DownloadRequestBody>,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const { url, profile, format } = req.body;

    const job = startDownload({ url, profile, format });

    res.status(202).json({
      jobId: job.id,
      status: job.status,
      eventsUrl: `/downloads/${job.id}/events`,
      fileUrl: `/downloads/${job.id}/file`,
    });
  } catch (error) {
    next(error);
  }
}

/**
 * GET /downloads/:id
 * Current state of a download
 */
export async function getDownload(
  req: Request<{ id: string }>,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const job = getJob(req.params.id);
    res.status(200).json(toJobView(job));
  } catch (error) {
    next(error);
  }
}

/**
 * DELETE /downloads/:id
 * Terminates the downloader process and discards partial files
 */
export async function cancelDownloadHandler(
  req: Request<{ id: string }>,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const job = await cancelDownload(req.params.id);
    res.status(200).json(toJobView(job));
  } catch (error) {
    next(error);
  }
}

/**
 * GET /downloads/:id/file
 * Sends the finished file once, then deletes it
 */
export async function fetchFile(
  req: Request<{ id: string }>,
  res: Response,
  next: NextFunction
): Promise<void> {
  const { id } = req.params;

  let artifact: Artifact;
  try {
    artifact = claimArtifact(id);
  } catch (error) {
    next(error);
    return;
  }

  console.log(`[download] Serving ${artifact.filename} for job ${id}`);

  res.download(artifact.filepath, artifact.filename, (error) => {
    if (error) {
      console.error(`[download] Failed to send file for job ${id}:`, error);
    }
    releaseArtifact(id).catch((cleanupError) => {
      console.error(`[cleanup] Failed to release job ${id}:`, cleanupError);
    });
    if (error && !res.headersSent) {
      next(error);
    }
  });
}
