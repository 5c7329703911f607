/**
 * Health Check Routes
 * Infrastructure endpoints for monitoring and orchestration.
 */

import { Router } from "express";
import { getDownloadStats } from "../services/business/downloadService.js";
import { getTempDiskUsage } from "../utils/cleanupTemp.js";

export const healthRouter = Router();

/** Simple health check endpoint. */
healthRouter.get("/health", async (_req, res, next) => {
  try {
    const disk = await getTempDiskUsage();
    res.json({ ok: true, downloads: getDownloadStats(), tempUsageMB: Number(disk.usedMB.toFixed(1)) });
  } catch (error) {
    next(error);
  }
});

/** Readiness check endpoint for container orchestration. */
healthRouter.get("/ready", (_req, res) => {
  res.json({ ready: true });
});
