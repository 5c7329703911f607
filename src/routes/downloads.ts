/**
 * Download Routes
 * Submit a download, follow its progress, fetch or cancel it.
 */

import { Router } from "express";
import {
  submitDownload,
  getDownload,
  cancelDownloadHandler,
  fetchFile,
} from "../controllers/downloadController.js";
import { streamProgress } from "../controllers/progressController.js";
import { validateBody } from "../middlewares/validation.js";
import { downloadRequestSchema } from "../middlewares/schemas/downloadSchemas.js";
import { downloadLimiter } from "../middlewares/rateLimiting.js";

export const downloadsRouter = Router();

/** Start a download */
downloadsRouter.post("/", downloadLimiter, validateBody(downloadRequestSchema), submitDownload);

/** Job snapshot (polling fallback for the event stream) */
downloadsRouter.get("/:id", getDownload);

/** SSE stream of progress updates until the job finishes */
downloadsRouter.get("/:id/events", streamProgress);

/** Finished file; served once, then deleted */
downloadsRouter.get("/:id/file", fetchFile);

/** Cancel a queued or running download */
downloadsRouter.delete("/:id", cancelDownloadHandler);
