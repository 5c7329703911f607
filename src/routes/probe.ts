/**
 * Probe Routes
 */

import { Router } from "express";
import { probe } from "../controllers/probeController.js";
import { validateBody } from "../middlewares/validation.js";
import { probeRequestSchema } from "../middlewares/schemas/downloadSchemas.js";
import { downloadLimiter } from "../middlewares/rateLimiting.js";

export const probeRouter = Router();

/** List the formats a URL offers */
probeRouter.post("/probe", downloadLimiter, validateBody(probeRequestSchema), probe);
