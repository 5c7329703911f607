/**
 * Probe Controller
 * Lists available formats for a URL.
 */

import { Request, Response, NextFunction } from "express";
import { probeFormats } from "../services/business/probeService.js";
import type { ProbeRequestBody } from "../middlewares/schemas/downloadSchemas.js";

/**
 * POST /probe
 */
export async function probe(
  req: Request<Request["params"], unknown, ProbeRequestBody>,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const result = await probeFormats(req.body.url);
    res.status(200).json(result);
  } catch (error) {
    next(error);
  }
}
