/**
 * Progress Controller
 * Handles SSE streaming for download progress updates
 */

import { Request, Response } from "express";
import { streamJobProgress } from "../services/business/progressStreamService.js";

/**
 * SSE endpoint for download progress streaming
 * GET /downloads/:id/events
 */
export async function streamProgress(req: Request<{ id: string }>, res: Response): Promise<void> {
  const { id } = req.params;

  console.log(`[sse] Client connected for job ${id}`);

  // Set SSE headers
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no"); // Disable nginx buffering
  res.flushHeaders(); // Establish SSE connection

  // Stop relaying once the client goes away
  const ac = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      console.log(`[sse] Client disconnected from job ${id}`);
    }
    ac.abort();
  });

  try {
    await streamJobProgress(id, res, ac.signal);
  } catch (error) {
    console.error(`[sse] Error streaming job ${id}:`, error);
    if (!res.writableEnded) {
      res.write(`data: ${JSON.stringify({ type: "error", message: "Stream error" })}\n\n`);
      res.end();
    }
  }
}
