/**
 * Error Handler Middleware
 * Maps thrown errors to JSON responses.
 */

import { Request, Response, NextFunction } from "express";
import { AppError, DownloaderError } from "../utils/errors.js";
import { NODE_ENV } from "../config/env.js";

interface ErrorResponse {
  error: string;
  stack?: string;
}

function clientMessage(error: Error): string {
  if (error instanceof AppError && error.isOperational) {
    return error.message;
  }
  if (NODE_ENV === "production") {
    return "Internal server error";
  }
  return error.message || "Internal server error";
}

/**
 * Global error handler. MUST be registered last in the middleware chain.
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  // Express recognises error handlers by their four parameters
  _next: NextFunction
): void {
  const statusCode = error instanceof AppError ? error.statusCode : 500;

  if (error instanceof DownloaderError) {
    console.error(`[Error] ${statusCode} ${req.method} ${req.path} - yt-dlp exited with ${error.exitCode ?? "?"}: ${error.message}`);
  } else if (statusCode >= 500) {
    console.error(`[Error] ${statusCode} ${req.method} ${req.path} -`, error);
  } else {
    console.warn(`[Error] ${statusCode} ${req.method} ${req.path} - ${error.message}`);
  }

  // The response may already be streaming (file download, SSE)
  if (res.headersSent) {
    res.end();
    return;
  }

  const response: ErrorResponse = { error: clientMessage(error) };
  if (NODE_ENV !== "production") {
    response.stack = error.stack;
  }

  res.status(statusCode).json(response);
}
