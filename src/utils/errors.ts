/**
 * Application Errors
 * Errors thrown by services and mapped to HTTP responses by the error handler.
 */

/**
 * Base application error class.
 * Operational errors carry a message meant for the client; anything else is a bug
 * and is reported as "Internal server error" in production.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Resource not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} with id '${identifier}' not found`
      : `${resource} not found`;
    super(message, 404);
  }
}

/**
 * Resource is in the wrong state for the request (409).
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/**
 * The external downloader failed (502).
 * The message is the downloader's own error text, passed to the client verbatim.
 */
export class DownloaderError extends AppError {
  constructor(
    message: string,
    public exitCode?: number
  ) {
    super(message, 502);
  }
}
