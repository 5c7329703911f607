import express from "express";
import helmet from "helmet";
import cors from "cors";
import path from "path";
import { fileURLToPath } from "url";
import { router } from "./routes/index.js";
import { apiLimiter } from "./middlewares/rateLimiting.js";
import { errorHandler } from "./middlewares/errorHandler.js";
import { ALLOWED_ORIGINS } from "./config/env.js";

/** Static form page and its script */
const PUBLIC_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "public");

/**
 * Express application instance.
 * Configures global middleware and routes.
 */
export const app = express();

/** Disable the X-Powered-By header to reduce fingerprinting. */
app.disable("x-powered-by");

/** Adds standard security headers. */
app.use(helmet());
/** Enables CORS for the configured origins (any origin when none are configured). */
app.use(cors(ALLOWED_ORIGINS.length > 0 ? { origin: ALLOWED_ORIGINS, credentials: true } : undefined));
/** Parses JSON and HTML form bodies. */
app.use(express.json({ limit: "100kb" }));
app.use(express.urlencoded({ extended: false, limit: "100kb" }));

/** Rate limiting for all routes. */
app.use(apiLimiter);

/** Form page. */
app.use(express.static(PUBLIC_DIR));

/** Application routes. */
app.use(router);

/** Global error handler - MUST be last. */
app.use(errorHandler);
