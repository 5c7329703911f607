/**
 * Rate Limiting Middleware
 * Prevents API abuse by limiting request rates.
 */

import rateLimit from "express-rate-limit";
import { RATE_LIMIT_PER_MINUTE } from "../config/env.js";

/**
 * General API rate limiter.
 * Limits: 200 requests per 15 minutes per IP.
 * Use for: reads, progress streams, file fetches.
 */
export const apiLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  limit: 200, // Limit each IP to 200 requests per windowMs
  message: { error: "Too many requests from this IP, please try again later." },
  standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
  legacyHeaders: false, // Disable `X-RateLimit-*` headers
});

/**
 * Strict rate limiter for operations that spawn the downloader.
 * Limits: RATE_LIMIT_PER_MINUTE requests per minute per IP.
 * Use for: submitting downloads, probing formats.
 */
export const downloadLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: RATE_LIMIT_PER_MINUTE,
  message: { error: "Rate limit exceeded" },
  standardHeaders: true,
  legacyHeaders: false,
});
