/**
 * Environment Configuration
 * Validates and exports type-safe environment variables.
 * Fails fast at startup if a variable holds an invalid value.
 */

import path from "path";
import os from "os";

/** Server configuration */
export const PORT = getIntEnv("PORT", 3000);
export const NODE_ENV = process.env.NODE_ENV || "development";

/** Root directory holding one sub-directory per download job */
export const DOWNLOAD_TEMP_DIR = path.resolve(
  process.env.DOWNLOAD_TEMP_DIR || path.join(os.tmpdir(), "media-fetch")
);

/** External tools */
export const YTDLP_PATH = process.env.YTDLP_PATH || "yt-dlp";
export const FFMPEG_PATH = process.env.FFMPEG_PATH || "ffmpeg";
export const FFMPEG_FASTSTART = getBoolEnv("FFMPEG_FASTSTART", true);

/** Cookie file handed to yt-dlp; YTDLP_COOKIES (cookies.txt body) is written here on startup */
export const COOKIES_PATH = process.env.COOKIES_PATH || path.join(os.tmpdir(), "media-fetch-cookies.txt");
export const YTDLP_COOKIES = process.env.YTDLP_COOKIES;

/** Limits */
export const MAX_FILE_SIZE = getIntEnv("MAX_FILE_SIZE", 2 * 1024 * 1024 * 1024);
export const MAX_CONCURRENT_DOWNLOADS = getIntEnv("MAX_CONCURRENT_DOWNLOADS", 3);
export const JOB_TTL_HOURS = getIntEnv("JOB_TTL_HOURS", 24);
export const RATE_LIMIT_PER_MINUTE = getIntEnv("RATE_LIMIT_PER_MINUTE", 10);

/** Security */
export const ALLOWED_ORIGINS = getListEnv("ALLOWED_ORIGINS");
export const ALLOWED_DOMAINS = getListEnv("ALLOWED_DOMAINS", [
  "youtube.com",
  "youtu.be",
  "instagram.com",
  "tiktok.com",
  "twitter.com",
  "x.com",
  "vimeo.com",
  "dailymotion.com",
]);

/**
 * Reads a positive integer variable, falling back to a default when unset.
 * Throws immediately if the variable is set to something else.
 */
function getIntEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Environment variable ${key} must be a positive integer, got '${raw}'`);
  }
  return value;
}

function getBoolEnv(key: string, fallback: boolean): boolean {
  const raw = process.env[key]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new Error(`Environment variable ${key} must be a boolean, got '${raw}'`);
}

/**
 * Reads a list variable written either as a JSON array or as a comma-separated string.
 * An empty string yields an empty list.
 */
export function parseList(raw: string): string[] {
  const trimmed = raw.trim();
  if (trimmed.startsWith("[")) {
    const parsed: unknown = JSON.parse(trimmed);
    if (!Array.isArray(parsed) || !parsed.every((item) => typeof item === "string")) {
      throw new Error(`Expected a JSON array of strings, got '${raw}'`);
    }
    return parsed.map((item) => item.trim()).filter(Boolean);
  }
  return trimmed
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function getListEnv(key: string, fallback: string[] = []): string[] {
  const raw = process.env[key];
  if (raw === undefined) {
    return fallback;
  }
  try {
    return parseList(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid list in environment variable ${key}: ${reason}`);
  }
}
