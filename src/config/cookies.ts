/**
 * Downloader Cookies
 * Some sites only serve media to signed-in sessions. When YTDLP_COOKIES holds a
 * Netscape cookies.txt body it is written to COOKIES_PATH and handed to yt-dlp.
 */

import fs from "fs";
import { writeFile } from "fs/promises";
import { COOKIES_PATH, YTDLP_COOKIES } from "./env.js";

/**
 * Writes the cookies file from the environment, if one is configured.
 */
export async function initializeCookies(): Promise<void> {
  if (!YTDLP_COOKIES) {
    console.log("[yt-dlp] No YTDLP_COOKIES env var found - running without authentication");
    return;
  }

  try {
    await writeFile(COOKIES_PATH, YTDLP_COOKIES, { encoding: "utf-8", mode: 0o600 });
    console.log(`[yt-dlp] ✓ Cookies initialized at ${COOKIES_PATH}`);
  } catch (error) {
    // Downloads still work for public media
    console.error("[yt-dlp] Failed to write cookies file:", error);
  }
}

/**
 * Arguments pointing yt-dlp at the cookies file, when it exists.
 */
export function cookieArgs(): string[] {
  return fs.existsSync(COOKIES_PATH) ? ["--cookies", COOKIES_PATH] : [];
}
