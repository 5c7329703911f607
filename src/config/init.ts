/**
 * Application Initialization
 * Prepares the temp root and downloader cookies on startup.
 */

import { mkdir } from "fs/promises";
import { DOWNLOAD_TEMP_DIR, JOB_TTL_HOURS } from "./env.js";
import { initializeCookies } from "./cookies.js";
import { cleanupTempFiles } from "../utils/cleanupTemp.js";

/**
 * Initializes application dependencies on startup.
 */
export async function initializeApp(): Promise<void> {
  console.log("Initializing application...");

  try {
    await mkdir(DOWNLOAD_TEMP_DIR, { recursive: true });
    console.log(`✓ Temp directory ready: ${DOWNLOAD_TEMP_DIR}`);

    // Jobs do not survive a restart, so no job directory left in the temp root is still reachable
    await cleanupTempFiles(0);

    await initializeCookies();

    console.log(`✓ Application initialized successfully (job TTL ${JOB_TTL_HOURS}h)\n`);
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}
