/**
 * Cleanup utility for temporary files
 * Each job downloads into its own directory under DOWNLOAD_TEMP_DIR.
 */

import fs from "fs";
import { mkdir, readdir, rm, stat } from "fs/promises";
import path from "path";
import { DOWNLOAD_TEMP_DIR } from "../config/env.js";

/** Every directory this app creates in the temp root starts with this; nothing else is swept */
export const JOB_DIR_PREFIX = "job-";

export function jobDirPath(jobId: string): string {
  return path.join(DOWNLOAD_TEMP_DIR, `${JOB_DIR_PREFIX}${jobId}`);
}

/**
 * Creates the directory owned by a job and returns its path.
 */
export async function createJobDir(jobId: string): Promise<string> {
  const dir = jobDirPath(jobId);
  await mkdir(dir, { recursive: true });
  return dir;
}

/**
 * True when target sits strictly inside the temp root.
 */
export function isInsideTempRoot(target: string): boolean {
  const relative = path.relative(DOWNLOAD_TEMP_DIR, path.resolve(target));
  return relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative);
}

/**
 * Removes a job directory and everything in it.
 * Failures are logged and ignored; returns whether the directory is gone.
 */
export async function removeJobDir(dir: string): Promise<boolean> {
  if (!isInsideTempRoot(dir)) {
    console.error(`[cleanup] Refusing to remove path outside temp root: ${dir}`);
    return false;
  }

  try {
    await rm(dir, { recursive: true, force: true });
    return true;
  } catch (error) {
    console.warn(`[cleanup] Failed to remove ${dir}:`, error);
    return false;
  }
}

/**
 * Removes every job directory in the temp root older than maxAgeHours.
 * Called on startup with 0 to clear leftovers from a previous run.
 * Entries without the job prefix belong to someone else and are never touched.
 */
export async function cleanupTempFiles(maxAgeHours: number = 24): Promise<number> {
  if (!fs.existsSync(DOWNLOAD_TEMP_DIR)) {
    console.log("[cleanup] No temp directory found, nothing to clean");
    return 0;
  }

  console.log(`[cleanup] Scanning ${DOWNLOAD_TEMP_DIR} for old files...`);

  const now = Date.now();
  const maxAgeMs = maxAgeHours * 60 * 60 * 1000;
  let removedDirs = 0;

  const entries = await readdir(DOWNLOAD_TEMP_DIR);
  for (const entry of entries) {
    if (!entry.startsWith(JOB_DIR_PREFIX)) {
      continue;
    }
    const entryPath = path.join(DOWNLOAD_TEMP_DIR, entry);

    try {
      const stats = await stat(entryPath);
      if (!stats.isDirectory()) {
        continue;
      }

      const ageMs = now - stats.mtimeMs;
      if (ageMs >= maxAgeMs && (await removeJobDir(entryPath))) {
        removedDirs++;
        console.log(`[cleanup] Removed temp directory: ${entry} (${(ageMs / 3600000).toFixed(1)}h old)`);
      }
    } catch (err) {
      console.warn(`[cleanup] Failed to process ${entry}:`, err);
    }
  }

  console.log(`[cleanup] ✓ Removed ${removedDirs} directories`);
  return removedDirs;
}

/**
 * Get disk usage of the temp root
 */
export async function getTempDiskUsage(): Promise<{ usedMB: number; files: number }> {
  if (!fs.existsSync(DOWNLOAD_TEMP_DIR)) {
    return { usedMB: 0, files: 0 };
  }

  let totalBytes = 0;
  let totalFiles = 0;

  const jobDirs = await readdir(DOWNLOAD_TEMP_DIR, { withFileTypes: true });
  for (const jobDir of jobDirs) {
    if (!jobDir.isDirectory() || !jobDir.name.startsWith(JOB_DIR_PREFIX)) {
      continue;
    }
    const dirPath = path.join(DOWNLOAD_TEMP_DIR, jobDir.name);
    try {
      for (const file of await readdir(dirPath)) {
        totalBytes += (await stat(path.join(dirPath, file))).size;
        totalFiles++;
      }
    } catch (err) {
      // Directory removed while scanning
      console.warn(`[cleanup] Skipped ${jobDir.name} while measuring disk usage:`, err);
    }
  }

  return {
    usedMB: totalBytes / (1024 * 1024),
    files: totalFiles,
  };
}
