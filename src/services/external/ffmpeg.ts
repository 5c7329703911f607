/**
 * FFmpeg Service
 * Remuxes finished MP4 files so playback can start before the whole file arrives.
 */

import { execa } from "execa";
import { rename, unlink } from "fs/promises";
import path from "path";
import { FFMPEG_PATH } from "../../config/env.js";

/**
 * Moves the MP4 index to the front of the file (-movflags +faststart).
 * Non-MP4 files are left alone. Failures are logged and the original file is kept.
 */
export async function ensureFaststart(filePath: string): Promise<string> {
  if (path.extname(filePath).toLowerCase() !== ".mp4") {
    return filePath;
  }

  const tempPath = filePath.replace(/\.mp4$/i, ".faststart.mp4");

  try {
    await execa(FFMPEG_PATH, [
      "-y",
      "-i", filePath,
      "-c", "copy",
      "-movflags", "+faststart",
      "-loglevel", "error",
      tempPath,
    ]);
    await rename(tempPath, filePath);
    console.log(`[ffmpeg] ✓ Remuxed with faststart: ${path.basename(filePath)}`);
  } catch (error) {
    console.warn(`[ffmpeg] Faststart remux skipped for ${path.basename(filePath)}:`, error);
    await unlink(tempPath).catch((unlinkError: NodeJS.ErrnoException) => {
      if (unlinkError.code !== "ENOENT") {
        console.warn(`[ffmpeg] Failed to remove ${tempPath}:`, unlinkError);
      }
    });
  }

  return filePath;
}
