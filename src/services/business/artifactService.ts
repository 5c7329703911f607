/**
 * Artifact Service
 * Finds the file yt-dlp produced inside a job directory and checks it can be served.
 */

import { readdir, stat } from "fs/promises";
import path from "path";
import { AppError } from "../../utils/errors.js";

/** Partial and remux files yt-dlp or ffmpeg leave behind; never the artifact */
const PARTIAL_FILE = /\.(part|ytdl|temp|tmp)$|\.part-Frag\d+$|\.(temp|faststart)\.\w+$/i;

/** Single-format streams kept around a merge, like "Clip.f137.mp4" */
const FORMAT_STREAM = /\.f\d+\.\w+$/i;

interface Candidate {
  filePath: string;
  size: number;
}

function largest(candidates: Candidate[]): Candidate | undefined {
  return candidates.reduce<Candidate | undefined>((best, c) => (!best || c.size > best.size ? c : best), undefined);
}

/**
 * Returns the finished artifact inside dir: the largest regular file that is not
 * a partial download. Format streams only count when nothing else is there, so a
 * title that happens to end in ".f1" still resolves.
 */
export async function resolveArtifact(dir: string): Promise<string> {
  const entries = await readdir(dir, { withFileTypes: true });

  const merged: Candidate[] = [];
  const streams: Candidate[] = [];
  for (const entry of entries) {
    if (!entry.isFile() || PARTIAL_FILE.test(entry.name)) {
      continue;
    }
    const filePath = path.join(dir, entry.name);
    const { size } = await stat(filePath);
    (FORMAT_STREAM.test(entry.name) ? streams : merged).push({ filePath, size });
  }

  const best = largest(merged) ?? largest(streams);
  if (!best) {
    throw new AppError("Output file not found", 500);
  }
  return best.filePath;
}

/**
 * Rejects artifacts larger than maxBytes.
 */
export async function assertWithinSizeLimit(filePath: string, maxBytes: number): Promise<number> {
  const { size } = await stat(filePath);
  if (size > maxBytes) {
    throw new AppError(`File too large: ${(size / 1024 / 1024).toFixed(1)}MB`, 413);
  }
  return size;
}
