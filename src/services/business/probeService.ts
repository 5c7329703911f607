/**
 * Probe Service
 * Lists the formats a URL offers so the user can pick one instead of a profile.
 */

import { z } from "zod";
import { fetchMediaInfo } from "../external/ytdlp.js";
import { DownloaderError } from "../../utils/errors.js";

export interface VideoFormat {
  id: string;
  type: "av" | "video";
  label: string;
  ext: string | null;
  res: string | null;
  fps: number | null;
  height: number | null;
  tbr: number | null;
  vcodec: string | null;
  acodec: string | null;
  /** Format selector to submit back as `format` */
  fmt: string;
}

export interface ProbeResult {
  meta: {
    title: string | null;
    duration: number | null;
    thumbnail: string | null;
  };
  formats: VideoFormat[];
}

const optionalNumber = z.number().nullish();
const optionalString = z.string().nullish();

const rawFormatSchema = z.object({
  format_id: optionalString,
  ext: optionalString,
  width: optionalNumber,
  height: optionalNumber,
  fps: optionalNumber,
  tbr: optionalNumber,
  vcodec: optionalString,
  acodec: optionalString,
  filesize: optionalNumber,
  filesize_approx: optionalNumber,
});

const mediaInfoSchema = z.object({
  title: optionalString,
  duration: optionalNumber,
  thumbnail: optionalString,
  formats: z.array(rawFormatSchema).nullish(),
});

export type RawFormat = z.infer<typeof rawFormatSchema>;

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"];

export function formatSize(bytes: number): string {
  let value = bytes;
  let unitIndex = 0;
  while (value >= 1024 && unitIndex < SIZE_UNITS.length - 1) {
    value /= 1024;
    unitIndex++;
  }
  return `${value.toFixed(1)} ${SIZE_UNITS[unitIndex]}`;
}

function hasCodec(codec: string | null | undefined): codec is string {
  return Boolean(codec) && codec !== "none";
}

/**
 * Builds a label like "AV • 720p • 30fps • MP4 • 1500k • ~12.0 MB".
 */
export function buildFormatLabel(format: RawFormat): string {
  const parts: string[] = [];
  const hasVideo = hasCodec(format.vcodec);
  const hasAudio = hasCodec(format.acodec);

  if (hasVideo && hasAudio) parts.push("AV");
  else if (hasVideo) parts.push("VIDEO");
  else if (hasAudio) parts.push("AUDIO");

  if (format.height) parts.push(`${format.height}p`);
  if (format.fps) parts.push(`${Math.trunc(format.fps)}fps`);
  if (format.ext) parts.push(format.ext.toUpperCase());
  if (format.tbr) parts.push(`${Math.round(format.tbr)}k`);

  const size = format.filesize || format.filesize_approx;
  if (size) parts.push(`~${formatSize(size)}`);

  return parts.join(" • ");
}

/**
 * Maps yt-dlp's raw format list to selectable formats.
 * Audio-only and storyboard entries are dropped; video-only entries get the best
 * audio track merged in. Sorted muxed-first, then by height, then by bitrate.
 */
export function toVideoFormats(rawFormats: RawFormat[]): VideoFormat[] {
  const formats: VideoFormat[] = [];

  for (const raw of rawFormats) {
    if (!raw.format_id) {
      continue;
    }
    const hasVideo = hasCodec(raw.vcodec);
    const hasAudio = hasCodec(raw.acodec);
    if (!hasVideo) {
      continue;
    }
    const type = hasAudio ? "av" : "video";

    formats.push({
      id: raw.format_id,
      type,
      label: buildFormatLabel(raw),
      ext: raw.ext ?? null,
      res: raw.width && raw.height ? `${raw.width}x${raw.height}` : null,
      fps: raw.fps != null ? Math.trunc(raw.fps) : null,
      height: raw.height ?? null,
      tbr: raw.tbr != null ? Math.round(raw.tbr) : null,
      vcodec: raw.vcodec ?? null,
      acodec: raw.acodec ?? null,
      fmt: type === "video" ? `${raw.format_id}+bestaudio[ext=m4a]/bestaudio` : raw.format_id,
    });
  }

  return formats.sort(
    (a, b) =>
      (a.type === "av" ? 0 : 1) - (b.type === "av" ? 0 : 1) ||
      (b.height ?? 0) - (a.height ?? 0) ||
      (b.tbr ?? 0) - (a.tbr ?? 0)
  );
}

/**
 * Fetches metadata for a URL and returns its title and selectable formats.
 */
export async function probeFormats(url: string): Promise<ProbeResult> {
  const raw = await fetchMediaInfo(url);
  const parsed = mediaInfoSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DownloaderError("yt-dlp returned unexpected metadata");
  }

  const info = parsed.data;
  return {
    meta: {
      title: info.title ?? null,
      duration: info.duration ?? null,
      thumbnail: info.thumbnail ?? null,
    },
    formats: toVideoFormats(info.formats ?? []),
  };
}
