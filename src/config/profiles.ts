/**
 * Quality Profiles
 * Maps the user-facing quality choices onto yt-dlp format arguments.
 */

export const QUALITY_PROFILES = ["best", "1080p", "720p", "audio"] as const;

export type QualityProfile = (typeof QUALITY_PROFILES)[number];

export interface ProfileArgs {
  /** Format selector passed with -f */
  format: string;
  /** Extra flags appended after the selector */
  extraArgs: string[];
}

const PROFILE_ARGS: Record<QualityProfile, ProfileArgs> = {
  best: {
    format: "bestvideo*+bestaudio/best",
    extraArgs: ["--merge-output-format", "mp4"],
  },
  "1080p": {
    format: "bestvideo[height<=1080]+bestaudio/best[height<=1080]",
    extraArgs: ["--merge-output-format", "mp4"],
  },
  "720p": {
    format: "bestvideo[height<=720]+bestaudio/best[height<=720]",
    extraArgs: ["--merge-output-format", "mp4"],
  },
  audio: {
    format: "bestaudio[ext=m4a]/bestaudio/best",
    extraArgs: ["--extract-audio", "--audio-format", "mp3"],
  },
};

export function isQualityProfile(value: string): value is QualityProfile {
  return QUALITY_PROFILES.some((profile) => profile === value);
}

/**
 * Resolves the downloader arguments for a job.
 * A custom format selector (from the format probe) takes precedence over the profile.
 */
export function resolveFormatArgs(profile: QualityProfile, customFormat?: string): ProfileArgs {
  if (customFormat) {
    return { format: customFormat, extraArgs: ["--merge-output-format", "mp4"] };
  }
  return PROFILE_ARGS[profile];
}
