/**
 * Progress Line Parser
 * Turns yt-dlp's textual stdout (run with --newline --no-color) into progress events.
 */

export type JobStage =
  | "queued"
  | "starting"
  | "downloading"
  | "postprocessing"
  | "finished"
  | "error"
  | "cancelled";

export interface ProgressEvent {
  percent: number;
  stage: JobStage;
  message: string;
  speed?: string;
  eta?: string;
  downloadedBytes?: number;
  totalBytes?: number;
}

const ANSI_ESCAPE = /\x1B\[[0-?]*[ -/]*[@-~]/g;

const DOWNLOAD_PROGRESS = /^\[download\]\s+(\d+(?:\.\d+)?)%(.*)$/;
const PROGRESS_SIZE = /\bof\s+~?\s*(\S+)/;
const PROGRESS_SPEED = /\bat\s+(\S+)/;
const PROGRESS_ETA = /\bETA\s+(\S+)/;
const DOWNLOAD_DESTINATION = /^\[download\]\s+Destination:\s+(.+)$/;
const ALREADY_DOWNLOADED = /^\[download\]\s+(.+) has already been downloaded$/;
const POSTPROCESSORS = /^\[(Merger|ExtractAudio|VideoConvertor|VideoRemuxer|Fixup\w*|MoveFiles|Metadata|EmbedThumbnail)\]\s*(.*)$/;
const TAGGED_LINE = /^\[([\w:-]+)\]\s*(.*)$/;
const MAX_FILESIZE_ABORT = /^\[download\]\s+File is larger than max-filesize\b/;

const SIZE_UNITS: Record<string, number> = {
  B: 1,
  KiB: 1024,
  MiB: 1024 ** 2,
  GiB: 1024 ** 3,
  TiB: 1024 ** 4,
  KB: 1000,
  MB: 1000 ** 2,
  GB: 1000 ** 3,
  TB: 1000 ** 4,
};

export function stripAnsi(line: string): string {
  return line.replace(ANSI_ESCAPE, "");
}

/**
 * Parses a yt-dlp size string such as "10.00MiB" into bytes.
 * Returns undefined for "Unknown" and anything it cannot read.
 */
export function parseSize(value: string): number | undefined {
  const match = /^(\d+(?:\.\d+)?)([KMGT]i?B|B)$/.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const unit = SIZE_UNITS[match[2]];
  if (unit === undefined) {
    return undefined;
  }
  return Math.round(parseFloat(match[1]) * unit);
}

function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

/**
 * Classifies a single stdout line.
 * Returns null for lines that carry no progress information.
 */
export function parseProgressLine(rawLine: string): ProgressEvent | null {
  const line = stripAnsi(rawLine).trim();
  if (!line) {
    return null;
  }

  const destination = DOWNLOAD_DESTINATION.exec(line);
  if (destination) {
    return { percent: 0, stage: "downloading", message: `Downloading ${destination[1]}` };
  }

  const already = ALREADY_DOWNLOADED.exec(line);
  if (already) {
    return { percent: 100, stage: "downloading", message: `${already[1]} has already been downloaded` };
  }

  const progress = DOWNLOAD_PROGRESS.exec(line);
  if (progress) {
    const percent = clampPercent(parseFloat(progress[1]));
    const event: ProgressEvent = { percent, stage: "downloading", message: line.replace(/^\[download\]\s+/, "") };

    const rest = progress[2];
    const size = PROGRESS_SIZE.exec(rest);
    const totalBytes = size ? parseSize(size[1]) : undefined;
    if (totalBytes !== undefined) {
      event.totalBytes = totalBytes;
      event.downloadedBytes = Math.round((totalBytes * percent) / 100);
    }
    const speed = PROGRESS_SPEED.exec(rest);
    if (speed && speed[1] !== "Unknown") {
      event.speed = speed[1];
    }
    const eta = PROGRESS_ETA.exec(rest);
    if (eta && eta[1] !== "Unknown") {
      event.eta = eta[1];
    }
    return event;
  }

  const postprocessor = POSTPROCESSORS.exec(line);
  if (postprocessor) {
    return {
      percent: 100,
      stage: "postprocessing",
      message: postprocessor[2] || postprocessor[1],
    };
  }

  const tagged = TAGGED_LINE.exec(line);
  if (tagged && tagged[1] !== "download") {
    return { percent: 0, stage: "starting", message: tagged[2] || tagged[1] };
  }

  return null;
}

/**
 * True for the line yt-dlp prints when it skips a download because of --max-filesize.
 * yt-dlp still exits 0 in that case.
 */
export function isMaxFilesizeAbort(rawLine: string): boolean {
  return MAX_FILESIZE_ABORT.test(stripAnsi(rawLine).trim());
}

/**
 * Picks the message to show for a failed run: the last "ERROR:" line of stderr,
 * falling back to the last non-empty line.
 */
export function extractErrorMessage(stderr: string): string | undefined {
  const lines = stripAnsi(stderr)
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);

  const errorLines = lines.filter((line) => line.startsWith("ERROR:"));
  const chosen = errorLines.length > 0 ? errorLines[errorLines.length - 1] : lines[lines.length - 1];
  return chosen?.replace(/^ERROR:\s*/, "");
}
