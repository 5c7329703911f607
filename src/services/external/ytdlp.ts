/**
 * yt-dlp Process Wrapper
 * Runs the external downloader with execa and relays its stdout line by line.
 * All extraction, format negotiation and muxing happens inside yt-dlp.
 */

import readline from "readline";
import path from "path";
import { execa, ExecaError } from "execa";
import { MAX_FILE_SIZE, YTDLP_PATH } from "../../config/env.js";
import { cookieArgs } from "../../config/cookies.js";
import { DownloaderError } from "../../utils/errors.js";
import { extractErrorMessage } from "../../utils/progressParser.js";

const USER_AGENT = "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36";

/** Output template: the title, capped in bytes so long titles stay valid file names */
const OUTPUT_TEMPLATE = "%(title).180B.%(ext)s";

export interface RunDownloadOptions {
  url: string;
  /** Format selector passed with -f */
  format: string;
  /** Extra flags from the quality profile */
  extraArgs: string[];
  /** Directory owned by the job; yt-dlp writes its output here */
  outputDir: string;
  /** Called for every stdout line, in order */
  onLine: (line: string) => void;
  /** Aborting terminates the process */
  signal: AbortSignal;
}

function baseArgs(): string[] {
  return [
    "--no-playlist",
    "--no-color",
    "--user-agent",
    USER_AGENT,
    "--add-header",
    "Accept-Language:en-US,en;q=0.9",
    ...cookieArgs(),
  ];
}

/**
 * Builds the full argument list for a download run.
 */
export function buildDownloadArgs(options: Pick<RunDownloadOptions, "url" | "format" | "extraArgs" | "outputDir">): string[] {
  return [
    ...baseArgs(),
    "--newline",
    "--max-filesize",
    String(MAX_FILE_SIZE),
    "--format",
    options.format,
    ...options.extraArgs,
    "--output",
    path.join(options.outputDir, OUTPUT_TEMPLATE),
    "--",
    options.url,
  ];
}

function toDownloaderError(error: unknown): Error {
  if (error instanceof ExecaError) {
    const stderr = typeof error.stderr === "string" ? error.stderr : "";
    const message = extractErrorMessage(stderr) ?? error.shortMessage;
    return new DownloaderError(message, error.exitCode);
  }
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Runs a download to completion.
 * Resolves when yt-dlp exits with code 0; rejects with a DownloaderError carrying
 * yt-dlp's own error text otherwise.
 */
export async function runDownload(options: RunDownloadOptions): Promise<void> {
  const args = buildDownloadArgs(options);
  console.log(`[yt-dlp] Starting: ${YTDLP_PATH} ${args.join(" ")}`);

  const subprocess = execa(YTDLP_PATH, args, {
    cancelSignal: options.signal,
    stripFinalNewline: true,
  });

  const lines = readline.createInterface({ input: subprocess.stdout });
  lines.on("line", options.onLine);

  try {
    await subprocess;
  } catch (error) {
    throw toDownloaderError(error);
  } finally {
    lines.close();
  }
}

/**
 * Fetches the metadata yt-dlp extracts for a URL without downloading anything.
 * Returns the parsed JSON document; callers validate its shape.
 */
export async function fetchMediaInfo(url: string): Promise<unknown> {
  const args = [...baseArgs(), "--dump-single-json", "--no-warnings", "--", url];
  console.log(`[yt-dlp] Fetching metadata for ${url}`);

  try {
    const { stdout } = await execa(YTDLP_PATH, args, { maxBuffer: 64 * 1024 * 1024 });
    return JSON.parse(stdout);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new DownloaderError("yt-dlp returned malformed metadata");
    }
    throw toDownloaderError(error);
  }
}
