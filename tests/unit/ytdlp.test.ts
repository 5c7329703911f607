import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { existsSync } from "fs";
import { mkdir, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";

const FIXTURE_DIR = path.join(os.tmpdir(), `media-fetch-ytdlp-test-${process.pid}`);
const FAKE_YTDLP = path.join(FIXTURE_DIR, "yt-dlp");
const PID_FILE = path.join(FIXTURE_DIR, "yt-dlp.pid");

// Behaves like yt-dlp for the URL it is given (always the last argument)
const FAKE_YTDLP_SCRIPT = `#!/bin/sh
out=""
prev=""
for arg; do
  if [ "$prev" = "--output" ]; then out="$arg"; fi
  prev="$arg"
done
url="$arg"
case "$url" in
  *unavailable*)
    echo "[youtube] abc123: Downloading webpage"
    echo "[download]  12.5% of 10.00MiB at 1.00MiB/s ETA 00:09"
    echo "WARNING: [youtube] falling back to another client" >&2
    echo "ERROR: [youtube] abc123: Video unavailable" >&2
    exit 1
    ;;
  *slow*)
    echo $$ > "$FAKE_YTDLP_PID_FILE"
    echo "[download]   1.0% of 10.00MiB at 1.00MiB/s ETA 00:09"
    exec sleep 30
    ;;
  *garbled*)
    echo "this is not json"
    ;;
  *info*)
    echo '{"title":"Sample Clip","duration":42,"formats":[]}'
    ;;
  *)
    dir=$(dirname "$out")
    echo "[download] Destination: $dir/Sample Clip.mp4"
    echo "[download] 100% of 16.00B in 00:00:01 at 16.00B/s"
    printf 'fake-video-bytes' > "$dir/Sample Clip.mp4"
    ;;
esac
`;

vi.stubEnv("YTDLP_PATH", FAKE_YTDLP);
vi.stubEnv("FAKE_YTDLP_PID_FILE", PID_FILE);

const { buildDownloadArgs, fetchMediaInfo, runDownload } = await import("../../src/services/external/ytdlp.js");
const { DownloaderError } = await import("../../src/utils/errors.js");

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

describe("buildDownloadArgs", () => {
  it("passes the selector, profile flags and a per-job output template, with the URL last", () => {
    const args = buildDownloadArgs({
      url: "https://youtu.be/abc123",
      format: "bestaudio[ext=m4a]/bestaudio/best",
      extraArgs: ["--extract-audio", "--audio-format", "mp3"],
      outputDir: "/tmp/media-fetch/job-1",
    });

    expect(args.slice(0, 2)).toEqual(["--no-playlist", "--no-color"]);
    expect(args).toContain("--newline");
    // MAX_FILE_SIZE is 1 MiB under test
    expect(args[args.indexOf("--max-filesize") + 1]).toBe("1048576");
    expect(args[args.indexOf("--format") + 1]).toBe("bestaudio[ext=m4a]/bestaudio/best");
    expect(args[args.indexOf("--output") + 1]).toBe(path.join("/tmp/media-fetch/job-1", "%(title).180B.%(ext)s"));
    expect(args.slice(-6)).toEqual([
      "--audio-format",
      "mp3",
      "--output",
      path.join("/tmp/media-fetch/job-1", "%(title).180B.%(ext)s"),
      "--",
      "https://youtu.be/abc123",
    ]);
  });

  it("omits the cookies flag when no cookies file exists", () => {
    const args = buildDownloadArgs({ url: "https://youtu.be/abc123", format: "best", extraArgs: [], outputDir: "/tmp/x" });

    expect(args).not.toContain("--cookies");
  });
});

describe("yt-dlp process", () => {
  const outputDir = path.join(FIXTURE_DIR, "job-1");

  beforeAll(async () => {
    await mkdir(FIXTURE_DIR, { recursive: true });
    await writeFile(FAKE_YTDLP, FAKE_YTDLP_SCRIPT, { mode: 0o755 });
  });

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    await rm(outputDir, { recursive: true, force: true });
    await mkdir(outputDir, { recursive: true });
  });

  afterAll(async () => {
    vi.restoreAllMocks();
    await rm(FIXTURE_DIR, { recursive: true, force: true });
  });

  it("relays stdout line by line and resolves on a clean exit", async () => {
    const lines: string[] = [];

    await runDownload({
      url: "https://youtu.be/abc123",
      format: "best",
      extraArgs: [],
      outputDir,
      signal: new AbortController().signal,
      onLine: (line) => lines.push(line),
    });

    expect(lines).toEqual([
      `[download] Destination: ${outputDir}/Sample Clip.mp4`,
      "[download] 100% of 16.00B in 00:00:01 at 16.00B/s",
    ]);
    expect(await readFile(path.join(outputDir, "Sample Clip.mp4"), "utf-8")).toBe("fake-video-bytes");
  });

  it("rejects with the downloader's own error text", async () => {
    const lines: string[] = [];

    const run = runDownload({
      url: "https://youtu.be/unavailable",
      format: "best",
      extraArgs: [],
      outputDir,
      signal: new AbortController().signal,
      onLine: (line) => lines.push(line),
    });

    await expect(run).rejects.toBeInstanceOf(DownloaderError);
    await expect(run).rejects.toMatchObject({
      message: "[youtube] abc123: Video unavailable",
      statusCode: 502,
      exitCode: 1,
    });
    expect(lines).toEqual([
      "[youtube] abc123: Downloading webpage",
      "[download]  12.5% of 10.00MiB at 1.00MiB/s ETA 00:09",
    ]);
  });

  it("terminates the process when the signal aborts", async () => {
    const controller = new AbortController();
    const started = Date.now();

    const run = runDownload({
      url: "https://youtu.be/slow",
      format: "best",
      extraArgs: [],
      outputDir,
      signal: controller.signal,
      onLine: () => controller.abort(),
    });

    await expect(run).rejects.toBeInstanceOf(DownloaderError);
    expect(Date.now() - started).toBeLessThan(10_000);
    const pid = Number((await readFile(PID_FILE, "utf-8")).trim());
    expect(isAlive(pid)).toBe(false);
  });

  it("returns the parsed metadata document", async () => {
    await expect(fetchMediaInfo("https://youtu.be/info")).resolves.toEqual({
      title: "Sample Clip",
      duration: 42,
      formats: [],
    });
  });

  it("rejects metadata that is not JSON", async () => {
    const metadata = fetchMediaInfo("https://youtu.be/garbled");

    await expect(metadata).rejects.toBeInstanceOf(DownloaderError);
    await expect(metadata).rejects.toThrow("yt-dlp returned malformed metadata");
  });

  it("reports a missing executable as a downloader failure", async () => {
    await rm(FAKE_YTDLP);
    try {
      await expect(fetchMediaInfo("https://youtu.be/info")).rejects.toBeInstanceOf(DownloaderError);
    } finally {
      await writeFile(FAKE_YTDLP, FAKE_YTDLP_SCRIPT, { mode: 0o755 });
    }
    expect(existsSync(FAKE_YTDLP)).toBe(true);
  });
});
