import { afterAll, beforeEach, describe, expect, it, vi } from "vitest";
import { existsSync } from "fs";
import { mkdir, rm, utimes, writeFile } from "fs/promises";
import os from "os";
import path from "path";

const TEMP_ROOT = path.join(os.tmpdir(), `media-fetch-cleanup-test-${process.pid}`);
vi.stubEnv("DOWNLOAD_TEMP_DIR", TEMP_ROOT);

const { cleanupTempFiles, createJobDir, getTempDiskUsage, isInsideTempRoot, removeJobDir } = await import(
  "../../src/utils/cleanupTemp.js"
);
const { initializeApp } = await import("../../src/config/init.js");

describe("temp directory lifecycle", () => {
  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    await rm(TEMP_ROOT, { recursive: true, force: true });
  });

  afterAll(async () => {
    vi.restoreAllMocks();
    await rm(TEMP_ROOT, { recursive: true, force: true });
  });

  it("creates a directory per job under the temp root", async () => {
    const dir = await createJobDir("1");

    expect(dir).toBe(path.join(TEMP_ROOT, "job-1"));
    expect(existsSync(dir)).toBe(true);
  });

  it("only treats paths strictly inside the root as job directories", () => {
    expect(isInsideTempRoot(path.join(TEMP_ROOT, "job-1"))).toBe(true);
    expect(isInsideTempRoot(TEMP_ROOT)).toBe(false);
    expect(isInsideTempRoot(path.join(TEMP_ROOT, "..", "elsewhere"))).toBe(false);
    expect(isInsideTempRoot("/etc")).toBe(false);
  });

  it("removes a job directory with its files", async () => {
    const dir = await createJobDir("2");
    await writeFile(path.join(dir, "clip.mp4"), "data");

    await expect(removeJobDir(dir)).resolves.toBe(true);
    expect(existsSync(dir)).toBe(false);
  });

  it("refuses to remove anything outside the temp root", async () => {
    const outside = path.join(os.tmpdir(), `media-fetch-outside-${process.pid}`);
    await mkdir(outside, { recursive: true });

    await expect(removeJobDir(outside)).resolves.toBe(false);
    expect(existsSync(outside)).toBe(true);
    await rm(outside, { recursive: true, force: true });
  });

  it("sweeps directories older than the cutoff and keeps fresh ones", async () => {
    const stale = await createJobDir("stale");
    const fresh = await createJobDir("fresh");
    await writeFile(path.join(TEMP_ROOT, "stray.txt"), "not a job");
    const twoDaysAgo = new Date(Date.now() - 48 * 60 * 60 * 1000);
    await utimes(stale, twoDaysAgo, twoDaysAgo);

    await expect(cleanupTempFiles(24)).resolves.toBe(1);
    expect(existsSync(stale)).toBe(false);
    expect(existsSync(fresh)).toBe(true);
    expect(existsSync(path.join(TEMP_ROOT, "stray.txt"))).toBe(true);
  });

  it("sweeps every job directory with a zero cutoff", async () => {
    await createJobDir("a");
    await createJobDir("b");

    await expect(cleanupTempFiles(0)).resolves.toBe(2);
  });

  it("leaves directories it did not create alone", async () => {
    const foreign = path.join(TEMP_ROOT, "another-app-cache");
    await mkdir(foreign, { recursive: true });
    await writeFile(path.join(foreign, "keep.bin"), "theirs");
    const twoDaysAgo = new Date(Date.now() - 48 * 60 * 60 * 1000);
    await utimes(foreign, twoDaysAgo, twoDaysAgo);
    const leftover = await createJobDir("leftover");

    await expect(cleanupTempFiles(0)).resolves.toBe(1);
    expect(existsSync(leftover)).toBe(false);
    expect(existsSync(path.join(foreign, "keep.bin"))).toBe(true);
  });

  it("keeps foreign directories on startup", async () => {
    const foreign = path.join(TEMP_ROOT, "another-app-cache");
    await mkdir(foreign, { recursive: true });
    const leftover = await createJobDir("from-last-run");

    await initializeApp();

    expect(existsSync(foreign)).toBe(true);
    expect(existsSync(leftover)).toBe(false);
  });

  it("returns 0 when the temp root does not exist", async () => {
    await expect(cleanupTempFiles(0)).resolves.toBe(0);
  });

  it("measures files across job directories", async () => {
    const dir = await createJobDir("3");
    await writeFile(path.join(dir, "a.bin"), Buffer.alloc(1024));
    await writeFile(path.join(dir, "b.bin"), Buffer.alloc(1024));
    await mkdir(path.join(TEMP_ROOT, "another-app-cache"));
    await writeFile(path.join(TEMP_ROOT, "another-app-cache", "c.bin"), Buffer.alloc(1024));

    const usage = await getTempDiskUsage();

    expect(usage.files).toBe(2);
    expect(usage.usedMB).toBeCloseTo(2048 / (1024 * 1024));
  });
});
