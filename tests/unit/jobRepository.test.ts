import { afterEach, describe, expect, it } from "vitest";
import {
  clearJobs,
  createJob,
  deleteJob,
  findById,
  findCreatedBefore,
  isTerminalStatus,
  listJobs,
  updateJob,
} from "../../src/repositories/jobRepository.js";

describe("jobRepository", () => {
  afterEach(() => {
    clearJobs();
  });

  it("creates queued jobs", () => {
    const job = createJob({ id: "job-1", url: "https://youtu.be/abc123", profile: "720p" });

    expect(job).toMatchObject({
      id: "job-1",
      profile: "720p",
      format: null,
      status: "queued",
      progress: { percent: 0, stage: "queued", message: "Waiting for a free download slot" },
      workDir: null,
      served: false,
    });
    expect(findById("job-1")).toBe(job);
  });

  it("refuses duplicate ids", () => {
    createJob({ id: "job-1", url: "https://youtu.be/abc123", profile: "best" });

    expect(() => createJob({ id: "job-1", url: "https://youtu.be/abc123", profile: "best" })).toThrow(
      "Job job-1 already exists"
    );
  });

  it("updates jobs in place", () => {
    const job = createJob({ id: "job-1", url: "https://youtu.be/abc123", profile: "best" });

    const updated = updateJob("job-1", { status: "downloading", filename: "Clip.mp4" });

    expect(updated).toBe(job);
    expect(job.status).toBe("downloading");
    expect(job.filename).toBe("Clip.mp4");
    expect(updateJob("missing", { status: "error" })).toBeNull();
  });

  it("finds jobs created before a cutoff", () => {
    const job = createJob({ id: "job-1", url: "https://youtu.be/abc123", profile: "best" });
    const cutoff = new Date(job.createdAt.getTime() + 1);

    expect(findCreatedBefore(cutoff)).toEqual([job]);
    expect(findCreatedBefore(job.createdAt)).toEqual([]);
  });

  it("deletes jobs", () => {
    createJob({ id: "job-1", url: "https://youtu.be/abc123", profile: "best" });

    expect(deleteJob("job-1")).toBe(true);
    expect(deleteJob("job-1")).toBe(false);
    expect(listJobs()).toEqual([]);
  });

  it("treats finished, error and cancelled as terminal", () => {
    expect(isTerminalStatus("finished")).toBe(true);
    expect(isTerminalStatus("error")).toBe(true);
    expect(isTerminalStatus("cancelled")).toBe(true);
    expect(isTerminalStatus("downloading")).toBe(false);
    expect(isTerminalStatus("queued")).toBe(false);
  });
});
