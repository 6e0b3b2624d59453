import { describe, expect, it } from "vitest";
import { MemoryMetricsRepository } from "../metrics.js";

const at = (ms: number): Date => new Date(Date.UTC(2026, 0, 1) + ms);

describe("MemoryMetricsRepository", () => {
  it("reports zeros before anything completes", () => {
    const repo = new MemoryMetricsRepository();
    repo.start(10, at(0));
    expect(repo.summary()).toEqual({
      filesProcessed: 0,
      minTimeProcessed: 0,
      avgTimeProcessed: 0,
      maxTimeProcessed: 0,
      latestFileProcessedTimestamp: null,
      maxContentLength: 0,
      avgContentLength: 0,
    });
  });

  it("tracks status and processing time", () => {
    const repo = new MemoryMetricsRepository();
    const entry = repo.start(100, at(0));
    expect(entry.status).toBe("pending");

    const done = repo.finish(entry.id, "completed", at(1500), "doc-1");
    expect(done).toMatchObject({ status: "completed", processingTime: 1.5, documentId: "doc-1" });
    expect(repo.finish(999, "failed", at(0))).toBeUndefined();
  });

  it("summarizes completed runs only", () => {
    const repo = new MemoryMetricsRepository();
    const a = repo.start(100, at(0));
    repo.finish(a.id, "completed", at(1500));
    const b = repo.start(300, at(2000));
    repo.finish(b.id, "completed", at(2500));
    const c = repo.start(5000, at(3000));
    repo.finish(c.id, "failed", at(9000));

    expect(repo.summary()).toEqual({
      filesProcessed: 2,
      minTimeProcessed: 0.5,
      avgTimeProcessed: 1,
      maxTimeProcessed: 1.5,
      latestFileProcessedTimestamp: 0.5,
      maxContentLength: 300,
      avgContentLength: 200,
    });
    expect(repo.list().map((e) => e.status)).toEqual(["completed", "completed", "failed"]);
  });

  it("rounds times to milliseconds", () => {
    const repo = new MemoryMetricsRepository();
    for (const ms of [1, 1, 2]) {
      const e = repo.start(10, at(0));
      repo.finish(e.id, "completed", at(ms));
    }
    expect(repo.summary()).toMatchObject({ minTimeProcessed: 0.001, avgTimeProcessed: 0.001, maxTimeProcessed: 0.002 });
  });

  it("takes the latest file by start time", () => {
    const repo = new MemoryMetricsRepository();
    const slow = repo.start(10, at(0));
    const quick = repo.start(10, at(5000));
    repo.finish(quick.id, "completed", at(5100));
    repo.finish(slow.id, "completed", at(9000));
    expect(repo.summary().latestFileProcessedTimestamp).toBe(0.1);
  });

  it("summarizes a long history", () => {
    const repo = new MemoryMetricsRepository();
    const n = 300_000;
    for (let i = 0; i < n; i++) {
      const e = repo.start(10, at(i));
      repo.finish(e.id, "completed", at(i + (i % 2 === 0 ? 1000 : 2000)));
    }

    expect(repo.summary()).toEqual({
      filesProcessed: n,
      minTimeProcessed: 1,
      avgTimeProcessed: 1.5,
      maxTimeProcessed: 2,
      latestFileProcessedTimestamp: 2,
      maxContentLength: 10,
      avgContentLength: 10,
    });
  });
});
