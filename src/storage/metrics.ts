import type { DocId } from "../core/types.js";

export type ProcessingStatus = "pending" | "completed" | "failed";

export interface ProcessingMetrics {
  id: number;
  documentId?: DocId;
  status: ProcessingStatus;
  startedAt: Date;
  endedAt?: Date;
  /** seconds */
  processingTime?: number;
  contentLength: number;
}

export interface MetricsSummary {
  filesProcessed: number;
  minTimeProcessed: number;
  avgTimeProcessed: number;
  maxTimeProcessed: number;
  /** processing time of the most recently started completed file, seconds */
  latestFileProcessedTimestamp: number | null;
  maxContentLength: number;
  avgContentLength: number;
}

export interface MetricsRepository {
  start(contentLength: number, at: Date): ProcessingMetrics;
  finish(id: number, status: Exclude<ProcessingStatus, "pending">, at: Date, documentId?: DocId): ProcessingMetrics | undefined;
  list(): ProcessingMetrics[];
  summary(): MetricsSummary;
}

/** Times in the summary are seconds rounded to milliseconds. */
function round3(x: number): number {
  return Math.round(x * 1000) / 1000;
}

export class MemoryMetricsRepository implements MetricsRepository {
  private readonly entries: ProcessingMetrics[] = [];
  private readonly byId = new Map<number, ProcessingMetrics>();
  private nextId = 1;

  start(contentLength: number, at: Date): ProcessingMetrics {
    const entry: ProcessingMetrics = { id: this.nextId++, status: "pending", startedAt: at, contentLength };
    this.entries.push(entry);
    this.byId.set(entry.id, entry);
    return entry;
  }

  finish(id: number, status: Exclude<ProcessingStatus, "pending">, at: Date, documentId?: DocId): ProcessingMetrics | undefined {
    const entry = this.byId.get(id);
    if (!entry) return undefined;

    entry.status = status;
    entry.endedAt = at;
    entry.processingTime = (at.getTime() - entry.startedAt.getTime()) / 1000;
    if (documentId !== undefined) entry.documentId = documentId;
    return entry;
  }

  list(): ProcessingMetrics[] {
    return this.entries.map((e) => ({ ...e }));
  }

  summary(): MetricsSummary {
    let count = 0;
    let minTime = Infinity;
    let maxTime = -Infinity;
    let timeSum = 0;
    let maxLength = 0;
    let lengthSum = 0;
    let latest: ProcessingMetrics | undefined;

    for (const e of this.entries) {
      if (e.status !== "completed") continue;
      const t = e.processingTime ?? 0;
      count++;
      if (t < minTime) minTime = t;
      if (t > maxTime) maxTime = t;
      timeSum += t;
      if (e.contentLength > maxLength) maxLength = e.contentLength;
      lengthSum += e.contentLength;
      // later entries win ties on start time
      if (!latest || e.startedAt.getTime() >= latest.startedAt.getTime()) latest = e;
    }

    if (count === 0) {
      return {
        filesProcessed: 0,
        minTimeProcessed: 0,
        avgTimeProcessed: 0,
        maxTimeProcessed: 0,
        latestFileProcessedTimestamp: null,
        maxContentLength: 0,
        avgContentLength: 0,
      };
    }

    return {
      filesProcessed: count,
      minTimeProcessed: round3(minTime),
      avgTimeProcessed: round3(timeSum / count),
      maxTimeProcessed: round3(maxTime),
      latestFileProcessedTimestamp: latest?.processingTime === undefined ? null : round3(latest.processingTime),
      maxContentLength: maxLength,
      avgContentLength: lengthSum / count,
    };
  }
}
