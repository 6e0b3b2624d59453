import type { FieldError } from "./problem.js";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

/** Parses a query-string integer; undefined when absent, NaN when malformed. */
export function queryInt(v: string | null): number | undefined {
  if (v === null || v === "") return undefined;
  return /^-?\d+$/.test(v) ? Number(v) : Number.NaN;
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}

const FILENAME_MAX = 255;

export function checkFilename(errors: FieldError[], path: string, filename: string): void {
  if (filename.length < 1) pushErr(errors, path, "must be non-empty");
  if (filename.length > FILENAME_MAX) pushErr(errors, path, `must be at most ${FILENAME_MAX} characters`);
  if (/[\\/]/.test(filename)) pushErr(errors, path, "must not contain path separators");
}
