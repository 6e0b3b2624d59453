import type { ZodError } from "zod";

export interface ConfigIssue {
  path: string;
  message: string;
}

/** Invalid analyzer or service configuration, raised at construction time. */
export class ConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = []) {
    super(issues.length ? `${message}: ${issues.map((i) => `${i.path} ${i.message}`).join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function issuesFromZod(error: ZodError): ConfigIssue[] {
  return error.issues.map((i) => ({
    path: i.path.length ? i.path.join(".") : "$",
    message: i.message,
  }));
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
