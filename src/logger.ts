import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export type NodeEnv = "development" | "test" | "production";

export interface LoggerOptions {
  nodeEnv?: NodeEnv;
  /** overrides the per-environment default */
  level?: LevelWithSilent;
}

export function defaultLogLevel(nodeEnv: NodeEnv): LevelWithSilent {
  switch (nodeEnv) {
    case "production":
      return "info";
    case "development":
      return "debug";
    case "test":
      return "silent";
  }
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const nodeEnv = opts.nodeEnv ?? "development";
  return pino({
    name: "tfidf-analyzer",
    level: opts.level ?? defaultLogLevel(nodeEnv),
    base: { pid: process.pid, env: nodeEnv },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Logger for tests and embedding: drops everything. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
