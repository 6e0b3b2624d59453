import { describe, expect, it } from "vitest";
import { createLogger, defaultLogLevel } from "../logger.js";

describe("createLogger", () => {
  it("picks the level from NODE_ENV", () => {
    expect(defaultLogLevel("production")).toBe("info");
    expect(defaultLogLevel("development")).toBe("debug");
    expect(defaultLogLevel("test")).toBe("silent");
    expect(createLogger({ nodeEnv: "test" }).level).toBe("silent");
    expect(createLogger({ nodeEnv: "production" }).level).toBe("info");
  });

  it("lets an explicit level win", () => {
    expect(createLogger({ nodeEnv: "test", level: "warn" }).level).toBe("warn");
  });
});
