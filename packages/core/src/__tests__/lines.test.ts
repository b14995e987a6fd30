import { describe, expect, it } from "vitest";
import { parseLogLine } from "../lines.js";

describe("parseLogLine", () => {
  it("strips logging-module prefixes and reads their timestamp as UTC", () => {
    expect(parseLogLine("2025-03-01 10:00:00,123 - browser_use.agent - INFO - 📍 Step 1")).toEqual({
      message: "📍 Step 1",
      timestampMs: Date.UTC(2025, 2, 1, 10, 0, 0, 123),
      level: "INFO",
      source: "browser_use.agent",
    });
  });

  it("strips level and logger-name prefixes", () => {
    expect(parseLogLine("INFO     [agent] 🧠 Memory: logged in")).toEqual({
      message: "🧠 Memory: logged in",
      timestampMs: null,
      level: "INFO",
      source: "agent",
    });
  });

  it("strips a leading ISO timestamp, bracketed or not", () => {
    expect(parseLogLine("[2025-03-01T10:00:05.500Z] Step 2 start")).toMatchObject({
      message: "Step 2 start",
      timestampMs: Date.UTC(2025, 2, 1, 10, 0, 5, 500),
    });
    expect(parseLogLine("2025-03-01T10:00:05+02:00 WARNING  [controller] Result: ok")).toEqual({
      message: "Result: ok",
      timestampMs: Date.UTC(2025, 2, 1, 8, 0, 5),
      level: "WARNING",
      source: "controller",
    });
  });

  it("passes unprefixed lines through trimmed", () => {
    expect(parseLogLine("  Step 1 start\r")).toEqual({ message: "Step 1 start", timestampMs: null, level: "", source: "" });
    expect(parseLogLine("   ").message).toBe("");
  });
});
