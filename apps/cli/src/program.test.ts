import { access, mkdtemp, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "@steptrace/core";
import { buildProgram, parseValue, setPath } from "./program.js";

const AGENT_LOG = [
  "Step 1 start",
  "Evaluation: Success - done",
  "Memory: at home page",
  "Next goal: click search",
  "Step 2 start",
  'Action: {"type":"click","selector":"#btn"}',
  "",
].join("\n");

async function buildFixture(): Promise<{ root: string; logPath: string; outDir: string }> {
  const root = await mkdtemp(path.join(os.tmpdir(), "steptrace-cli-"));
  const logPath = path.join(root, "agent.log");
  await writeFile(logPath, AGENT_LOG, "utf8");
  return { root, logPath, outDir: path.join(root, "out") };
}

function captureLog(): string[] {
  const lines: string[] = [];
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    lines.push(args.map(String).join(" "));
  });
  return lines;
}

async function run(...args: string[]): Promise<void> {
  await buildProgram().parseAsync(["node", "steptrace", "--log-level", "silent", ...args]);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("setPath and parseValue", () => {
  it("writes nested keys and coerces scalar values", () => {
    const target: Record<string, unknown> = { tracker: "not an object" };
    setPath(target, "tracker.unknownMessageCap", parseValue("250"));
    setPath(target, "logging.pretty", parseValue("true"));
    setPath(target, "tracker.title", parseValue("nightly run"));
    expect(target).toEqual({
      tracker: { unknownMessageCap: 250, title: "nightly run" },
      logging: { pretty: true },
    });
  });
});

describe("steptrace cli", () => {
  it("replays a log file and writes its artifacts", async () => {
    const { logPath, outDir } = await buildFixture();
    const lines = captureLog();
    await run("replay", logPath, "--out", outDir, "--json");

    expect(JSON.parse(lines.join("\n"))).toEqual([
      {
        file: logPath,
        title: "agent",
        steps: 2,
        thoughts: 3,
        actions: 1,
        unknown: 0,
        outputDir: path.join(outDir, "agent"),
        warnings: [],
      },
    ]);
    await expect(access(path.join(outDir, "agent", "timeline.json"))).resolves.toBeUndefined();
    await expect(access(path.join(outDir, "agent", "unknown_messages.json"))).resolves.toBeUndefined();
  });

  it("summarizes an exported timeline", async () => {
    const { logPath, outDir } = await buildFixture();
    captureLog();
    await run("replay", logPath, "--out", outDir, "--title", "checkout run");
    vi.restoreAllMocks();

    const jsonLines = captureLog();
    await run("summary", path.join(outDir, "agent"), "--json");
    const data = JSON.parse(jsonLines.join("\n"));
    expect(data.title).toBe("checkout run");
    expect(data.totalSteps).toBe(2);
    expect(data.thoughts.byCategory).toEqual({ evaluation: 1, memory: 1, next_goal: 1, generic: 0 });
    expect(data.actions.byType).toEqual([{ name: "click", count: 1 }]);
    expect(data.steps.steps.map((row: { stepNumber: number }) => row.stepNumber)).toEqual([1, 2]);
    vi.restoreAllMocks();

    const textLines = captureLog();
    await run("summary", path.join(outDir, "agent", "timeline.json"));
    expect(textLines[0]).toBe("checkout run");
    expect(textLines).toContain("type  | count");
    expect(textLines).toContain("click   1");
  });

  it("rejects globs that match nothing", async () => {
    const { root } = await buildFixture();
    await expect(run("replay", path.join(root, "*.missing"))).rejects.toThrow("no log files matched");
  });

  it("follows a log file for a fixed window", async () => {
    const { logPath, outDir } = await buildFixture();
    captureLog();
    await run("watch", logPath, "--from-start", "--duration", "1s", "--out", outDir);

    const document = JSON.parse(await readFile(path.join(outDir, "timeline.json"), "utf8"));
    expect(document.total_steps).toBe(2);
    expect(document.timeline[1].actions[0].type).toBe("click");
  });

  it("updates config values through set", async () => {
    const { root } = await buildFixture();
    const configPath = path.join(root, "config.toml");
    const lines = captureLog();
    await run("--config", configPath, "config", "set", "tracker.unknownMessageCap", "500");
    await run("--config", configPath, "config", "set", "logging.level", "DEBUG");

    expect(lines).toEqual(["updated tracker.unknownMessageCap", "updated logging.level"]);
    const config = await loadConfig(configPath);
    expect(config.tracker.unknownMessageCap).toBe(500);
    expect(config.logging.level).toBe("debug");
  });
});
