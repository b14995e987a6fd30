import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { mergeConfig } from "../config.js";
import { ExportError } from "../errors.js";
import {
  type ExportOptions,
  exportArtifacts,
  loadTimelineDocument,
  parseTimelineDocument,
  toSerializable,
  writeJsonArtifact,
} from "../exporter.js";
import { silentLogger } from "../logger.js";
import { createSession } from "../session.js";
import { summarizeSteps, summarizeThoughts } from "../summary.js";

function exportOptions(): ExportOptions {
  const config = mergeConfig({ export: { retryDelayMs: 0 } });
  return { export: config.export, redaction: config.redaction, logger: silentLogger() };
}

describe("toSerializable", () => {
  it("coerces values JSON cannot carry into strings", () => {
    const cyclic: Record<string, unknown> = { name: "loop" };
    cyclic.self = cyclic;
    function handler(): void {}

    expect(
      toSerializable({
        big: 12n,
        fn: handler,
        sym: Symbol("tag"),
        err: new TypeError("bad input"),
        at: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
        nan: Number.NaN,
        inf: Number.POSITIVE_INFINITY,
        set: new Set([1, 2]),
        map: new Map([["k", 1]]),
        cyclic,
      }),
    ).toEqual({
      big: "12",
      fn: "[function handler]",
      sym: "Symbol(tag)",
      err: "TypeError: bad input",
      at: "2024-01-02T03:04:05.000Z",
      nan: "NaN",
      inf: "Infinity",
      set: [1, 2],
      map: { k: 1 },
      cyclic: { name: "loop", self: "[Circular]" },
    });
  });

  it("keeps repeated non-cyclic references", () => {
    const shared = { id: 1 };
    expect(toSerializable([shared, shared])).toEqual([{ id: 1 }, { id: 1 }]);
  });
});

describe("artifact export", () => {
  it("writes JSON through a temp file and creates missing directories", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "steptrace-export-"));
    const target = path.join(root, "nested", "deeper", "out.json");
    await writeJsonArtifact(target, { ok: true }, { indent: 2, retryDelayMs: 0 });
    expect(await readFile(target, "utf8")).toBe('{\n  "ok": true\n}\n');
  });

  it("raises ExportError after the retry fails", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "steptrace-export-"));
    const blocker = path.join(root, "blocker");
    await writeFile(blocker, "not a directory", "utf8");
    await expect(writeJsonArtifact(path.join(blocker, "out.json"), {}, { indent: 2, retryDelayMs: 0 })).rejects.toBeInstanceOf(
      ExportError,
    );
  });

  it("reports failed artifacts as warnings without throwing", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "steptrace-export-"));
    const blocker = path.join(root, "blocker");
    await writeFile(blocker, "not a directory", "utf8");
    const session = createSession({ title: "blocked" });
    session.handleLine("Step 1 start", 1_000);

    const report = await exportArtifacts(
      path.join(blocker, "out"),
      {
        timeline: session.getTimelineDocument(),
        thoughts: session.getThinkingLogs(),
        summary: session.getSummary(),
        unknown: session.getUnknownMessages(),
      },
      exportOptions(),
    );
    expect(report.written).toEqual([]);
    expect(report.warnings).toHaveLength(4);
    expect(session.getTimeline()).toHaveLength(1);
  });

  it("redacts secrets in exported text and payload keys", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "steptrace-export-"));
    const session = createSession({ title: "secrets", outputDir: root, prompt: "log in with sk-promptsecret42" });
    session.handleLine("Step 1 start", 1_000);
    session.handleLine("Memory: key is sk-testsecret123", 1_100);
    session.handleLine('Action: {"type":"input_text","api_key":"test-secret","text":"hello"}', 1_200);
    await session.finishTracking();

    const timeline = JSON.parse(await readFile(path.join(root, "timeline.json"), "utf8"));
    expect(timeline.timeline[0].thoughts[0].text).toBe("key is [REDACTED]");
    expect(timeline.timeline[0].actions[0].payload).toEqual({
      type: "input_text",
      api_key: "[REDACTED]",
      text: "hello",
    });
    const thinking = JSON.parse(await readFile(path.join(root, "thinking_logs.json"), "utf8"));
    expect(thinking[0].dedupeKey).toBe("1|memory|key is [REDACTED]");
    expect(session.getThinkingLogs()[0]?.text).toBe("key is sk-testsecret123");
    expect(timeline.prompt).toBe("log in with [REDACTED]");
    const summary = JSON.parse(await readFile(path.join(root, "summary_logs.json"), "utf8"));
    expect(summary.prompt).toBe("log in with [REDACTED]");
    expect(summary.title).toBe("secrets");
    expect(summary.llm.totalTokens).toBe(0);
  });

  it("reloads timeline.json with the same step and thought summaries", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "steptrace-export-"));
    const session = createSession({ title: "round trip", prompt: "find the docs" });
    const lines = [
      "Step 1 start",
      "👍 Eval: Success - homepage loaded",
      "🧠 Memory: search box is at the top",
      "🎯 Next goal: search for docs",
      'Action: {"type":"click","selector":"#search"}',
      "Step 3 start",
      "💭 Thinking: results look relevant",
      "Action: {broken json",
      "Step 3 completed",
    ];
    lines.forEach((line, index) => session.handleLine(line, 10_000 + index * 250));

    const report = await session.exportArtifacts(root);
    expect(report.warnings).toEqual([]);
    expect(report.written.map((file) => path.basename(file))).toEqual([
      "timeline.json",
      "thinking_logs.json",
      "summary_logs.json",
      "unknown_messages.json",
    ]);

    const reloaded = await loadTimelineDocument(path.join(root, "timeline.json"));
    expect(reloaded.title).toBe("round trip");
    expect(reloaded.prompt).toBe("find the docs");
    expect(reloaded.total_steps).toBe(3);
    expect(reloaded.start_time).toBe(new Date(10_000).toISOString());
    expect(reloaded.end_time).toBe(new Date(12_000).toISOString());
    expect(summarizeThoughts(reloaded.timeline)).toEqual(session.getThoughtsSummary());
    expect(summarizeSteps(reloaded.timeline)).toEqual(session.getStepsSummary());
    expect(reloaded.timeline).toEqual(session.getTimeline());
  });

  it("rejects documents without a timeline list", () => {
    expect(() => parseTimelineDocument({ title: "x" })).toThrow(ExportError);
  });
});
