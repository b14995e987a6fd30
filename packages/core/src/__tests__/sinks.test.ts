import { appendFile, mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { EmitterLogSink, FileLogSink, type LogRecord } from "../sinks.js";

describe("EmitterLogSink", () => {
  it("delivers each non-empty line to subscribers until they unsubscribe", () => {
    const sink = new EmitterLogSink();
    const received: LogRecord[] = [];
    const unsubscribe = sink.subscribe((record) => received.push(record));
    sink.write("first\r\n\nsecond", 10);
    sink.write("third");
    unsubscribe();
    sink.write("fourth");
    expect(received).toEqual([{ text: "first", timestampMs: 10 }, { text: "second", timestampMs: 10 }, { text: "third" }]);
  });
});

describe("FileLogSink", () => {
  it("replays existing content and delivers appended complete lines", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "steptrace-sink-"));
    const logPath = path.join(dir, "agent.log");
    await writeFile(logPath, "Step 1 start\nMemory: a\n", "utf8");

    const sink = new FileLogSink(logPath, { fromStart: true });
    const received: string[] = [];
    sink.subscribe((record) => received.push(record.text));
    await sink.start();
    expect(received).toEqual(["Step 1 start", "Memory: a"]);

    await appendFile(logPath, "Memory: b\nStep 1 comp", "utf8");
    await sink.poll();
    expect(received).toEqual(["Step 1 start", "Memory: a", "Memory: b"]);

    await appendFile(logPath, "leted\n", "utf8");
    await sink.poll();
    expect(received.at(-1)).toBe("Step 1 completed");

    await appendFile(logPath, "trailing without newline", "utf8");
    await sink.stop();
    expect(received.at(-1)).toBe("trailing without newline");
    expect(received).toHaveLength(5);
  });

  it("skips existing content unless asked to replay it", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "steptrace-sink-"));
    const logPath = path.join(dir, "agent.log");
    await writeFile(logPath, "old line\n", "utf8");

    const sink = new FileLogSink(logPath);
    const received: string[] = [];
    sink.subscribe((record) => received.push(record.text));
    await sink.start();
    await appendFile(logPath, "new line\n", "utf8");
    await sink.poll();
    await sink.stop();
    expect(received).toEqual(["new line"]);
  });

  it("starts over when the file is truncated", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "steptrace-sink-"));
    const logPath = path.join(dir, "agent.log");
    await writeFile(logPath, "a fairly long first line\n", "utf8");

    const sink = new FileLogSink(logPath, { fromStart: true });
    const received: string[] = [];
    sink.subscribe((record) => received.push(record.text));
    await sink.start();
    await writeFile(logPath, "short\n", "utf8");
    await sink.poll();
    await sink.stop();
    expect(received).toEqual(["a fairly long first line", "short"]);
  });
});
