import path from "node:path";
import type {
  ActionsSummary,
  AppConfig,
  LlmStats,
  PipelineDiagnostics,
  StandaloneEvent,
  StepRecord,
  StepsSummary,
  SummaryStats,
  ThoughtRecord,
  ThoughtsSummary,
  TimelineDocument,
  UnknownMessage,
  UnknownReason,
} from "@steptrace/contracts";
import { mergeConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import {
  type ExportOptions,
  type ExportReport,
  UNKNOWN_MESSAGES_FILE,
  exportArtifacts,
  saveTimelineDocument,
  writeJsonArtifact,
} from "./exporter.js";
import { parseLogLine } from "./lines.js";
import { LlmUsageTracker } from "./llm.js";
import { type Logger, silentLogger } from "./logger.js";
import { type PatternRegistry, createPatternRegistry } from "./patterns/index.js";
import type { PatternExtraction, PatternKind, PatternMatch } from "./patterns/types.js";
import { Redactor } from "./redaction.js";
import type { LogSink } from "./sinks.js";
import { StepTracker } from "./steps.js";
import { buildSummary, summarizeActions, summarizeSteps, summarizeThoughts } from "./summary.js";
import { ThoughtStore } from "./thoughts.js";
import { TimelineModel } from "./timeline.js";
import { expandHome, nowMs, toIso } from "./utils.js";

export type LineKind = PatternKind | "unknown" | "ignored" | "blank";

export interface SessionOptions {
  title?: string;
  prompt?: string;
  config?: AppConfig;
  logger?: Logger;
  registry?: PatternRegistry;
  /** Where finishTracking exports and unknown messages are flushed. Overrides tracker.outputDir. */
  outputDir?: string;
  clock?: () => number;
}

/** One tracked agent run. All mutable state lives behind this handle. */
export interface TraceSession {
  readonly title: string;
  readonly finished: boolean;
  readonly outputDir: string | null;
  install(sink?: LogSink): void;
  uninstall(): void;
  handleLine(text: string, timestampMs?: number): LineKind;
  setPrompt(text: string): void;
  finishTracking(): Promise<ExportReport>;
  getThinkingLogs(): ThoughtRecord[];
  getTimeline(): StepRecord[];
  getTimelineDocument(): TimelineDocument;
  getEvents(): StandaloneEvent[];
  getUnknownMessages(): UnknownMessage[];
  getThoughtsSummary(): ThoughtsSummary;
  getStepsSummary(): StepsSummary;
  getActionsSummary(): ActionsSummary;
  getLlmStats(): LlmStats;
  getDiagnostics(): PipelineDiagnostics;
  getSummary(): SummaryStats;
  saveTimeline(filePath: string): Promise<ExportReport>;
  exportArtifacts(outputDir: string): Promise<ExportReport>;
  flushUnknownMessages(): Promise<void>;
}

interface LineCounters {
  linesSeen: number;
  linesMatched: number;
  linesAfterFinish: number;
  unknownCount: number;
  matchErrors: number;
  malformedPayloads: number;
}

class Session implements TraceSession {
  readonly title: string;
  readonly outputDir: string | null;
  private prompt: string | null;
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly registry: PatternRegistry;
  private readonly clock: () => number;
  private readonly timeline: TimelineModel;
  private readonly thoughts = new ThoughtStore();
  private readonly tracker: StepTracker;
  private readonly llm = new LlmUsageTracker();
  private readonly counters: LineCounters = {
    linesSeen: 0,
    linesMatched: 0,
    linesAfterFinish: 0,
    unknownCount: 0,
    matchErrors: 0,
    malformedPayloads: 0,
  };
  private unsubscribe: (() => void) | null = null;
  private flushTimer: NodeJS.Timeout | null = null;
  private started = false;
  private frozen = false;
  private finishReport: Promise<ExportReport> | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: SessionOptions) {
    this.config = options.config ?? mergeConfig();
    this.title = options.title?.trim() || this.config.tracker.title;
    this.prompt = options.prompt ?? null;
    this.logger = (options.logger ?? silentLogger()).child({ session: this.title });
    this.registry = options.registry ?? createPatternRegistry();
    this.clock = options.clock ?? nowMs;
    const outputDir = options.outputDir ?? this.config.tracker.outputDir;
    this.outputDir = outputDir ? path.resolve(expandHome(outputDir)) : null;
    this.timeline = new TimelineModel(this.config.tracker.unknownMessageCap);
    this.tracker = new StepTracker(this.timeline, this.thoughts, { maxGapSteps: this.config.tracker.maxGapSteps });
  }

  get finished(): boolean {
    return this.frozen;
  }

  install(sink?: LogSink): void {
    if (this.frozen) {
      this.logger.warn("install ignored: tracking already finished");
      return;
    }
    this.uninstall();
    if (!this.started) {
      this.started = true;
      this.timeline.addEvent({
        kind: "session",
        title: "Tracking started",
        description: `Log tracking started for ${this.title}`,
        icon: "▶️",
        timestampMs: this.clock(),
        metadata: {},
      });
    }
    if (sink) {
      this.unsubscribe = sink.subscribe((record) => {
        this.handleLine(record.text, record.timestampMs);
      });
    }
    const intervalMs = this.config.tracker.unknownFlushIntervalMs;
    if (this.outputDir && intervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flushUnknownMessages();
      }, intervalMs);
      this.flushTimer.unref();
    }
    this.logger.debug({ outputDir: this.outputDir }, "session installed");
  }

  uninstall(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
  }

  handleLine(text: string, timestampMs?: number): LineKind {
    if (this.frozen) {
      this.counters.linesAfterFinish += 1;
      return "ignored";
    }
    const parsed = parseLogLine(text);
    if (!parsed.message) {
      return "blank";
    }
    this.counters.linesSeen += 1;
    const at = timestampMs ?? parsed.timestampMs ?? this.clock();

    let matched: PatternMatch | null;
    try {
      matched = this.registry.match(parsed.message);
    } catch (error) {
      this.counters.matchErrors += 1;
      this.logger.warn({ err: errorMessage(error), line: parsed.message }, "pattern match failed");
      return this.recordUnknown(parsed.message, at, "match_error");
    }
    if (!matched) {
      return this.recordUnknown(parsed.message, at, "unmatched");
    }

    const kind = this.route(matched.extraction, parsed.message, text, at);
    if (kind !== "unknown") {
      this.counters.linesMatched += 1;
    }
    return kind;
  }

  setPrompt(text: string): void {
    if (this.frozen) {
      this.logger.debug("prompt ignored: tracking already finished");
      return;
    }
    this.prompt = text;
  }

  finishTracking(): Promise<ExportReport> {
    if (!this.finishReport) {
      this.finishReport = this.finish();
    }
    return this.finishReport;
  }

  getThinkingLogs(): ThoughtRecord[] {
    return this.thoughts.all();
  }

  getTimeline(): StepRecord[] {
    return this.timeline.getTimeline();
  }

  getTimelineDocument(): TimelineDocument {
    const { startMs, endMs } = this.timeline.bounds();
    const timeline = this.getTimeline();
    return {
      title: this.title,
      prompt: this.prompt,
      start_time: toIso(startMs),
      end_time: toIso(endMs),
      total_steps: timeline.length,
      timeline,
      events: this.timeline.getEvents(),
    };
  }

  getEvents(): StandaloneEvent[] {
    return this.timeline.getEvents();
  }

  getUnknownMessages(): UnknownMessage[] {
    return this.timeline.getUnknownMessages();
  }

  getThoughtsSummary(): ThoughtsSummary {
    return summarizeThoughts(this.getTimeline());
  }

  getStepsSummary(): StepsSummary {
    return summarizeSteps(this.getTimeline());
  }

  getActionsSummary(): ActionsSummary {
    return summarizeActions(this.getTimeline());
  }

  getLlmStats(): LlmStats {
    return this.llm.stats();
  }

  getDiagnostics(): PipelineDiagnostics {
    const thoughtStats = this.thoughts.stats();
    return {
      ...this.counters,
      droppedUnknown: this.timeline.droppedUnknown,
      clampedValues: this.tracker.clampedValues,
      ignoredMarkers: this.tracker.ignoredMarkers,
      thoughtsDetected: thoughtStats.detected,
      thoughtsProcessed: thoughtStats.processed,
      duplicateThoughts: thoughtStats.duplicates,
      thoughtsByCategory: thoughtStats.byCategory,
    };
  }

  getSummary(): SummaryStats {
    return buildSummary({
      title: this.title,
      prompt: this.prompt,
      steps: this.getTimeline(),
      llm: this.getLlmStats(),
      diagnostics: this.getDiagnostics(),
    });
  }

  saveTimeline(filePath: string): Promise<ExportReport> {
    const document = this.getTimelineDocument();
    return this.enqueue(() => saveTimelineDocument(filePath, document, this.exportOptions()));
  }

  exportArtifacts(outputDir: string): Promise<ExportReport> {
    const artifacts = {
      timeline: this.getTimelineDocument(),
      thoughts: this.getThinkingLogs(),
      summary: this.getSummary(),
      unknown: this.getUnknownMessages(),
    };
    return this.enqueue(async () => {
      const report = await exportArtifacts(outputDir, artifacts, this.exportOptions());
      this.logger.info({ outputDir, written: report.written.length, warnings: report.warnings.length }, "artifacts exported");
      return report;
    });
  }

  flushUnknownMessages(): Promise<void> {
    const outputDir = this.outputDir;
    if (!outputDir) return this.queue;
    const redactor = new Redactor(this.config.redaction);
    const snapshot = this.timeline.getUnknownMessages().map((message) => redactor.unknownMessage(message));
    return this.enqueue(async () => {
      try {
        await writeJsonArtifact(path.join(outputDir, UNKNOWN_MESSAGES_FILE), snapshot, this.config.export);
      } catch (error) {
        this.logger.warn({ err: errorMessage(error) }, "unknown message flush failed");
      }
    });
  }

  private async finish(): Promise<ExportReport> {
    this.tracker.finish();
    this.timeline.addEvent({
      kind: "session",
      title: "Tracking finished",
      description: `Log tracking finished for ${this.title}`,
      icon: "⏹️",
      timestampMs: this.clock(),
      metadata: { steps: this.timeline.stepCount },
    });
    this.frozen = true;
    this.uninstall();
    await this.queue;

    if (!this.outputDir) {
      return { written: [], warnings: [] };
    }
    return this.exportArtifacts(this.outputDir);
  }

  private route(extraction: PatternExtraction, message: string, originalLine: string, at: number): LineKind {
    switch (extraction.kind) {
      case "action": {
        const action = this.tracker.recordAction(extraction.body, originalLine, at);
        if (action.source === "malformed") {
          this.counters.malformedPayloads += 1;
          this.logger.debug({ step: action.stepNumber }, "malformed action payload");
        }
        return "action";
      }
      case "step_start": {
        const result = this.tracker.start(extraction.stepNumber, at);
        if (result.status === "stale") {
          this.logger.debug({ step: result.stepNumber }, "stale step marker ignored");
        }
        return "step_start";
      }
      case "step_end": {
        const result = this.tracker.end(extraction.stepNumber, at);
        if (result.status === "unknown_step") {
          return this.recordUnknown(message, at, "unknown_step");
        }
        return "step_end";
      }
      case "thought":
        this.tracker.recordThought(extraction.label, extraction.text, at);
        return "thought";
      case "action_result":
        if (!this.tracker.attachResult(extraction.text, at)) {
          return this.recordUnknown(message, at, "orphan_result");
        }
        return "action_result";
      case "screenshot":
        this.tracker.observe(at);
        this.timeline.addEvent({
          kind: "screenshot",
          title: "Screenshot",
          description: extraction.reference || "Screenshot captured",
          icon: "📸",
          timestampMs: at,
          metadata: { reference: extraction.reference, stepNumber: this.tracker.openStep },
        });
        return "screenshot";
      case "llm_usage":
        this.llm.recordUsage(extraction.phase, extraction.model, extraction.tokens);
        return "llm_usage";
      case "llm_cost":
        this.llm.recordCost(extraction.costUsd, extraction.model);
        return "llm_cost";
    }
  }

  private recordUnknown(text: string, timestampMs: number, reason: UnknownReason): "unknown" {
    this.counters.unknownCount += 1;
    this.timeline.addUnknown({ text, timestampMs, reason });
    return "unknown";
  }

  private exportOptions(): ExportOptions {
    return { export: this.config.export, redaction: this.config.redaction, logger: this.logger };
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

/** Builds a ready session. Nothing is attached until install(). */
export function createSession(options: SessionOptions = {}): TraceSession {
  return new Session(options);
}
