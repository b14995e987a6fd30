import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type {
  ActionRecord,
  ActionSource,
  EvaluationOutcome,
  ExportConfig,
  RedactionConfig,
  StandaloneEvent,
  StandaloneEventKind,
  StepCloseReason,
  StepRecord,
  SummaryStats,
  ThoughtCategory,
  ThoughtRecord,
  TimelineDocument,
  UnknownMessage,
} from "@steptrace/contracts";
import { ExportError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { Redactor } from "./redaction.js";
import { THOUGHT_CATEGORIES } from "./thoughts.js";
import { asRecord, asString, isRecord } from "./utils.js";

export const TIMELINE_FILE = "timeline.json";
export const THINKING_LOGS_FILE = "thinking_logs.json";
export const SUMMARY_FILE = "summary_logs.json";
export const UNKNOWN_MESSAGES_FILE = "unknown_messages.json";

export interface ExportReport {
  written: string[];
  warnings: string[];
}

export interface SessionArtifacts {
  timeline: TimelineDocument;
  thoughts: ThoughtRecord[];
  summary: SummaryStats;
  unknown: UnknownMessage[];
}

export interface ExportOptions {
  export: ExportConfig;
  redaction: RedactionConfig;
  logger: Logger;
}

function coerce(value: unknown, seen: WeakSet<object>): unknown {
  switch (typeof value) {
    case "bigint":
    case "symbol":
      return value.toString();
    case "function":
      return `[function ${value.name || "anonymous"}]`;
    case "number":
      return Number.isFinite(value) ? value : String(value);
    case "string":
    case "boolean":
    case "undefined":
      return value;
    default:
      break;
  }
  if (value === null) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? String(value) : value.toISOString();
  }
  if (value instanceof Error) {
    return `${value.name}: ${value.message}`;
  }
  if (typeof value !== "object") {
    return String(value);
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item) => coerce(item, seen));
    }
    if (value instanceof Set) {
      return [...value].map((item) => coerce(item, seen));
    }
    if (value instanceof Map) {
      const out: Record<string, unknown> = {};
      for (const [key, nested] of value) {
        out[asString(key)] = coerce(nested, seen);
      }
      return out;
    }
    const out: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      out[key] = coerce(nested, seen);
    }
    return out;
  } finally {
    seen.delete(value);
  }
}

/**
 * JSON-safe copy of any value. Values JSON cannot carry (bigint, symbols,
 * functions, errors, dates, non-finite numbers, cycles) become strings;
 * maps become objects and sets become arrays.
 */
export function toSerializable(value: unknown): unknown {
  return coerce(value, new WeakSet<object>());
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function writeAtomically(filePath: string, content: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await writeFile(tmpPath, content, "utf8");
    await rename(tmpPath, filePath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

/** Writes through a temp file and rename; retries once before raising ExportError. */
export async function writeJsonArtifact(filePath: string, value: unknown, config: ExportConfig): Promise<void> {
  const content = `${JSON.stringify(toSerializable(value), null, config.indent)}\n`;
  try {
    await writeAtomically(filePath, content);
  } catch {
    await delay(config.retryDelayMs);
    try {
      await writeAtomically(filePath, content);
    } catch (error) {
      throw new ExportError(filePath, errorMessage(error), { cause: error });
    }
  }
}

async function writeReported(
  report: ExportReport,
  filePath: string,
  value: unknown,
  options: ExportOptions,
): Promise<void> {
  try {
    await writeJsonArtifact(filePath, value, options.export);
    report.written.push(filePath);
  } catch (error) {
    const message = errorMessage(error);
    options.logger.warn({ file: filePath, err: message }, "artifact export failed");
    report.warnings.push(message);
  }
}

export async function saveTimelineDocument(
  filePath: string,
  document: TimelineDocument,
  options: ExportOptions,
): Promise<ExportReport> {
  const report: ExportReport = { written: [], warnings: [] };
  const redactor = new Redactor(options.redaction);
  await writeReported(report, filePath, redactor.timeline(document), options);
  return report;
}

/** Writes every artifact independently; a failed file is a warning, never a throw. */
export async function exportArtifacts(
  outputDir: string,
  artifacts: SessionArtifacts,
  options: ExportOptions,
): Promise<ExportReport> {
  const report: ExportReport = { written: [], warnings: [] };
  const redactor = new Redactor(options.redaction);

  await writeReported(report, path.join(outputDir, TIMELINE_FILE), redactor.timeline(artifacts.timeline), options);
  await writeReported(
    report,
    path.join(outputDir, THINKING_LOGS_FILE),
    artifacts.thoughts.map((thought) => redactor.thought(thought)),
    options,
  );
  await writeReported(report, path.join(outputDir, SUMMARY_FILE), redactor.summary(artifacts.summary), options);
  await writeReported(
    report,
    path.join(outputDir, UNKNOWN_MESSAGES_FILE),
    artifacts.unknown.map((message) => redactor.unknownMessage(message)),
    options,
  );
  return report;
}

const ACTION_SOURCES: readonly ActionSource[] = ["json", "text", "malformed"];
const OUTCOMES: readonly EvaluationOutcome[] = ["success", "failure", "unknown"];
const CLOSE_REASONS: readonly StepCloseReason[] = ["end_marker", "next_step", "finish"];
const EVENT_KINDS: readonly StandaloneEventKind[] = ["screenshot", "session"];

function oneOf<T extends string>(allowed: readonly T[], value: unknown): T | null {
  return allowed.find((candidate) => candidate === value) ?? null;
}

function toNumber(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function toNullableNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function toNullableString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function readThought(value: unknown, stepNumber: number): ThoughtRecord {
  const record = asRecord(value);
  const category: ThoughtCategory = oneOf(THOUGHT_CATEGORIES, record.category) ?? "generic";
  return {
    category,
    text: asString(record.text),
    label: asString(record.label),
    stepNumber: toNumber(record.stepNumber, stepNumber),
    dedupeKey: asString(record.dedupeKey),
    timestampMs: toNumber(record.timestampMs, 0),
    placeholder: record.placeholder === true,
  };
}

function readAction(value: unknown, stepNumber: number): ActionRecord {
  const record = asRecord(value);
  const action: ActionRecord = {
    type: asString(record.type) || "generic",
    payload: record.payload ?? null,
    source: oneOf(ACTION_SOURCES, record.source) ?? "text",
    description: asString(record.description),
    icon: asString(record.icon),
    stepNumber: toNumber(record.stepNumber, stepNumber),
    timestampMs: toNumber(record.timestampMs, 0),
  };
  if (typeof record.result === "string") {
    action.result = record.result;
  }
  return action;
}

function readStep(value: unknown): StepRecord | null {
  const record = asRecord(value);
  const stepNumber = toNullableNumber(record.stepNumber);
  if (stepNumber === null) return null;
  const thoughts = Array.isArray(record.thoughts) ? record.thoughts : [];
  const actions = Array.isArray(record.actions) ? record.actions : [];
  const notes = Array.isArray(record.notes) ? record.notes : [];
  return {
    stepNumber,
    startMs: toNumber(record.startMs, 0),
    endMs: toNullableNumber(record.endMs),
    durationMs: toNullableNumber(record.durationMs),
    isComplete: record.isComplete === true,
    closedBy: oneOf(CLOSE_REASONS, record.closedBy),
    initializedImplicitly: record.initializedImplicitly === true,
    thoughts: thoughts.map((thought) => readThought(thought, stepNumber)),
    actions: actions.map((action) => readAction(action, stepNumber)),
    outcome: oneOf(OUTCOMES, record.outcome) ?? "unknown",
    notes: notes.map(asString),
  };
}

function readEvent(value: unknown): StandaloneEvent | null {
  const record = asRecord(value);
  const kind = oneOf(EVENT_KINDS, record.kind);
  if (!kind) return null;
  return {
    kind,
    title: asString(record.title),
    description: asString(record.description),
    icon: asString(record.icon),
    timestampMs: toNumber(record.timestampMs, 0),
    metadata: asRecord(record.metadata),
  };
}

/** Validates a parsed timeline.json; malformed steps and events are skipped. */
export function parseTimelineDocument(value: unknown): TimelineDocument {
  if (!isRecord(value) || !Array.isArray(value.timeline)) {
    throw new ExportError(TIMELINE_FILE, "document has no timeline list");
  }
  const timeline = value.timeline
    .map(readStep)
    .filter((step): step is StepRecord => step !== null)
    .sort((left, right) => left.stepNumber - right.stepNumber);
  const events = Array.isArray(value.events)
    ? value.events.map(readEvent).filter((event): event is StandaloneEvent => event !== null)
    : [];
  return {
    title: asString(value.title),
    prompt: toNullableString(value.prompt),
    start_time: toNullableString(value.start_time),
    end_time: toNullableString(value.end_time),
    total_steps: toNumber(value.total_steps, timeline.length),
    timeline,
    events,
  };
}

export async function loadTimelineDocument(filePath: string): Promise<TimelineDocument> {
  const raw = await readFile(filePath, "utf8");
  try {
    return parseTimelineDocument(JSON.parse(raw));
  } catch (error) {
    throw new ExportError(filePath, errorMessage(error), { cause: error });
  }
}
