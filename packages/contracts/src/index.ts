export type ThoughtCategory = "evaluation" | "memory" | "next_goal" | "generic";

export type ActionType =
  | "navigation"
  | "click"
  | "form"
  | "extraction"
  | "scroll"
  | "wait"
  | "done"
  | "generic";

export type ActionSource = "json" | "text" | "malformed";
export type EvaluationOutcome = "success" | "failure" | "unknown";
export type StepCloseReason = "end_marker" | "next_step" | "finish";
export type StandaloneEventKind = "screenshot" | "session";
export type UnknownReason = "unmatched" | "match_error" | "orphan_result" | "unknown_step";

export interface ThoughtRecord {
  category: ThoughtCategory;
  text: string;
  label: string;
  stepNumber: number;
  dedupeKey: string;
  timestampMs: number;
  placeholder: boolean;
}

export interface ActionRecord {
  /** Explicit or JSON-declared types are kept verbatim, so this is wider than ActionType. */
  type: string;
  payload: unknown;
  source: ActionSource;
  description: string;
  icon: string;
  stepNumber: number;
  timestampMs: number;
  result?: string;
}

export interface StepRecord {
  stepNumber: number;
  startMs: number;
  endMs: number | null;
  durationMs: number | null;
  isComplete: boolean;
  closedBy: StepCloseReason | null;
  initializedImplicitly: boolean;
  thoughts: ThoughtRecord[];
  actions: ActionRecord[];
  outcome: EvaluationOutcome;
  notes: string[];
}

export interface StandaloneEvent {
  kind: StandaloneEventKind;
  title: string;
  description: string;
  icon: string;
  timestampMs: number;
  metadata: Record<string, unknown>;
}

export interface UnknownMessage {
  text: string;
  timestampMs: number;
  reason: UnknownReason;
}

export interface NamedCount {
  name: string;
  count: number;
}

export interface StepCount {
  stepNumber: number;
  count: number;
}

export interface ThoughtsSummary {
  total: number;
  byCategory: Record<ThoughtCategory, number>;
  /** Percent of all thoughts, 0..100. */
  distribution: Record<ThoughtCategory, number>;
  placeholders: number;
  stepsWithThoughts: number;
  perStep: StepCount[];
}

export interface StepSummaryRow {
  stepNumber: number;
  isComplete: boolean;
  closedBy: StepCloseReason | null;
  initializedImplicitly: boolean;
  durationMs: number | null;
  thoughtCount: number;
  actionCount: number;
  outcome: EvaluationOutcome;
  thoughtsByCategory: Record<ThoughtCategory, number>;
}

export interface StepsSummary {
  totalSteps: number;
  completeSteps: number;
  implicitSteps: number;
  completionRate: number;
  totalDurationMs: number;
  averageDurationMs: number;
  stepsWithEvaluation: number;
  successSteps: number;
  failureSteps: number;
  /** success / (success + failure), 0 when neither was observed. */
  successRatio: number;
  steps: StepSummaryRow[];
}

export interface ActionsSummary {
  total: number;
  byType: NamedCount[];
  perStep: StepCount[];
  malformed: number;
}

export interface LlmModelStats {
  model: string;
  requests: number;
  responses: number;
  tokens: number;
  costUsd: number;
}

export interface LlmStats {
  requests: number;
  responses: number;
  totalTokens: number;
  estimatedCostUsd: number;
  models: LlmModelStats[];
}

export interface PipelineDiagnostics {
  linesSeen: number;
  linesMatched: number;
  linesAfterFinish: number;
  unknownCount: number;
  droppedUnknown: number;
  matchErrors: number;
  malformedPayloads: number;
  clampedValues: number;
  ignoredMarkers: number;
  thoughtsDetected: number;
  thoughtsProcessed: number;
  duplicateThoughts: number;
  /** Running counters kept as thoughts are recorded; placeholders excluded. */
  thoughtsByCategory: Record<ThoughtCategory, number>;
}

export interface SummaryStats {
  title: string;
  prompt: string | null;
  totalSteps: number;
  thoughts: ThoughtsSummary;
  steps: StepsSummary;
  actions: ActionsSummary;
  llm: LlmStats;
  diagnostics: PipelineDiagnostics;
}

/** Shape of timeline.json. Top-level keys are part of the artifact contract. */
export interface TimelineDocument {
  title: string;
  prompt: string | null;
  start_time: string | null;
  end_time: string | null;
  total_steps: number;
  timeline: StepRecord[];
  events: StandaloneEvent[];
}

export interface TrackerConfig {
  title: string;
  outputDir: string;
  unknownMessageCap: number;
  unknownFlushIntervalMs: number;
  maxGapSteps: number;
}

export interface ExportConfig {
  indent: number;
  retryDelayMs: number;
}

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
}

export interface RedactionConfig {
  mode: "strict" | "off";
  alwaysOn: boolean;
  replacement: string;
  keyPattern: string;
  valuePattern: string;
}

export interface AppConfig {
  tracker: TrackerConfig;
  export: ExportConfig;
  logging: LoggingConfig;
  redaction: RedactionConfig;
}
