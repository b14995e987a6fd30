import type {
  ActionRecord,
  EvaluationOutcome,
  StepCloseReason,
  StepRecord,
  ThoughtCategory,
  ThoughtRecord,
} from "@steptrace/contracts";
import { parseAction } from "./actions.js";
import type { ThoughtAddResult, ThoughtStore } from "./thoughts.js";
import { type TimelineModel, emptyStep } from "./timeline.js";

const PLACEHOLDER_CATEGORIES: readonly ThoughtCategory[] = ["evaluation", "memory", "next_goal"];
const DEFAULT_MAX_GAP_STEPS = 1000;

export interface StepTrackerOptions {
  /** Largest gap filled with synthesized steps; wider gaps open the step without filling. */
  maxGapSteps?: number;
}

export type StepStartResult =
  | { status: "opened"; stepNumber: number; closedPrevious: number | null; synthesized: number[] }
  | { status: "already_open"; stepNumber: number }
  | { status: "stale"; stepNumber: number };

type StepEndResult =
  | { status: "closed"; stepNumber: number }
  | { status: "completed_earlier"; stepNumber: number }
  | { status: "already_complete"; stepNumber: number }
  | { status: "unknown_step"; stepNumber: number };

/** Latest decisive evaluation wins; placeholders never decide. */
export function inferOutcome(thoughts: readonly ThoughtRecord[]): EvaluationOutcome {
  let outcome: EvaluationOutcome = "unknown";
  for (const thought of thoughts) {
    if (thought.category !== "evaluation" || thought.placeholder) continue;
    const decided = evaluationOutcome(thought);
    if (decided !== "unknown") outcome = decided;
  }
  return outcome;
}

function evaluationOutcome(thought: ThoughtRecord): EvaluationOutcome {
  if (thought.label.includes("👍")) return "success";
  if (thought.label.includes("👎")) return "failure";
  const text = thought.text.toLowerCase();
  if (/^(?:success(?:ful)?|sucesso)\b/.test(text)) return "success";
  if (/\b(?:fail(?:ed|ure)?|falha|falhou)\b/.test(text)) return "failure";
  return "unknown";
}

/**
 * Owns step boundaries. Steps are opened by markers or implicitly by content,
 * and closed by end markers, the next start, or finish().
 */
export class StepTracker {
  private openStepNumber: number | null = null;
  private lastSeenMs: number | null = null;
  private clampedCount = 0;
  private ignoredMarkerCount = 0;
  private readonly maxGapSteps: number;

  constructor(
    private readonly timeline: TimelineModel,
    private readonly thoughts: ThoughtStore,
    options: StepTrackerOptions = {},
  ) {
    this.maxGapSteps = options.maxGapSteps ?? DEFAULT_MAX_GAP_STEPS;
  }

  get openStep(): number | null {
    return this.openStepNumber;
  }

  get clampedValues(): number {
    return this.clampedCount;
  }

  get ignoredMarkers(): number {
    return this.ignoredMarkerCount;
  }

  observe(timestampMs: number): void {
    if (this.lastSeenMs === null || timestampMs > this.lastSeenMs) {
      this.lastSeenMs = timestampMs;
    }
  }

  start(requested: number, timestampMs: number): StepStartResult {
    this.observe(timestampMs);
    const { stepNumber, note } = this.clamp(requested);

    if (this.openStepNumber === stepNumber) {
      this.attachNote(stepNumber, note);
      return { status: "already_open", stepNumber };
    }
    const last = this.timeline.lastStepNumber();
    if (stepNumber <= last) {
      this.ignoredMarkerCount += 1;
      this.attachNote(stepNumber, note);
      return { status: "stale", stepNumber };
    }

    const closedPrevious = this.openStepNumber;
    if (closedPrevious !== null) {
      this.close(closedPrevious, timestampMs, "next_step", true);
    }

    const synthesized: number[] = [];
    const gap = stepNumber - last - 1;
    let gapNote: string | null = null;
    if (gap > this.maxGapSteps) {
      this.clampedCount += 1;
      gapNote = `gap of ${gap} steps before step ${stepNumber} exceeds ${this.maxGapSteps}; not synthesized`;
    } else {
      for (let missing = last + 1; missing < stepNumber; missing += 1) {
        this.synthesize(missing, stepNumber, timestampMs);
        synthesized.push(missing);
      }
    }

    const step = emptyStep(stepNumber, timestampMs, false);
    if (note) step.notes.push(note);
    if (gapNote) step.notes.push(gapNote);
    this.timeline.putStep(step);
    this.openStepNumber = stepNumber;
    return { status: "opened", stepNumber, closedPrevious, synthesized };
  }

  end(requested: number, timestampMs: number): StepEndResult {
    this.observe(timestampMs);
    const { stepNumber, note } = this.clamp(requested);
    const step = this.timeline.getStep(stepNumber);
    if (!step) {
      return { status: "unknown_step", stepNumber };
    }
    if (note) step.notes.push(note);

    if (this.openStepNumber === stepNumber) {
      this.close(stepNumber, timestampMs, "end_marker", true);
      this.openStepNumber = null;
      return { status: "closed", stepNumber };
    }
    if (step.isComplete) {
      this.ignoredMarkerCount += 1;
      return { status: "already_complete", stepNumber };
    }
    step.isComplete = true;
    step.closedBy = "end_marker";
    if (step.endMs === null) {
      this.setEnd(step, timestampMs);
    }
    return { status: "completed_earlier", stepNumber };
  }

  /** The open step, opening the next number implicitly when none is. */
  current(timestampMs: number): StepRecord {
    this.observe(timestampMs);
    if (this.openStepNumber !== null) {
      const open = this.timeline.getStep(this.openStepNumber);
      if (open) return open;
    }
    const stepNumber = this.timeline.lastStepNumber() + 1;
    const step = emptyStep(stepNumber, timestampMs, true);
    this.timeline.putStep(step);
    this.openStepNumber = stepNumber;
    return step;
  }

  recordThought(label: string, text: string, timestampMs: number): ThoughtAddResult {
    const step = this.current(timestampMs);
    const result = this.thoughts.add({ label, text, stepNumber: step.stepNumber, timestampMs });
    if (result.status === "added") {
      step.thoughts.push(result.record);
      if (result.record.category === "evaluation") {
        step.outcome = inferOutcome(step.thoughts);
      }
    }
    return result;
  }

  recordAction(body: string, originalLine: string, timestampMs: number): ActionRecord {
    const step = this.current(timestampMs);
    const action = parseAction(body, { stepNumber: step.stepNumber, timestampMs, originalLine });
    step.actions.push(action);
    return action;
  }

  /** Attaches to the latest action of the open step; false when there is none. */
  attachResult(text: string, timestampMs: number): boolean {
    this.observe(timestampMs);
    if (this.openStepNumber === null) return false;
    const latest = this.timeline.getStep(this.openStepNumber)?.actions.at(-1);
    if (!latest) return false;
    latest.result = latest.result ? `${latest.result}\n${text}` : text;
    return true;
  }

  /** Closes the open step at the last observed timestamp. */
  finish(): void {
    if (this.openStepNumber === null) return;
    const step = this.timeline.getStep(this.openStepNumber);
    this.openStepNumber = null;
    if (!step) return;
    this.close(step.stepNumber, this.lastSeenMs ?? step.startMs, "finish", false);
  }

  private synthesize(stepNumber: number, before: number, timestampMs: number): void {
    const step = emptyStep(stepNumber, timestampMs, true);
    for (const category of PLACEHOLDER_CATEGORIES) {
      step.thoughts.push(this.thoughts.placeholder(stepNumber, category, timestampMs));
    }
    step.endMs = timestampMs;
    step.durationMs = 0;
    step.closedBy = "next_step";
    step.notes.push(`synthesized to fill a gap before step ${before}`);
    this.timeline.putStep(step);
  }

  private close(stepNumber: number, timestampMs: number, reason: StepCloseReason, complete: boolean): void {
    const step = this.timeline.getStep(stepNumber);
    if (!step) return;
    step.isComplete = complete;
    step.closedBy = reason;
    this.setEnd(step, timestampMs);
  }

  private setEnd(step: StepRecord, timestampMs: number): void {
    if (timestampMs < step.startMs) {
      this.clampedCount += 1;
      step.notes.push(`end timestamp ${timestampMs} precedes start ${step.startMs}; duration clamped to 0`);
      step.endMs = step.startMs;
      step.durationMs = 0;
      return;
    }
    step.endMs = timestampMs;
    step.durationMs = timestampMs - step.startMs;
  }

  private clamp(requested: number): { stepNumber: number; note: string | null } {
    if (requested >= 1) {
      return { stepNumber: requested, note: null };
    }
    this.clampedCount += 1;
    return { stepNumber: 1, note: `step number ${requested} clamped to 1` };
  }

  private attachNote(stepNumber: number, note: string | null): void {
    if (!note) return;
    this.timeline.getStep(stepNumber)?.notes.push(note);
  }
}
