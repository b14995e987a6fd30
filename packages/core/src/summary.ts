import type {
  ActionsSummary,
  LlmStats,
  NamedCount,
  PipelineDiagnostics,
  StepRecord,
  StepSummaryRow,
  StepsSummary,
  SummaryStats,
  ThoughtCategory,
  ThoughtRecord,
  ThoughtsSummary,
} from "@steptrace/contracts";
import { THOUGHT_CATEGORIES, emptyCategoryCounts } from "./thoughts.js";

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function ratio(part: number, whole: number): number {
  return whole > 0 ? round(part / whole, 4) : 0;
}

// Placeholders are reported on their own, never as observed thoughts.
function observedThoughts(step: StepRecord): ThoughtRecord[] {
  return step.thoughts.filter((thought) => !thought.placeholder);
}

function countByCategory(steps: readonly StepRecord[]): Record<ThoughtCategory, number> {
  const counts = emptyCategoryCounts();
  for (const step of steps) {
    for (const thought of observedThoughts(step)) {
      counts[thought.category] += 1;
    }
  }
  return counts;
}

function hasEvaluation(step: StepRecord): boolean {
  return step.thoughts.some((thought) => thought.category === "evaluation" && !thought.placeholder);
}

export function summarizeThoughts(steps: readonly StepRecord[]): ThoughtsSummary {
  const byCategory = countByCategory(steps);
  const total = THOUGHT_CATEGORIES.reduce((sum, category) => sum + byCategory[category], 0);
  const distribution = emptyCategoryCounts();
  for (const category of THOUGHT_CATEGORIES) {
    distribution[category] = total > 0 ? round((byCategory[category] / total) * 100, 2) : 0;
  }

  return {
    total,
    byCategory,
    distribution,
    placeholders: steps.reduce((sum, step) => sum + step.thoughts.filter((thought) => thought.placeholder).length, 0),
    stepsWithThoughts: steps.filter((step) => observedThoughts(step).length > 0).length,
    perStep: steps.map((step) => ({ stepNumber: step.stepNumber, count: observedThoughts(step).length })),
  };
}

function toStepRow(step: StepRecord): StepSummaryRow {
  return {
    stepNumber: step.stepNumber,
    isComplete: step.isComplete,
    closedBy: step.closedBy,
    initializedImplicitly: step.initializedImplicitly,
    durationMs: step.durationMs,
    thoughtCount: observedThoughts(step).length,
    actionCount: step.actions.length,
    outcome: step.outcome,
    thoughtsByCategory: countByCategory([step]),
  };
}

export function summarizeSteps(steps: readonly StepRecord[]): StepsSummary {
  const durations = steps.flatMap((step) => (step.durationMs === null ? [] : [step.durationMs]));
  const totalDurationMs = durations.reduce((sum, value) => sum + value, 0);
  const completeSteps = steps.filter((step) => step.isComplete).length;
  const successSteps = steps.filter((step) => step.outcome === "success").length;
  const failureSteps = steps.filter((step) => step.outcome === "failure").length;

  return {
    totalSteps: steps.length,
    completeSteps,
    implicitSteps: steps.filter((step) => step.initializedImplicitly).length,
    completionRate: ratio(completeSteps, steps.length),
    totalDurationMs,
    averageDurationMs: durations.length > 0 ? Math.round(totalDurationMs / durations.length) : 0,
    stepsWithEvaluation: steps.filter(hasEvaluation).length,
    successSteps,
    failureSteps,
    successRatio: ratio(successSteps, successSteps + failureSteps),
    steps: steps.map(toStepRow),
  };
}

export function summarizeActions(steps: readonly StepRecord[]): ActionsSummary {
  const byType = new Map<string, number>();
  let total = 0;
  let malformed = 0;
  for (const step of steps) {
    for (const action of step.actions) {
      total += 1;
      byType.set(action.type, (byType.get(action.type) ?? 0) + 1);
      if (action.source === "malformed") malformed += 1;
    }
  }

  const typeCounts: NamedCount[] = [...byType.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((left, right) => right.count - left.count || left.name.localeCompare(right.name));

  return {
    total,
    byType: typeCounts,
    perStep: steps.map((step) => ({ stepNumber: step.stepNumber, count: step.actions.length })),
    malformed,
  };
}

export interface SummaryInput {
  title: string;
  prompt: string | null;
  steps: readonly StepRecord[];
  llm: LlmStats;
  diagnostics: PipelineDiagnostics;
}

export function buildSummary(input: SummaryInput): SummaryStats {
  return {
    title: input.title,
    prompt: input.prompt,
    totalSteps: input.steps.length,
    thoughts: summarizeThoughts(input.steps),
    steps: summarizeSteps(input.steps),
    actions: summarizeActions(input.steps),
    llm: input.llm,
    diagnostics: input.diagnostics,
  };
}
