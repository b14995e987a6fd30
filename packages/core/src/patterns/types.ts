export type PatternExtraction =
  | { kind: "action"; body: string }
  | { kind: "action_result"; text: string }
  | { kind: "step_start"; stepNumber: number }
  | { kind: "step_end"; stepNumber: number }
  | { kind: "thought"; label: string; text: string }
  | { kind: "screenshot"; reference: string }
  | { kind: "llm_usage"; phase: "request" | "response"; model: string; tokens: number }
  | { kind: "llm_cost"; costUsd: number; model: string };

export type PatternKind = PatternExtraction["kind"];

export interface PatternEntry {
  name: string;
  kind: PatternKind;
  matcher: RegExp;
  /** Returning null declines the match; evaluation continues with the next entry. */
  extract(match: RegExpExecArray, line: string): PatternExtraction | null;
}

export interface PatternMatch {
  entry: PatternEntry;
  extraction: PatternExtraction;
}
