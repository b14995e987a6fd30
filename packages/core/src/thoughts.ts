import type { ThoughtCategory, ThoughtRecord } from "@steptrace/contracts";

export const THOUGHT_CATEGORIES: readonly ThoughtCategory[] = ["evaluation", "memory", "next_goal", "generic"];

const GLYPH_CATEGORIES: ReadonlyArray<[string, ThoughtCategory]> = [
  ["👍", "evaluation"],
  ["👎", "evaluation"],
  ["🤷", "evaluation"],
  ["⚠", "evaluation"],
  ["🧠", "memory"],
  ["🎯", "next_goal"],
  ["💭", "generic"],
  ["🤔", "generic"],
  ["🛠", "generic"],
];

const TAG_CATEGORIES: ReadonlyArray<[RegExp, ThoughtCategory]> = [
  [/eval|assess|avalia|^(?:success|failure|failed|uncertain)$/i, "evaluation"],
  [/mem[óo]ria|memory|remember|recall/i, "memory"],
  [/goal|objetivo|aiming|planning/i, "next_goal"],
];

const PLACEHOLDER_TEXT: Record<ThoughtCategory, string> = {
  evaluation: "No evaluation recorded",
  memory: "No memory recorded",
  next_goal: "No next goal recorded",
  generic: "No thought recorded",
};

const LEADING_DECORATION = /^[\p{Extended_Pictographic}\p{So}\u{FE0F}\u{200D}\s]+/u;

export function emptyCategoryCounts(): Record<ThoughtCategory, number> {
  return { evaluation: 0, memory: 0, next_goal: 0, generic: 0 };
}

/** Symbolic prefixes win over free-text tags; anything unrecognized is generic. */
export function normalizeCategory(label: string): ThoughtCategory {
  for (const [glyph, category] of GLYPH_CATEGORIES) {
    if (label.includes(glyph)) return category;
  }
  const tag = label.replace(LEADING_DECORATION, "").trim();
  for (const [pattern, category] of TAG_CATEGORIES) {
    if (pattern.test(tag)) return category;
  }
  return "generic";
}

export function normalizeThoughtText(text: string): string {
  return text.replace(LEADING_DECORATION, "").replace(/\s+/g, " ").trim();
}

export function thoughtDedupeKey(stepNumber: number, category: ThoughtCategory, text: string): string {
  return `${stepNumber}|${category}|${text.toLowerCase()}`;
}

export interface ThoughtInput {
  label: string;
  text: string;
  stepNumber: number;
  timestampMs: number;
}

export type ThoughtAddResult =
  | { status: "added"; record: ThoughtRecord }
  | { status: "duplicate"; dedupeKey: string }
  | { status: "empty" };

export interface ThoughtCounters {
  detected: number;
  processed: number;
  duplicates: number;
  byCategory: Record<ThoughtCategory, number>;
}

export class ThoughtStore {
  private readonly records: ThoughtRecord[] = [];
  private readonly keys = new Set<string>();
  private readonly counters: ThoughtCounters = {
    detected: 0,
    processed: 0,
    duplicates: 0,
    byCategory: emptyCategoryCounts(),
  };

  add(input: ThoughtInput): ThoughtAddResult {
    this.counters.detected += 1;
    const text = normalizeThoughtText(input.text);
    if (!text) {
      return { status: "empty" };
    }

    const category = normalizeCategory(input.label);
    const dedupeKey = thoughtDedupeKey(input.stepNumber, category, text);
    if (this.keys.has(dedupeKey)) {
      this.counters.duplicates += 1;
      return { status: "duplicate", dedupeKey };
    }

    const record: ThoughtRecord = {
      category,
      text,
      label: input.label.trim(),
      stepNumber: input.stepNumber,
      dedupeKey,
      timestampMs: input.timestampMs,
      placeholder: false,
    };
    this.keys.add(dedupeKey);
    this.records.push(record);
    this.counters.processed += 1;
    this.counters.byCategory[category] += 1;
    return { status: "added", record };
  }

  /** Gap-filling content for a synthesized step. Not counted as detected or processed. */
  placeholder(stepNumber: number, category: ThoughtCategory, timestampMs: number): ThoughtRecord {
    const text = PLACEHOLDER_TEXT[category];
    const dedupeKey = thoughtDedupeKey(stepNumber, category, text);
    const record: ThoughtRecord = {
      category,
      text,
      label: "",
      stepNumber,
      dedupeKey,
      timestampMs,
      placeholder: true,
    };
    this.keys.add(dedupeKey);
    this.records.push(record);
    return record;
  }

  all(): ThoughtRecord[] {
    return [...this.records];
  }

  stats(): ThoughtCounters {
    return { ...this.counters, byCategory: { ...this.counters.byCategory } };
  }
}
