import type { PatternEntry, PatternExtraction } from "./types.js";

// Leading decoration: emoji, bullets, brackets. Optional so plain lines match too.
const GLYPH = String.raw`(?<glyph>[^\p{L}\p{N}\s]+\s*)?`;

function parseStepNumber(raw: string | undefined): number {
  const value = Number.parseInt(raw ?? "", 10);
  if (!Number.isSafeInteger(value)) {
    throw new Error(`step number "${raw ?? ""}" is not a safe integer`);
  }
  return value;
}

function parseCount(raw: string | undefined): number {
  const value = Number(raw ?? "");
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`count "${raw ?? ""}" is not a non-negative number`);
  }
  return value;
}

function labeled(glyph: string | undefined, label: string): string {
  return `${(glyph ?? "").trim()} ${label.trim()}`.trim();
}

function thoughtEntry(name: string, labels: string): PatternEntry {
  return {
    name,
    kind: "thought",
    matcher: new RegExp(String.raw`^${GLYPH}(?<label>${labels})\s*:\s*(?<text>\S.*)$`, "iu"),
    extract(match): PatternExtraction | null {
      const groups = match.groups ?? {};
      const label = groups.label ?? "";
      const text = groups.text ?? "";
      return { kind: "thought", label: labeled(groups.glyph, label), text };
    },
  };
}

const ACTION_ENTRIES: PatternEntry[] = [
  {
    name: "action",
    kind: "action",
    matcher: new RegExp(
      String.raw`^${GLYPH}(?:executing\s+|performing\s+)?action(?:\s+\d+\s*\/\s*\d+)?\s*[:\-]\s*(?<body>\S.*)$`,
      "iu",
    ),
    extract(match) {
      return { kind: "action", body: (match.groups?.body ?? "").trim() };
    },
  },
];

const STEP_ENTRIES: PatternEntry[] = [
  {
    name: "step_end",
    kind: "step_end",
    matcher: new RegExp(
      String.raw`^${GLYPH}(?:z2b\s+)?step\s+(?<step>-?\d+)\s+(?:completed|complete|finished|done|ended|end)\b`,
      "iu",
    ),
    extract(match) {
      return { kind: "step_end", stepNumber: parseStepNumber(match.groups?.step) };
    },
  },
  {
    name: "step_end_prefix",
    kind: "step_end",
    matcher: new RegExp(String.raw`^${GLYPH}(?:end(?:ed)?|finish(?:ed)?|completed?)\s+step\s+(?<step>-?\d+)\b`, "iu"),
    extract(match) {
      return { kind: "step_end", stepNumber: parseStepNumber(match.groups?.step) };
    },
  },
  {
    name: "step_start",
    kind: "step_start",
    matcher: new RegExp(
      String.raw`^${GLYPH}(?:z2b\s+|begin(?:ning)?\s+|start(?:ing)?\s+)?step\s+(?<step>-?\d+)(?:\s*[:\-]|\s+(?:start(?:ed)?|begin|begins)\b|\s*$)`,
      "iu",
    ),
    extract(match) {
      return { kind: "step_start", stepNumber: parseStepNumber(match.groups?.step) };
    },
  },
];

const THOUGHT_ENTRIES: PatternEntry[] = [
  thoughtEntry("evaluation", String.raw`eval(?:uation|uate)?|avalia[çc][ãa]o|assessment|assessed`),
  {
    name: "evaluation_status",
    kind: "thought",
    matcher: /^(?<status>success|failure|failed|uncertain)\s+-\s+\S/i,
    extract(match, line) {
      return { kind: "thought", label: match.groups?.status ?? "status", text: line };
    },
  },
  thoughtEntry("memory", String.raw`memory|mem[óo]ria|remembered|recalling|recalled`),
  {
    name: "memory_phrase",
    kind: "thought",
    matcher: /^i remember that\s+(?<text>\S.*)$/i,
    extract(match) {
      return { kind: "thought", label: "I remember that", text: match.groups?.text ?? "" };
    },
  },
  thoughtEntry("next_goal", String.raw`next[\s_]goal|current goal|goal|pr[óo]ximo objetivo`),
  {
    name: "goal_phrase",
    kind: "thought",
    matcher: /^(?:my\s+)?(?<label>goal is to|aiming to|planning to)\s*:?\s+(?<text>\S.*)$/i,
    extract(match) {
      return { kind: "thought", label: match.groups?.label ?? "goal", text: match.groups?.text ?? "" };
    },
  },
  thoughtEntry("thought", String.raw`thought|thinking|considering|analy[sz]ed|analysis|reasoning`),
  {
    name: "thought_glyph",
    kind: "thought",
    matcher: /^(?<glyph>💭|🤔|🛠️?)\s*(?<text>\S.*)$/u,
    extract(match) {
      return { kind: "thought", label: match.groups?.glyph ?? "", text: match.groups?.text ?? "" };
    },
  },
];

const AUXILIARY_ENTRIES: PatternEntry[] = [
  {
    name: "action_result",
    kind: "action_result",
    matcher: new RegExp(String.raw`^${GLYPH}(?:action\s+)?result\s*:\s*(?<text>\S.*)$`, "iu"),
    extract(match) {
      return { kind: "action_result", text: (match.groups?.text ?? "").trim() };
    },
  },
  {
    name: "screenshot",
    kind: "screenshot",
    matcher: new RegExp(
      String.raw`^${GLYPH}screenshot\b(?:\s+(?:saved|taken|captured|salvo|capturado))?\s*(?:to\b|at\b|em\b|:)?\s*(?<ref>.*)$`,
      "iu",
    ),
    extract(match) {
      return { kind: "screenshot", reference: (match.groups?.ref ?? "").trim() };
    },
  },
  {
    name: "llm_request",
    kind: "llm_usage",
    matcher: /LLM Request:\s*model=(?<model>[^,]+),\s*prompt=.*,\s*tokens=(?<tokens>\d+)/i,
    extract(match) {
      return {
        kind: "llm_usage",
        phase: "request",
        model: (match.groups?.model ?? "").trim(),
        tokens: parseCount(match.groups?.tokens),
      };
    },
  },
  {
    name: "llm_request_alt",
    kind: "llm_usage",
    matcher: /Sending request to\s+(?<model>\S+)\s+with\s+(?<tokens>\d+)\s+tokens/i,
    extract(match) {
      return {
        kind: "llm_usage",
        phase: "request",
        model: match.groups?.model ?? "",
        tokens: parseCount(match.groups?.tokens),
      };
    },
  },
  {
    name: "llm_response",
    kind: "llm_usage",
    matcher: /LLM Response:\s*model=(?<model>[^,]+),\s*response=.*,\s*tokens=(?<tokens>\d+)/i,
    extract(match) {
      return {
        kind: "llm_usage",
        phase: "response",
        model: (match.groups?.model ?? "").trim(),
        tokens: parseCount(match.groups?.tokens),
      };
    },
  },
  {
    name: "llm_response_alt",
    kind: "llm_usage",
    matcher: /Received response from\s+(?<model>\S+)\s+with\s+(?<tokens>\d+)\s+tokens/i,
    extract(match) {
      return {
        kind: "llm_usage",
        phase: "response",
        model: match.groups?.model ?? "",
        tokens: parseCount(match.groups?.tokens),
      };
    },
  },
  {
    name: "llm_cost",
    kind: "llm_cost",
    matcher: /(?:estimated\s+)?cost:\s*\$(?<cost>\d+(?:\.\d+)?)/i,
    extract(match, line) {
      const model = /model[=:]\s*(?<model>[\w.\-]+)/i.exec(line)?.groups?.model ?? "";
      return { kind: "llm_cost", costUsd: parseCount(match.groups?.cost), model };
    },
  },
];

/**
 * Built-in recognizers in priority order: actions, step boundaries, thoughts,
 * then auxiliary lines. The first entry that matches and extracts wins.
 */
export const BUILTIN_PATTERNS: readonly PatternEntry[] = [
  ...ACTION_ENTRIES,
  ...STEP_ENTRIES,
  ...THOUGHT_ENTRIES,
  ...AUXILIARY_ENTRIES,
];
