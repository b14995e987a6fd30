import type { ActionRecord, ActionType } from "@steptrace/contracts";
import { MalformedPayloadError } from "./errors.js";
import { compactText, isRecord } from "./utils.js";

interface ActionRule {
  type: ActionType;
  token: RegExp;
  icon: string;
  verb: string;
}

// First rule with a hit wins. Tokens are payload keys or plain-text words, lowercased.
const ACTION_RULES: readonly ActionRule[] = [
  {
    type: "navigation",
    token: /url|navigat|go_?to|open_tab|go_back|search_google|visit|brows/,
    icon: "🌐",
    verb: "Navigate to",
  },
  { type: "click", token: /click|^tap|press|button/, icon: "🖱️", verb: "Click" },
  {
    type: "form",
    token: /input|^type$|type_text|^fill|form|select_option|^text$|^value$|submit/,
    icon: "⌨️",
    verb: "Fill",
  },
  { type: "extraction", token: /extract|scrape|^content$|^read|get_text|query/, icon: "📄", verb: "Extract" },
  { type: "scroll", token: /scroll/, icon: "↕️", verb: "Scroll" },
  { type: "wait", token: /wait|sleep|pause/, icon: "⏳", verb: "Wait" },
  { type: "done", token: /^done$|complete|finish/, icon: "🏁", verb: "Done" },
];

const GENERIC_ICON = "⚙️";
const TYPE_FIELDS = ["type", "action", "action_type"] as const;
const TARGET_FIELDS = ["url", "selector", "index", "text", "value", "query", "direction", "seconds", "amount"];

export type PayloadExtraction =
  | { status: "none" }
  | { status: "parsed"; payload: unknown; raw: string }
  | { status: "malformed"; error: MalformedPayloadError };

/** Outermost `{…}` or `[…]` in the text, parsed as JSON. */
export function extractPayload(text: string): PayloadExtraction {
  const objectStart = text.indexOf("{");
  const arrayStart = text.indexOf("[");
  let start = -1;
  let closer = "}";
  if (objectStart >= 0 && (arrayStart < 0 || objectStart < arrayStart)) {
    start = objectStart;
  } else if (arrayStart >= 0) {
    start = arrayStart;
    closer = "]";
  }
  if (start < 0) {
    return { status: "none" };
  }

  const end = text.lastIndexOf(closer);
  if (end < start) {
    return { status: "malformed", error: new MalformedPayloadError(text) };
  }
  const raw = text.slice(start, end + 1);
  try {
    return { status: "parsed", payload: JSON.parse(raw), raw };
  } catch (error) {
    return { status: "malformed", error: new MalformedPayloadError(text, { cause: error }) };
  }
}

function payloadObjects(payload: unknown): Record<string, unknown>[] {
  if (Array.isArray(payload)) {
    return payload.filter(isRecord);
  }
  return isRecord(payload) ? [payload] : [];
}

function explicitType(objects: Record<string, unknown>[]): string | null {
  for (const object of objects) {
    for (const field of TYPE_FIELDS) {
      const value = object[field];
      if (typeof value === "string" && value.trim()) {
        return value.trim().toLowerCase();
      }
    }
  }
  return null;
}

function topLevelKeys(objects: Record<string, unknown>[]): string[] {
  const typeFields: readonly string[] = TYPE_FIELDS;
  return objects.flatMap((object) => Object.keys(object).filter((key) => !typeFields.includes(key)).map((key) => key.toLowerCase()));
}

function nestedKeys(objects: Record<string, unknown>[]): string[] {
  return objects.flatMap((object) =>
    Object.values(object).flatMap((value) => payloadObjects(value).flatMap((nested) => Object.keys(nested).map((key) => key.toLowerCase()))),
  );
}

function matchRule(tokens: string[]): ActionRule | null {
  for (const rule of ACTION_RULES) {
    if (tokens.some((token) => rule.token.test(token))) {
      return rule;
    }
  }
  return null;
}

/** Action names (top-level keys) decide first; argument keys only when no name matches. */
export function classifyKeys(keys: string[], argumentKeys: string[] = []): ActionType {
  return (matchRule(keys) ?? matchRule(argumentKeys))?.type ?? "generic";
}

export function classifyText(text: string): ActionType {
  const words = text.toLowerCase().split(/[^\p{L}\p{N}_]+/u).filter(Boolean);
  return matchRule(words)?.type ?? "generic";
}

export function actionIcon(type: string): string {
  return matchRule([type.toLowerCase()])?.icon ?? GENERIC_ICON;
}

function findTarget(objects: Record<string, unknown>[]): string {
  const candidates = [...objects, ...objects.flatMap((object) => Object.values(object).flatMap(payloadObjects))];
  for (const candidate of candidates) {
    for (const field of TARGET_FIELDS) {
      const value = candidate[field];
      if (typeof value === "string" && value.trim()) return value.trim();
      if (typeof value === "number" && Number.isFinite(value)) return String(value);
    }
  }
  return "";
}

function describe(type: string, objects: Record<string, unknown>[], body: string): string {
  const rule = matchRule([type]);
  if (!rule) {
    return compactText(body, 200);
  }
  const target = findTarget(objects);
  return target ? `${rule.verb} ${compactText(target, 120)}` : rule.verb;
}

export interface ActionContext {
  stepNumber: number;
  timestampMs: number;
  /** The line as it arrived; kept as the payload when the embedded JSON is broken. */
  originalLine: string;
}

type ParsedAction = Pick<ActionRecord, "type" | "payload" | "source" | "description">;

function interpret(body: string, originalLine: string): ParsedAction {
  const extraction = extractPayload(body);
  if (extraction.status === "malformed") {
    return { type: "generic", payload: originalLine, source: "malformed", description: compactText(body, 200) };
  }
  if (extraction.status === "none") {
    return { type: classifyText(body), payload: body, source: "text", description: compactText(body, 200) };
  }
  const objects = payloadObjects(extraction.payload);
  const type = explicitType(objects) ?? classifyKeys(topLevelKeys(objects), nestedKeys(objects));
  return { type, payload: extraction.payload, source: "json", description: describe(type, objects, body) };
}

/**
 * Turns an action marker body into a record. Never throws: a broken payload
 * degrades to a generic action carrying the original line.
 */
export function parseAction(body: string, context: ActionContext): ActionRecord {
  const parsed = interpret(body, context.originalLine);
  return {
    ...parsed,
    icon: actionIcon(parsed.type),
    stepNumber: context.stepNumber,
    timestampMs: context.timestampMs,
  };
}
