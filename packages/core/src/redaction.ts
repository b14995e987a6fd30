import type {
  ActionRecord,
  RedactionConfig,
  StandaloneEvent,
  StepRecord,
  SummaryStats,
  ThoughtRecord,
  TimelineDocument,
  UnknownMessage,
} from "@steptrace/contracts";
import { isRecord } from "./utils.js";

interface CompiledPatterns {
  key: RegExp;
  value: RegExp;
}

function toGlobalRegex(regex: RegExp): RegExp {
  if (regex.global) return regex;
  return new RegExp(regex.source, `${regex.flags}g`);
}

function compilePattern(pattern: string, fallback: RegExp): RegExp {
  const trimmed = pattern.trim();
  if (!trimmed) return fallback;

  let source = trimmed;
  let flags = "";
  if (source.startsWith("(?i)")) {
    source = source.slice(4);
    flags = "i";
  }

  try {
    return new RegExp(source, flags);
  } catch {
    return fallback;
  }
}

function compilePatterns(config: RedactionConfig): CompiledPatterns {
  const keyFallback = /api[_-]?key|token|secret|password|private[_-]?key|access[_-]?key|credential|cookie/i;
  const valueFallback = /\bsk-[a-z0-9_-]{8,}|\bghp_[a-z0-9]{8,}|AKIA[0-9A-Z]{16}|-----BEGIN [A-Z ]+ PRIVATE KEY-----/i;
  return {
    key: compilePattern(config.keyPattern, keyFallback),
    value: toGlobalRegex(compilePattern(config.valuePattern, valueFallback)),
  };
}

function shouldRedact(config: RedactionConfig): boolean {
  if (config.alwaysOn) return true;
  return config.mode !== "off";
}

/**
 * Masks secret-looking values in exported artifacts. Built once per export
 * and applied to every string and keyed field that leaves the process.
 */
export class Redactor {
  private readonly patterns: CompiledPatterns | null;
  private readonly replacement: string;

  constructor(config: RedactionConfig) {
    this.patterns = shouldRedact(config) ? compilePatterns(config) : null;
    this.replacement = config.replacement;
  }

  text(value: string): string {
    if (!this.patterns || !value) return value;
    return value.replace(this.patterns.value, this.replacement);
  }

  value(value: unknown): unknown {
    return this.redactUnknown(value, new WeakMap<object, unknown>());
  }

  thought(thought: ThoughtRecord): ThoughtRecord {
    return { ...thought, text: this.text(thought.text), dedupeKey: this.text(thought.dedupeKey) };
  }

  action(action: ActionRecord): ActionRecord {
    const redacted: ActionRecord = {
      ...action,
      payload: this.value(action.payload),
      description: this.text(action.description),
    };
    if (action.result !== undefined) {
      redacted.result = this.text(action.result);
    }
    return redacted;
  }

  step(step: StepRecord): StepRecord {
    return {
      ...step,
      thoughts: step.thoughts.map((thought) => this.thought(thought)),
      actions: step.actions.map((action) => this.action(action)),
    };
  }

  event(event: StandaloneEvent): StandaloneEvent {
    const metadata = this.value(event.metadata);
    return {
      ...event,
      description: this.text(event.description),
      metadata: isRecord(metadata) ? metadata : {},
    };
  }

  unknownMessage(message: UnknownMessage): UnknownMessage {
    return { ...message, text: this.text(message.text) };
  }

  timeline(document: TimelineDocument): TimelineDocument {
    return {
      ...document,
      title: this.text(document.title),
      prompt: document.prompt === null ? null : this.text(document.prompt),
      timeline: document.timeline.map((step) => this.step(step)),
      events: document.events.map((event) => this.event(event)),
    };
  }

  /** Only the free text; key redaction would mask counters such as totalTokens. */
  summary(summary: SummaryStats): SummaryStats {
    return {
      ...summary,
      title: this.text(summary.title),
      prompt: summary.prompt === null ? null : this.text(summary.prompt),
    };
  }

  private redactUnknown(value: unknown, seen: WeakMap<object, unknown>): unknown {
    if (!this.patterns) return value;
    if (typeof value === "string") {
      return this.text(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redactUnknown(item, seen));
    }
    if (!isRecord(value)) {
      return value;
    }

    const cached = seen.get(value);
    if (cached !== undefined) return cached;

    const out: Record<string, unknown> = {};
    seen.set(value, out);
    for (const [key, nested] of Object.entries(value)) {
      if (this.patterns.key.test(key)) {
        out[key] = this.replacement;
        continue;
      }
      out[key] = this.redactUnknown(nested, seen);
    }
    return out;
  }
}
