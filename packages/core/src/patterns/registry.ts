import { MatchError, errorMessage } from "../errors.js";
import { BUILTIN_PATTERNS } from "./builtin.js";
import type { PatternEntry, PatternExtraction, PatternMatch } from "./types.js";

export interface PatternRegistryOptions {
  /** Evaluated before the built-in table. */
  prepend?: PatternEntry[];
  /** Evaluated after the built-in table. */
  append?: PatternEntry[];
  /** Replaces the built-in table entirely. */
  entries?: readonly PatternEntry[];
}

// exec() on a global or sticky regex carries lastIndex between lines.
function toStatelessRegex(regex: RegExp): RegExp {
  if (!regex.global && !regex.sticky) return regex;
  return new RegExp(regex.source, regex.flags.replace(/[gy]/g, ""));
}

export class PatternRegistry {
  private readonly entries: readonly PatternEntry[];

  constructor(entries: readonly PatternEntry[]) {
    const seen = new Set<string>();
    const normalized: PatternEntry[] = [];
    for (const entry of entries) {
      if (seen.has(entry.name)) {
        throw new Error(`duplicate pattern name: ${entry.name}`);
      }
      seen.add(entry.name);
      normalized.push({ ...entry, matcher: toStatelessRegex(entry.matcher) });
    }
    this.entries = normalized;
  }

  list(): readonly PatternEntry[] {
    return this.entries;
  }

  /**
   * First entry whose matcher hits and whose extractor accepts the line.
   * Throws MatchError when an extractor fails.
   */
  match(line: string): PatternMatch | null {
    for (const entry of this.entries) {
      const match = entry.matcher.exec(line);
      if (!match) continue;

      let extraction: PatternExtraction | null;
      try {
        extraction = entry.extract(match, line);
      } catch (error) {
        throw new MatchError(entry.name, errorMessage(error), { cause: error });
      }
      if (extraction) {
        return { entry, extraction };
      }
    }
    return null;
  }
}

export function createPatternRegistry(options: PatternRegistryOptions = {}): PatternRegistry {
  const base = options.entries ?? BUILTIN_PATTERNS;
  return new PatternRegistry([...(options.prepend ?? []), ...base, ...(options.append ?? [])]);
}
