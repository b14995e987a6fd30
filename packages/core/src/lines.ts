import { parseEpochMs } from "./utils.js";

export interface ParsedLogLine {
  message: string;
  timestampMs: number | null;
  level: string;
  source: string;
}

const LEVELS = "TRACE|DEBUG|INFO|WARN|WARNING|ERROR|CRITICAL|FATAL";

// 2025-03-01 10:00:00,123 - browser_use.agent - INFO - message
const DASHED_PREFIX = new RegExp(
  String.raw`^(?<ts>\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}:\d{2}(?:[,.]\d{1,6})?)\s+-\s+(?<source>[^\s]+)\s+-\s+(?<level>${LEVELS})\s+-\s+`,
);
// [2025-03-01T10:00:00.000Z] message  /  2025-03-01T10:00:00Z message
const ISO_PREFIX = /^\[?(?<ts>\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?)\]?\s+/;
// INFO     [agent] message
const LEVEL_SOURCE_PREFIX = new RegExp(String.raw`^(?<level>${LEVELS})\s+\[(?<source>[^\]]+)\]\s+`);

function parsePrefixTimestamp(raw: string | undefined): number | null {
  if (!raw) return null;
  // Comma millis, no zone: read as UTC.
  const normalized = raw.replace(" ", "T").replace(",", ".");
  const zoned = /(?:Z|[+-]\d{2}:?\d{2})$/.test(normalized) ? normalized : `${normalized}Z`;
  return parseEpochMs(zoned);
}

/**
 * Splits a host log line into its message and whatever prefix metadata the
 * host prepended. Lines without a recognizable prefix pass through trimmed.
 */
export function parseLogLine(raw: string): ParsedLogLine {
  let rest = raw.replace(/\r$/, "").trim();
  let timestampMs: number | null = null;
  let level = "";
  let source = "";

  const dashed = DASHED_PREFIX.exec(rest);
  if (dashed) {
    timestampMs = parsePrefixTimestamp(dashed.groups?.ts);
    level = dashed.groups?.level ?? "";
    source = dashed.groups?.source ?? "";
    rest = rest.slice(dashed[0].length);
  } else {
    const iso = ISO_PREFIX.exec(rest);
    if (iso) {
      timestampMs = parsePrefixTimestamp(iso.groups?.ts);
      rest = rest.slice(iso[0].length);
    }
  }

  const levelSource = LEVEL_SOURCE_PREFIX.exec(rest);
  if (levelSource) {
    level = levelSource.groups?.level ?? level;
    source = levelSource.groups?.source ?? source;
    rest = rest.slice(levelSource[0].length);
  }

  return { message: rest.trim(), timestampMs, level, source };
}
