import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type {
  AppConfig,
  ExportConfig,
  LogLevel,
  LoggingConfig,
  RedactionConfig,
  TrackerConfig,
} from "@steptrace/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".steptrace", "config.toml");

export interface PartialAppConfig {
  tracker?: Partial<TrackerConfig>;
  export?: Partial<ExportConfig>;
  logging?: Partial<LoggingConfig>;
  redaction?: Partial<RedactionConfig>;
}

const LOG_LEVELS: LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as string[]).includes(value);
}

function toFiniteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.round(numeric);
}

function nonNegativeIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric < 0) return fallback;
  return Math.round(numeric);
}

function mergeTracker(input?: Partial<TrackerConfig>): TrackerConfig {
  const defaults = DEFAULT_CONFIG.tracker;
  return {
    title: typeof input?.title === "string" && input.title.trim() ? input.title.trim() : defaults.title,
    outputDir: typeof input?.outputDir === "string" ? input.outputDir.trim() : defaults.outputDir,
    unknownMessageCap: positiveIntOrDefault(input?.unknownMessageCap, defaults.unknownMessageCap),
    unknownFlushIntervalMs: nonNegativeIntOrDefault(input?.unknownFlushIntervalMs, defaults.unknownFlushIntervalMs),
    maxGapSteps: nonNegativeIntOrDefault(input?.maxGapSteps, defaults.maxGapSteps),
  };
}

function mergeExport(input?: Partial<ExportConfig>): ExportConfig {
  const defaults = DEFAULT_CONFIG.export;
  return {
    indent: Math.min(8, nonNegativeIntOrDefault(input?.indent, defaults.indent)),
    retryDelayMs: nonNegativeIntOrDefault(input?.retryDelayMs, defaults.retryDelayMs),
  };
}

function mergeLogging(input?: Partial<LoggingConfig>): LoggingConfig {
  const defaults = DEFAULT_CONFIG.logging;
  const level = typeof input?.level === "string" ? input.level.trim().toLowerCase() : "";
  return {
    level: isLogLevel(level) ? level : defaults.level,
    pretty: typeof input?.pretty === "boolean" ? input.pretty : defaults.pretty,
  };
}

function mergeRedaction(input?: Partial<RedactionConfig>): RedactionConfig {
  const defaults = DEFAULT_CONFIG.redaction;
  return {
    mode: input?.mode === "off" || input?.mode === "strict" ? input.mode : defaults.mode,
    alwaysOn: typeof input?.alwaysOn === "boolean" ? input.alwaysOn : defaults.alwaysOn,
    replacement: typeof input?.replacement === "string" && input.replacement.trim() ? input.replacement : defaults.replacement,
    keyPattern: typeof input?.keyPattern === "string" && input.keyPattern.trim() ? input.keyPattern : defaults.keyPattern,
    valuePattern: typeof input?.valuePattern === "string" && input.valuePattern.trim() ? input.valuePattern : defaults.valuePattern,
  };
}

export function mergeConfig(input?: PartialAppConfig): AppConfig {
  return {
    tracker: mergeTracker(input?.tracker),
    export: mergeExport(input?.export),
    logging: mergeLogging(input?.logging),
    redaction: mergeRedaction(input?.redaction),
  };
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  try {
    const raw = await readFile(configPath, "utf8");
    const parsed = TOML.parse(raw) as PartialAppConfig;
    return mergeConfig(parsed);
  } catch {
    return mergeConfig();
  }
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const content = TOML.stringify(config as unknown as JsonMap);
  await writeFile(configPath, content, "utf8");
}
