import { readFile } from "node:fs/promises";
import path from "node:path";
import { Command } from "commander";
import type { AppConfig, SummaryStats, TimelineDocument } from "@steptrace/contracts";
import {
  DEFAULT_CONFIG_PATH,
  FileLogSink,
  THOUGHT_CATEGORIES,
  TIMELINE_FILE,
  createLogger,
  createSession,
  discoverLogFiles,
  errorMessage,
  expandHome,
  isLogLevel,
  isRecord,
  loadConfig,
  loadTimelineDocument,
  mergeConfig,
  saveConfig,
  summarizeActions,
  summarizeSteps,
  summarizeThoughts,
  toMsWindow,
  type DiscoveredLogFile,
  type ExportReport,
  type Logger,
  type PartialAppConfig,
  type TraceSession,
} from "@steptrace/core";

interface GlobalOptions {
  config: string;
  logLevel?: string;
}

interface ReplayRow {
  file: string;
  title: string;
  steps: number;
  thoughts: number;
  actions: number;
  unknown: number;
  outputDir: string | null;
  warnings: string[];
}

export function printTable(rows: string[][]): void {
  if (rows.length === 0) return;
  const header = rows[0];
  if (!header) return;
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  for (const [idx, row] of rows.entries()) {
    const line = row
      .map((cell, col) => (cell ?? "").padEnd(widths[col] ?? 0))
      .join(idx === 0 ? " | " : "   ")
      .trimEnd();
    console.log(line);
    if (idx === 0) {
      console.log(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
}

function printNamedTable(section: string, rows: string[][]): void {
  if (rows.length <= 1) return;
  console.log(`\n${section}:`);
  printTable(rows);
}

function fmtDuration(ms: number | null): string {
  if (ms === null) return "-";
  return `${ms}`;
}

export function parseValue(input: string): unknown {
  if (input === "true") return true;
  if (input === "false") return false;
  const numeric = Number(input);
  if (!Number.isNaN(numeric) && input.trim() !== "") return numeric;
  return input;
}

export function setPath(target: Record<string, unknown>, dottedKey: string, value: unknown): void {
  const parts = dottedKey.split(".").filter(Boolean);
  const lastKey = parts.pop();
  if (!lastKey) return;

  let cursor = target;
  for (const key of parts) {
    const existing = cursor[key];
    const next: Record<string, unknown> = isRecord(existing) ? existing : {};
    cursor[key] = next;
    cursor = next;
  }
  cursor[lastKey] = value;
}

async function resolveConfig(opts: GlobalOptions): Promise<AppConfig> {
  const config = await loadConfig(opts.config);
  if (opts.logLevel === undefined) return config;
  const level = opts.logLevel.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new Error(`unsupported log level: ${opts.logLevel}`);
  }
  return { ...config, logging: { ...config.logging, level } };
}

function sessionDirName(file: DiscoveredLogFile, used: Set<string>): string {
  const name = used.has(file.sessionName) ? `${file.sessionName}-${file.id.slice(0, 8)}` : file.sessionName;
  used.add(name);
  return name;
}

function toReplayRow(file: string, session: TraceSession, report: ExportReport): ReplayRow {
  const summary = session.getSummary();
  return {
    file,
    title: session.title,
    steps: summary.totalSteps,
    thoughts: summary.thoughts.total,
    actions: summary.actions.total,
    unknown: summary.diagnostics.unknownCount,
    outputDir: session.outputDir,
    warnings: report.warnings,
  };
}

async function replayFile(
  file: DiscoveredLogFile,
  options: { config: AppConfig; logger: Logger; title?: string; prompt?: string; outputDir: string | null },
): Promise<ReplayRow> {
  const session = createSession({
    title: options.title ?? file.sessionName,
    config: options.config,
    logger: options.logger,
    ...(options.prompt !== undefined ? { prompt: options.prompt } : {}),
    ...(options.outputDir ? { outputDir: options.outputDir } : {}),
  });
  const raw = await readFile(file.path, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    session.handleLine(line);
  }
  const report = await session.finishTracking();
  for (const warning of report.warnings) {
    options.logger.warn({ file: file.path }, warning);
  }
  return toReplayRow(file.path, session, report);
}

function printReplayRows(rows: ReplayRow[]): void {
  printTable([
    ["file", "steps", "thoughts", "actions", "unknown", "output"],
    ...rows.map((row) => [
      path.basename(row.file),
      String(row.steps),
      String(row.thoughts),
      String(row.actions),
      String(row.unknown),
      row.outputDir ?? "-",
    ]),
  ]);
}

function waitForStop(durationMs: number): Promise<"duration" | "signal"> {
  return new Promise((resolve) => {
    const done = (reason: "duration" | "signal"): void => {
      if (timer) clearTimeout(timer);
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(reason);
    };
    const onSignal = (): void => done("signal");
    const timer = durationMs > 0 ? setTimeout(() => done("duration"), durationMs) : null;
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  });
}

export interface TimelineOverview {
  title: string;
  prompt: string | null;
  startTime: string | null;
  endTime: string | null;
  totalSteps: number;
  thoughts: SummaryStats["thoughts"];
  steps: SummaryStats["steps"];
  actions: SummaryStats["actions"];
  events: number;
}

export function overviewOf(document: TimelineDocument): TimelineOverview {
  return {
    title: document.title,
    prompt: document.prompt,
    startTime: document.start_time,
    endTime: document.end_time,
    totalSteps: document.timeline.length,
    thoughts: summarizeThoughts(document.timeline),
    steps: summarizeSteps(document.timeline),
    actions: summarizeActions(document.timeline),
    events: document.events.length,
  };
}

function printOverview(data: TimelineOverview): void {
  console.log(`${data.title}`);
  if (data.prompt) console.log(`prompt: ${data.prompt}`);
  printNamedTable("overview", [
    ["steps", "complete", "implicit", "thoughts", "actions", "events", "total_ms"],
    [
      String(data.totalSteps),
      String(data.steps.completeSteps),
      String(data.steps.implicitSteps),
      String(data.thoughts.total),
      String(data.actions.total),
      String(data.events),
      String(data.steps.totalDurationMs),
    ],
  ]);
  printNamedTable("thoughts", [
    ["category", "count", "pct"],
    ...THOUGHT_CATEGORIES.filter((category) => data.thoughts.byCategory[category] > 0).map((category) => [
      category,
      String(data.thoughts.byCategory[category]),
      `${data.thoughts.distribution[category].toFixed(1)}%`,
    ]),
  ]);
  printNamedTable("actions", [["type", "count"], ...data.actions.byType.map((row) => [row.name, String(row.count)])]);
  printNamedTable("steps", [
    ["step", "complete", "closed_by", "outcome", "thoughts", "actions", "duration_ms"],
    ...data.steps.steps.map((row) => [
      String(row.stepNumber),
      row.isComplete ? "yes" : "no",
      row.closedBy ?? "-",
      row.outcome,
      String(row.thoughtCount),
      String(row.actionCount),
      fmtDuration(row.durationMs),
    ]),
  ]);
}

export function buildProgram(): Command {
  const program = new Command();
  program.name("steptrace").description("Rebuild agent execution timelines from log output");
  program.option("--config <path>", "Config path", DEFAULT_CONFIG_PATH);
  program.option("--log-level <level>", "Override logging.level");
  program.addHelpText(
    "after",
    `
Examples:
  $ steptrace replay "logs/*.log" --out traces
  $ steptrace watch logs/agent.log --out traces/live
  $ steptrace summary traces/agent
  $ steptrace config set tracker.unknownMessageCap 500
`,
  );

  program
    .command("replay <globs...>")
    .description("Replay finished log files, one session per file")
    .option("--out <dir>", "Write artifacts to <dir>/<file name>")
    .option("--title <title>", "Timeline title (defaults to the file name)")
    .option("--prompt <text>", "Task prompt recorded in the summary")
    .option("--json", "JSON output")
    .action(async (globs: string[], opts: { out?: string; title?: string; prompt?: string; json?: boolean }) => {
      const config = await resolveConfig(program.opts<GlobalOptions>());
      const logger = createLogger(config.logging);
      const files = await discoverLogFiles(globs);
      if (files.length === 0) {
        throw new Error(`no log files matched: ${globs.join(", ")}`);
      }

      const outRoot = opts.out ? path.resolve(expandHome(opts.out)) : null;
      const used = new Set<string>();
      const rows: ReplayRow[] = [];
      for (const file of files) {
        const outputDir = outRoot ? path.join(outRoot, sessionDirName(file, used)) : null;
        rows.push(
          await replayFile(file, {
            config,
            logger,
            outputDir,
            ...(opts.title !== undefined ? { title: opts.title } : {}),
            ...(opts.prompt !== undefined ? { prompt: opts.prompt } : {}),
          }),
        );
      }

      if (opts.json) {
        console.log(JSON.stringify(rows, null, 2));
        return;
      }
      printReplayRows(rows);
    });

  program
    .command("watch <file>")
    .description("Follow a growing log file until interrupted")
    .option("--out <dir>", "Artifact directory (defaults to tracker.outputDir)")
    .option("--title <title>", "Timeline title")
    .option("--prompt <text>", "Task prompt recorded in the summary")
    .option("--from-start", "Replay existing content before following")
    .option("--duration <window>", "Stop after a window (e.g. 30s, 10m)")
    .action(
      async (
        file: string,
        opts: { out?: string; title?: string; prompt?: string; fromStart?: boolean; duration?: string },
      ) => {
        const config = await resolveConfig(program.opts<GlobalOptions>());
        const logger = createLogger(config.logging);
        const filePath = path.resolve(expandHome(file));
        const session = createSession({
          config,
          logger,
          ...(opts.title !== undefined ? { title: opts.title } : {}),
          ...(opts.prompt !== undefined ? { prompt: opts.prompt } : {}),
          ...(opts.out ? { outputDir: opts.out } : {}),
        });
        const sink = new FileLogSink(filePath, { fromStart: opts.fromStart === true, logger });

        session.install(sink);
        await sink.start();
        logger.info({ file: filePath }, "following log file");
        const reason = await waitForStop(opts.duration ? toMsWindow(opts.duration) : 0);
        await sink.stop();
        const report = await session.finishTracking();
        logger.info({ reason, written: report.written.length }, "tracking finished");
        for (const warning of report.warnings) {
          logger.warn(warning);
        }
        printReplayRows([toReplayRow(filePath, session, report)]);
      },
    );

  program
    .command("summary <target>")
    .description("Summarize an exported timeline (directory or timeline.json)")
    .option("--json", "JSON output")
    .action(async (target: string, opts: { json?: boolean }) => {
      const resolved = path.resolve(expandHome(target));
      const filePath = resolved.endsWith(".json") ? resolved : path.join(resolved, TIMELINE_FILE);
      const data = overviewOf(await loadTimelineDocument(filePath));
      if (opts.json) {
        console.log(JSON.stringify(data, null, 2));
        return;
      }
      printOverview(data);
    });

  const configCmd = program.command("config").description("Configuration");

  configCmd.command("get").action(async () => {
    const config = await loadConfig(program.opts<GlobalOptions>().config);
    console.log(JSON.stringify(config, null, 2));
  });

  configCmd.command("set <key> <value>").action(async (key: string, value: string) => {
    const configPath = program.opts<GlobalOptions>().config;
    const config = await loadConfig(configPath);
    const mutable: Record<string, unknown> = JSON.parse(JSON.stringify(config));
    setPath(mutable, key, parseValue(value));
    const merged = mergeConfig(mutable as PartialAppConfig);
    await saveConfig(merged, configPath);
    console.log(`updated ${key}`);
  });

  return program;
}

export async function runCli(argv: string[]): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (error) {
    console.error(errorMessage(error));
    process.exitCode = 1;
  }
}
