import type { AppConfig } from "@steptrace/contracts";

export const DEFAULT_TITLE = "Agent Execution Timeline";

export const DEFAULT_CONFIG: AppConfig = {
  tracker: {
    title: DEFAULT_TITLE,
    outputDir: "",
    unknownMessageCap: 1000,
    unknownFlushIntervalMs: 30_000,
    maxGapSteps: 1000,
  },
  export: {
    indent: 2,
    retryDelayMs: 100,
  },
  logging: {
    level: "info",
    pretty: false,
  },
  redaction: {
    mode: "strict",
    alwaysOn: true,
    replacement: "[REDACTED]",
    keyPattern: "(?i)api[_-]?key|token|secret|password|private[_-]?key|access[_-]?key|credential|cookie",
    valuePattern: "(?i)\\bsk-[a-z0-9_-]{8,}|\\bghp_[a-z0-9]{8,}|AKIA[0-9A-Z]{16}|-----BEGIN [A-Z ]+ PRIVATE KEY-----",
  },
};
