import pino, { type Logger } from "pino";
import type { LoggingConfig } from "@steptrace/contracts";

export type { Logger };

/** Logs go to stderr; stdout carries command output. */
export function createLogger(config: LoggingConfig, name = "steptrace"): Logger {
  if (config.pretty) {
    return pino({
      name,
      level: config.level,
      transport: { target: "pino-pretty", options: { colorize: true, destination: 2 } },
    });
  }
  return pino({ name, level: config.level }, pino.destination(2));
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
