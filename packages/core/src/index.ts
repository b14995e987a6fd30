export * from "./actions.js";
export * from "./config.js";
export * from "./defaults.js";
export * from "./discovery.js";
export * from "./errors.js";
export * from "./exporter.js";
export * from "./lines.js";
export * from "./llm.js";
export * from "./logger.js";
export * from "./patterns/index.js";
export * from "./redaction.js";
export * from "./session.js";
export * from "./sinks.js";
export * from "./steps.js";
export * from "./summary.js";
export * from "./thoughts.js";
export * from "./timeline.js";
export * from "./utils.js";
