export { BUILTIN_PATTERNS } from "./builtin.js";
export { createPatternRegistry, PatternRegistry, type PatternRegistryOptions } from "./registry.js";
export type { PatternEntry, PatternExtraction, PatternKind, PatternMatch } from "./types.js";
