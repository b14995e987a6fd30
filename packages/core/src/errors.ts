export type TraceErrorKind = "match" | "malformed_payload" | "export" | "invariant";

export class TraceError extends Error {
  readonly kind: TraceErrorKind;

  constructor(message: string, kind: TraceErrorKind, options?: ErrorOptions) {
    super(message, options);
    this.name = "TraceError";
    this.kind = kind;
  }
}

export class MatchError extends TraceError {
  readonly patternName: string;

  constructor(patternName: string, message: string, options?: ErrorOptions) {
    super(`pattern "${patternName}" failed: ${message}`, "match", options);
    this.name = "MatchError";
    this.patternName = patternName;
  }
}

export class MalformedPayloadError extends TraceError {
  readonly rawText: string;

  constructor(rawText: string, options?: ErrorOptions) {
    super("embedded payload is not valid JSON", "malformed_payload", options);
    this.name = "MalformedPayloadError";
    this.rawText = rawText;
  }
}

export class ExportError extends TraceError {
  readonly targetPath: string;

  constructor(targetPath: string, message: string, options?: ErrorOptions) {
    super(`export to ${targetPath} failed: ${message}`, "export", options);
    this.name = "ExportError";
    this.targetPath = targetPath;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
