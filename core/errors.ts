export type ErrorCode =
  | "PROMPT_TOO_LARGE"
  | "INFERENCE_FAILED"
  | "PARSE_ERROR"
  | "UNKNOWN_INTENT"
  | "CONFIGURATION_ERROR";

export class HostpilotError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly details?: unknown;

  constructor(code: ErrorCode, message: string, opts?: { retryable?: boolean; details?: unknown; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "HostpilotError";
    this.code = code;
    this.retryable = Boolean(opts?.retryable);
    this.details = opts?.details;
  }
}

export class PromptTooLargeError extends HostpilotError {
  readonly bytes: number;
  readonly budget: number;

  constructor(bytes: number, budget: number) {
    super("PROMPT_TOO_LARGE", `Prompt is ${bytes} bytes even without process rows; budget is ${budget}.`);
    this.name = "PromptTooLargeError";
    this.bytes = bytes;
    this.budget = budget;
  }
}

export type InferenceFailureKind = "BackendUnreachable" | "BackendRejected" | "ResponseTooLarge" | "Cancelled";

export class InferenceError extends HostpilotError {
  readonly kind: InferenceFailureKind;
  readonly status?: number;

  constructor(kind: InferenceFailureKind, message: string, opts?: { status?: number; cause?: unknown }) {
    super("INFERENCE_FAILED", message, { retryable: kind === "BackendUnreachable", cause: opts?.cause });
    this.name = "InferenceError";
    this.kind = kind;
    this.status = opts?.status;
  }
}

export class ParseError extends HostpilotError {
  readonly line: string;

  constructor(message: string, line: string) {
    super("PARSE_ERROR", message, { details: { line } });
    this.name = "ParseError";
    this.line = line;
  }
}

export class UnknownIntentError extends HostpilotError {
  readonly tag: string;

  constructor(tag: string, line: string) {
    super("UNKNOWN_INTENT", `Unrecognized action tag: ${tag}`, { details: { line } });
    this.name = "UnknownIntentError";
    this.tag = tag;
  }
}

export class ConfigurationError extends HostpilotError {
  constructor(message: string, cause?: unknown) {
    super("CONFIGURATION_ERROR", message, { cause });
    this.name = "ConfigurationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error && err.message ? err.message : String(err);
}

export function errnoCode(err: unknown): string {
  return err && typeof err === "object" && "code" in err ? String(err.code) : "";
}
