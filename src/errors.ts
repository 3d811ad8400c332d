export class ConfigError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.field = field;
  }
}

export class InvalidURLError extends Error {
  readonly url: string;

  constructor(url: string, reason: string) {
    super(`Invalid URL "${url}": ${reason}`);
    this.name = "InvalidURLError";
    this.url = url;
  }
}

export class FetchError extends Error {
  readonly url: string;
  readonly attempts: number;
  readonly status?: number;

  constructor(options: { url: string; attempts: number; status?: number; cause: unknown }) {
    const attemptLabel = options.attempts === 1 ? "attempt" : "attempts";
    super(`Failed to fetch ${options.url} after ${options.attempts} ${attemptLabel}: ${describeCause(options.cause)}`, {
      cause: options.cause,
    });
    this.name = "FetchError";
    this.url = options.url;
    this.attempts = options.attempts;
    this.status = options.status;
  }
}

export type GenerationErrorKind =
  | "auth"
  | "invalid_request"
  | "rate_limit"
  | "server"
  | "network"
  | "timeout"
  | "empty_response";

const RETRYABLE_KINDS: ReadonlySet<GenerationErrorKind> = new Set(["rate_limit", "server", "network", "timeout"]);

export class GenerationApiError extends Error {
  readonly kind: GenerationErrorKind;
  readonly status?: number;

  constructor(kind: GenerationErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "GenerationApiError";
    this.kind = kind;
    this.status = options.status;
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

export class SummarizationError extends Error {
  readonly attempts: number;
  readonly retryable: boolean;

  constructor(options: { attempts: number; retryable: boolean; cause: unknown }) {
    const prefix = options.retryable
      ? `Summarization failed after ${options.attempts} attempts`
      : "Summarization failed";
    super(`${prefix}: ${describeCause(options.cause)}`, { cause: options.cause });
    this.name = "SummarizationError";
    this.attempts = options.attempts;
    this.retryable = options.retryable;
  }
}

export type PipelineStage = "fetch" | "summarize";

export class OrchestrationError extends Error {
  readonly stage: PipelineStage;
  readonly url: string;

  constructor(options: { stage: PipelineStage; url: string; cause: unknown }) {
    super(describeCause(options.cause), { cause: options.cause });
    this.name = "OrchestrationError";
    this.stage = options.stage;
    this.url = options.url;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
