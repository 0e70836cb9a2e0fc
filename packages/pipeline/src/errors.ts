export type CompletionErrorKind =
  | "rate-limited"
  | "transient-network"
  | "malformed-request"
  | "server-error"
  | "empty-completion";

/** A failed exchange with the completion endpoint. Retried by the task controller. */
export class CompletionError extends Error {
  readonly kind: CompletionErrorKind;
  readonly status: number | null;

  constructor(
    kind: CompletionErrorKind,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "CompletionError";
    this.kind = kind;
    this.status = options.status ?? null;
  }
}

/** Fatal before any task runs: missing credential, unreadable plan or prompt, bad settings. */
export class ConfigurationError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ConfigurationError";
  }
}

export function classifyHttpStatus(status: number): CompletionErrorKind {
  if (status === 429) {
    return "rate-limited";
  }
  if (status >= 500) {
    return "server-error";
  }
  if (status >= 400) {
    return "malformed-request";
  }
  return "server-error";
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function errorToLogLine(error: unknown): string {
  if (error instanceof Error) {
    const stack = typeof error.stack === "string" ? error.stack : "";
    return stack.trim().length > 0 ? stack : error.message;
  }
  return String(error);
}
