export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Raised by a telemetry sink when a record could not be published. */
export class SinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SinkError";
  }
}

export class InferenceError extends Error {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, params: { status?: number; body?: string; cause?: unknown } = {}) {
    super(message, { cause: params.cause });
    this.name = "InferenceError";
    this.status = params.status;
    this.body = params.body;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

export function isAbortError(e: unknown): boolean {
  return e instanceof Error && e.name === "AbortError";
}
