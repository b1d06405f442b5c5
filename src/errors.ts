export type ErrorKind = "RateLimited" | "ProviderError" | "NotFound" | "GenerationFailed" | "ConfigurationError";

export class RateLimitedError extends Error {
  readonly kind = "RateLimited" as const;
  readonly status = 429;

  constructor(
    message: string,
    readonly retryAfterSeconds: number | null = null
  ) {
    super(message);
    this.name = "RateLimitedError";
  }
}

export class ProviderError extends Error {
  readonly kind = "ProviderError" as const;

  constructor(
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ProviderError";
  }
}

export class NotFoundError extends Error {
  readonly kind = "NotFound" as const;

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class GenerationFailedError extends Error {
  readonly kind = "GenerationFailed" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationFailedError";
  }
}

export class ConfigurationError extends Error {
  readonly kind = "ConfigurationError" as const;

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type AppError = RateLimitedError | ProviderError | NotFoundError | GenerationFailedError | ConfigurationError;

export function isAppError(err: unknown): err is AppError {
  return (
    err instanceof RateLimitedError ||
    err instanceof ProviderError ||
    err instanceof NotFoundError ||
    err instanceof GenerationFailedError ||
    err instanceof ConfigurationError
  );
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
