/**
 * Error types surfaced to the UI.
 *
 *   MissingInputError: the user must fix their input (no image, wrong type).
 *   ProviderError: the generative-AI provider call failed.
 *   ConfigError: required configuration is absent at startup.
 *
 * None of these are fatal to the session: pages catch them and render an
 * inline message, leaving the history untouched.
 */

export type MissingInputReason = "missing" | "unsupported" | "unreadable";

export class MissingInputError extends Error {
  readonly reason: MissingInputReason;

  constructor(message: string, reason: MissingInputReason = "missing") {
    super(message);
    this.name = "MissingInputError";
    this.reason = reason;
  }
}

export type ProviderErrorKind =
  | "network"
  | "quota"
  | "auth"
  | "blocked"
  | "empty"
  | "stopped"
  | "unknown";

export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  /** HTTP status returned by the provider, when there was one. */
  readonly status?: number;

  constructor(
    message: string,
    kind: ProviderErrorKind,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.kind = kind;
    if (options.status !== undefined) this.status = options.status;
  }
}

export class ConfigError extends Error {
  /** Name of the missing or invalid environment variable. */
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.key = key;
  }
}

/**
 * Wraps anything that is not already a ProviderError as an "unknown" one.
 * Client implementations map their own SDK errors before this point.
 */
export function asProviderError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ProviderError(`AI provider error: ${message}`, "unknown", { cause: err });
}

/** User-facing text for any thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === "string" ? err : "Something went wrong";
}
