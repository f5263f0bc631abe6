import type { EngineName } from "../../config/app-config";

/**
 * The configured backend could not be reached or used: connection refused,
 * authentication failure, timeout, or rate limiting that outlasted the retries.
 * Retryable by the user once configuration/connectivity is fixed.
 */
export class EngineUnavailable extends Error {
  readonly code = "ENGINE_UNAVAILABLE";
  readonly engine: EngineName;
  /** Worth another attempt after a short pause (timeouts, 429, overloaded server) */
  readonly transient: boolean;

  constructor(
    message: string,
    options: { engine: EngineName; transient?: boolean; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = "EngineUnavailable";
    this.engine = options.engine;
    this.transient = options.transient ?? false;
  }
}

/**
 * The backend answered but rejected the request (model not found, quota
 * exhausted, malformed request or response). Not retried automatically.
 */
export class EngineResponseError extends Error {
  readonly code = "ENGINE_RESPONSE_ERROR";
  readonly engine: EngineName;
  readonly status: number | undefined;

  constructor(
    message: string,
    options: { engine: EngineName; status?: number; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = "EngineResponseError";
    this.engine = options.engine;
    this.status = options.status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
