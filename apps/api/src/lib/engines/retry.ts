import { setTimeout as delay } from "timers/promises";
import { EngineUnavailable } from "./errors";

export interface RetryPolicy {
  maxAttempts: number;
  backoffMs: number;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Run `fn` until it succeeds, retrying only transient EngineUnavailable failures
 * with a fixed backoff. Everything else surfaces on the first failure.
 */
export async function withTransientRetry<T>(
  label: string,
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<T>,
): Promise<T> {
  const sleep = policy.sleep ?? delay;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!(error instanceof EngineUnavailable) || !error.transient) throw error;

      if (attempt >= policy.maxAttempts) {
        throw new EngineUnavailable(
          `${error.message} (gave up after ${attempt} attempt${attempt === 1 ? "" : "s"})`,
          { engine: error.engine, transient: true, cause: error },
        );
      }

      console.warn(
        `${label}: Attempt ${attempt}/${policy.maxAttempts} failed: ${error.message}. Retrying in ${policy.backoffMs}ms`,
      );
      await sleep(policy.backoffMs);
    }
  }
}
