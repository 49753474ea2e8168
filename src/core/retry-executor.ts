/**
 * Executes one external action with bounded retries and exponential backoff.
 *
 * - transient failure: wait baseDelayMs * 2^(attempt-1), then try again
 * - permanent failure or attempts exhausted: stop and return the failure
 *
 * The backoff wait is a timer on the calling task only, so other tasks keep
 * running while one task sleeps. Every reporter hook is awaited before
 * execution continues.
 */
import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "../utils/logger.js";
import { ActionError, toError } from "./errors.js";
import type { FailureCategory } from "./errors.js";
import { defaultErrorClassifier } from "./error-classifier.js";
import type { ErrorClassifierFn } from "./error-classifier.js";
import type { ActionResult } from "./types.js";

export interface AttemptFailure {
  attempt: number;
  error: Error;
  category: FailureCategory;
}

export interface ExecutionReporter {
  onAttemptStart?(attempt: number): Promise<void> | void;
  onAttemptFailed?(failure: AttemptFailure): Promise<void> | void;
  onRetryScheduled?(retry: { attempt: number; delayMs: number }): Promise<void> | void;
  onSuccess?(success: { attempts: number; detail: string }): Promise<void> | void;
  onFailure?(failure: ExecutionFailure): Promise<void> | void;
}

export interface ExecutionOptions {
  maxAttempts: number;
  baseDelayMs: number;
  classify?: ErrorClassifierFn;
  /** Per-attempt timeout; a timeout counts as a transient failure. */
  timeoutMs?: number;
  signal?: AbortSignal;
  reporter?: ExecutionReporter;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface ExecutionSuccess {
  ok: true;
  detail: string;
  attempts: number;
}

export interface ExecutionFailure {
  ok: false;
  error: Error;
  category: FailureCategory;
  attempts: number;
  /** true when the last failure was transient but no attempts were left */
  exhausted: boolean;
  /** true when the abort signal fired before the next attempt */
  cancelled: boolean;
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await delay(ms, undefined, { signal });
};

export class RetryExecutor {
  constructor(private logger: Logger) {}

  async execute(
    action: () => Promise<ActionResult>,
    options: ExecutionOptions
  ): Promise<ExecutionResult> {
    const classify = options.classify ?? defaultErrorClassifier;
    const sleep = options.sleep ?? defaultSleep;
    const reporter = options.reporter ?? {};

    let attempt = 0;
    for (;;) {
      attempt++;

      if (options.signal?.aborted) {
        return this.cancelled(attempt - 1);
      }

      await reporter.onAttemptStart?.(attempt);

      let error: Error;
      try {
        const result = await this.runAttempt(action, options.timeoutMs);
        if (result.success) {
          await reporter.onSuccess?.({ attempts: attempt, detail: result.detail });
          return { ok: true, detail: result.detail, attempts: attempt };
        }
        error = new ActionError(result.detail || "action reported failure");
      } catch (err) {
        error = toError(err);
      }

      const category = classify(error);
      await reporter.onAttemptFailed?.({ attempt, error, category });

      const exhausted = attempt >= options.maxAttempts;
      if (category === "permanent" || exhausted) {
        const failure: ExecutionFailure = {
          ok: false,
          error,
          category,
          attempts: attempt,
          exhausted: category === "transient" && exhausted,
          cancelled: false,
        };
        this.logger.debug(
          { attempts: attempt, category, error: error.message },
          "Action failed, no further retries"
        );
        await reporter.onFailure?.(failure);
        return failure;
      }

      const delayMs = backoffDelay(options.baseDelayMs, attempt);
      await reporter.onRetryScheduled?.({ attempt, delayMs });
      this.logger.debug(
        { attempt, delayMs, error: error.message },
        "Retrying after transient error"
      );

      try {
        await sleep(delayMs, options.signal);
      } catch (err) {
        if (options.signal?.aborted) {
          return this.cancelled(attempt, error);
        }
        throw err;
      }
    }
  }

  private async runAttempt(
    action: () => Promise<ActionResult>,
    timeoutMs: number | undefined
  ): Promise<ActionResult> {
    if (timeoutMs === undefined) return action();

    let timer: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        action(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new ActionError("Action timed out", { category: "transient" })),
            timeoutMs
          );
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private cancelled(attempts: number, lastError?: Error): ExecutionFailure {
    return {
      ok: false,
      error: lastError ?? new Error("execution cancelled"),
      category: "transient",
      attempts,
      exhausted: false,
      cancelled: true,
    };
  }
}
