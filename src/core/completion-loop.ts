/**
 * Bounded iterative loop for tasks that need several steps
 * (analyze → draft → refine → finalize) before they are resolved.
 *
 * Each step call consumes one iteration. The loop ends on `complete`, on
 * `fail`, or when the next call would exceed maxIterations, whatever the
 * step keeps returning. Cancellation is checked before every call and
 * leaves the task resumable: the stored iteration count carries over. A step
 * that was itself cancelled mid-call consumes no iteration and is not saved.
 */
import type { Logger } from "../utils/logger.js";
import type { Task, TaskPayload } from "./types.js";

export const ITERATION_CAP_EXCEEDED = "iteration_cap_exceeded";

export type StepOutcome = "continue" | "complete" | "fail" | "cancelled";

export interface StepResult {
  outcome: StepOutcome;
  payload?: TaskPayload;
  /** Human-readable detail; the failure reason for `fail`. */
  detail?: string;
}

export interface StepContext {
  task: Task;
  iteration: number;
  signal?: AbortSignal;
}

export type StepFn = (ctx: StepContext) => Promise<StepResult>;

export type LoopResult =
  | { outcome: "complete"; task: Task; iterations: number; detail: string }
  | { outcome: "fail"; task: Task; iterations: number; reason: string }
  | { outcome: "cancelled"; task: Task; iterations: number };

export interface LoopOptions {
  maxIterations: number;
  signal?: AbortSignal;
  /**
   * Persist the task after each iteration (iteration count and payload).
   * Returns the stored task, which may already be failed by the store.
   */
  onIteration?: (task: Task) => Promise<Task>;
}

export class CompletionLoop {
  constructor(private logger: Logger) {}

  async run(task: Task, step: StepFn, options: LoopOptions): Promise<LoopResult> {
    let current = task;

    for (;;) {
      if (options.signal?.aborted) {
        this.logger.info({ taskId: current.id, iterations: current.iterationCount }, "Completion loop cancelled");
        return { outcome: "cancelled", task: current, iterations: current.iterationCount };
      }

      if (current.iterationCount >= options.maxIterations) {
        this.logger.warn(
          { taskId: current.id, maxIterations: options.maxIterations },
          "Completion loop hit its iteration cap"
        );
        return {
          outcome: "fail",
          task: current,
          iterations: current.iterationCount,
          reason: ITERATION_CAP_EXCEEDED,
        };
      }

      const iteration = current.iterationCount + 1;
      let result: StepResult;
      try {
        result = await step({ task: current, iteration, signal: options.signal });
      } catch (err) {
        result = {
          outcome: "fail",
          detail: err instanceof Error ? err.message : String(err),
        };
      }

      if (result.outcome === "cancelled") {
        this.logger.info({ taskId: current.id, iterations: current.iterationCount }, "Completion loop cancelled mid-step");
        return { outcome: "cancelled", task: current, iterations: current.iterationCount };
      }

      const next: Task = {
        ...current,
        iterationCount: iteration,
        payload: result.payload ?? current.payload,
      };
      current = options.onIteration ? await options.onIteration(next) : next;

      this.logger.debug(
        { taskId: current.id, iteration, outcome: result.outcome },
        "Completion loop iteration"
      );

      if (current.status === "failed") {
        return {
          outcome: "fail",
          task: current,
          iterations: current.iterationCount,
          reason: current.failureReason ?? ITERATION_CAP_EXCEEDED,
        };
      }

      if (result.outcome === "complete") {
        return {
          outcome: "complete",
          task: current,
          iterations: iteration,
          detail: result.detail ?? "",
        };
      }

      if (result.outcome === "fail") {
        return {
          outcome: "fail",
          task: current,
          iterations: iteration,
          reason: result.detail ?? "step_failed",
        };
      }
    }
  }
}
