import type { StepFn } from "./completion-loop.js";
import type { ExecutionOptions, ExecutionReporter, RetryExecutor } from "./retry-executor.js";
import type { ActionInvoker, Task } from "./types.js";

export interface ActionStepDeps {
  invoker: ActionInvoker;
  executor: RetryExecutor;
  execution: Omit<ExecutionOptions, "signal" | "reporter">;
  reporterFor?: (task: Task) => ExecutionReporter;
}

/** `task.action` holds the routed steps as a comma-separated list. */
export function parseActionSteps(action: string | null): string[] {
  if (!action) return [];
  return action
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function formatActionSteps(steps: readonly string[]): string {
  return steps.join(",");
}

/**
 * Step function that runs the task's action steps one per iteration, each
 * through the retry executor. Progress lives in `fields.completed_steps`, so
 * a requeued task resumes at the step it had not finished.
 */
export function createActionStep(deps: ActionStepDeps): StepFn {
  return async ({ task, signal }) => {
    const steps = parseActionSteps(task.action);
    if (steps.length === 0) {
      return { outcome: "fail", detail: "no_action_routed" };
    }

    const completed = Number(task.payload.fields.completed_steps ?? "0");
    const name = steps[completed];
    if (name === undefined) {
      return { outcome: "complete", detail: "all action steps already completed" };
    }

    const result = await deps.executor.execute(
      () => deps.invoker.invoke(name, task.payload),
      { ...deps.execution, signal, reporter: deps.reporterFor?.(task) }
    );

    if (!result.ok) {
      if (result.cancelled) {
        return { outcome: "cancelled", detail: name };
      }
      const kind = result.exhausted ? "retries_exhausted" : `${result.category}_error`;
      return { outcome: "fail", detail: `${kind}: ${name}: ${result.error.message}` };
    }

    const payload = {
      ...task.payload,
      fields: {
        ...task.payload.fields,
        completed_steps: String(completed + 1),
        last_result: result.detail,
      },
    };

    if (completed + 1 >= steps.length) {
      return { outcome: "complete", payload, detail: `${name}: ${result.detail}` };
    }
    return { outcome: "continue", payload, detail: `${name}: ${result.detail}` };
  };
}
