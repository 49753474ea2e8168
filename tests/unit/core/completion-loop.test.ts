import { describe, it, expect, vi } from "vitest";
import { CompletionLoop, ITERATION_CAP_EXCEEDED } from "../../../src/core/completion-loop.js";
import type { StepFn } from "../../../src/core/completion-loop.js";
import type { Task } from "../../../src/core/types.js";
import { createMockLogger } from "../../helpers/mocks.js";
import { createRunnableTask } from "../../helpers/fixtures.js";

describe("CompletionLoop", () => {
  const loop = new CompletionLoop(createMockLogger());

  it("never calls the step more than maxIterations times", async () => {
    const step = vi.fn<StepFn>(async () => ({ outcome: "continue" }));

    const result = await loop.run(createRunnableTask({ status: "in_progress" }), step, { maxIterations: 10 });

    expect(step).toHaveBeenCalledTimes(10);
    expect(result).toMatchObject({ outcome: "fail", reason: ITERATION_CAP_EXCEEDED, iterations: 10 });
  });

  it("counts iterations already spent", async () => {
    const step = vi.fn<StepFn>(async () => ({ outcome: "continue" }));

    const result = await loop.run(createRunnableTask({ iterationCount: 7 }), step, { maxIterations: 10 });

    expect(step).toHaveBeenCalledTimes(3);
    expect(result.iterations).toBe(10);
  });

  it("stops on complete", async () => {
    let calls = 0;
    const step: StepFn = async () => {
      calls++;
      return calls === 2 ? { outcome: "complete", detail: "published" } : { outcome: "continue" };
    };

    const result = await loop.run(createRunnableTask(), step, { maxIterations: 10 });

    expect(result).toMatchObject({ outcome: "complete", iterations: 2, detail: "published" });
  });

  it("stops on fail with the step's reason", async () => {
    const step: StepFn = async () => ({ outcome: "fail", detail: "permanent_error: reply: bad input" });

    const result = await loop.run(createRunnableTask(), step, { maxIterations: 10 });

    expect(result).toMatchObject({ outcome: "fail", iterations: 1, reason: "permanent_error: reply: bad input" });
  });

  it("treats a throwing step as a failed iteration", async () => {
    const step: StepFn = async () => {
      throw new Error("boom");
    };

    const result = await loop.run(createRunnableTask(), step, { maxIterations: 10 });

    expect(result).toMatchObject({ outcome: "fail", iterations: 1, reason: "boom" });
  });

  it("passes each iteration's payload to the next and persists it", async () => {
    const persisted: Task[] = [];
    const step: StepFn = async ({ task, iteration }) => {
      const seen = task.payload.fields.seen ?? "";
      return {
        outcome: iteration === 3 ? "complete" : "continue",
        payload: { ...task.payload, fields: { ...task.payload.fields, seen: `${seen}${iteration}` } },
      };
    };

    const result = await loop.run(createRunnableTask(), step, {
      maxIterations: 10,
      onIteration: async (t) => {
        persisted.push(t);
        return t;
      },
    });

    expect(persisted.map((t) => t.iterationCount)).toEqual([1, 2, 3]);
    expect(result.task.payload.fields.seen).toBe("123");
  });

  it("fails when the store has already failed the task", async () => {
    const step: StepFn = async () => ({ outcome: "continue" });

    const result = await loop.run(createRunnableTask(), step, {
      maxIterations: 10,
      onIteration: async (t) => ({ ...t, status: "failed", failureReason: "retry_limit_exceeded" }),
    });

    expect(result).toMatchObject({ outcome: "fail", reason: "retry_limit_exceeded", iterations: 1 });
  });

  it("does not run when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const step = vi.fn<StepFn>(async () => ({ outcome: "continue" }));

    const result = await loop.run(createRunnableTask(), step, { maxIterations: 10, signal: controller.signal });

    expect(step).not.toHaveBeenCalled();
    expect(result).toMatchObject({ outcome: "cancelled", iterations: 0 });
  });

  it("stops between iterations when cancelled and keeps the count", async () => {
    const controller = new AbortController();
    const step: StepFn = async ({ iteration }) => {
      if (iteration === 3) controller.abort();
      return { outcome: "continue" };
    };

    const result = await loop.run(createRunnableTask(), step, { maxIterations: 10, signal: controller.signal });

    expect(result).toMatchObject({ outcome: "cancelled", iterations: 3 });
    expect(result.task.iterationCount).toBe(3);
  });

  it("does not count or save a step that was cancelled mid-call", async () => {
    const controller = new AbortController();
    const onIteration = vi.fn(async (t: Task) => t);
    const step: StepFn = async () => {
      controller.abort();
      return { outcome: "cancelled", detail: "social_post" };
    };

    const result = await loop.run(createRunnableTask({ iterationCount: 2 }), step, {
      maxIterations: 10,
      signal: controller.signal,
      onIteration,
    });

    expect(result).toMatchObject({ outcome: "cancelled", iterations: 2 });
    expect(result.task.iterationCount).toBe(2);
    expect(onIteration).not.toHaveBeenCalled();
  });
});
