import { describe, it, expect } from "vitest";
import { createActionStep, formatActionSteps, parseActionSteps } from "../../../src/core/action-step.js";
import { RetryExecutor } from "../../../src/core/retry-executor.js";
import { ActionError } from "../../../src/core/errors.js";
import type { Task } from "../../../src/core/types.js";
import { createMockLogger, createRecordingSleep, createScriptedInvoker } from "../../helpers/mocks.js";
import type { ScriptedStep } from "../../helpers/mocks.js";
import { createRunnableTask } from "../../helpers/fixtures.js";

describe("parseActionSteps", () => {
  it("splits and trims the comma-separated list", () => {
    expect(parseActionSteps("draft, social_post")).toEqual(["draft", "social_post"]);
    expect(parseActionSteps(null)).toEqual([]);
    expect(parseActionSteps(" , ")).toEqual([]);
  });

  it("round-trips through formatActionSteps", () => {
    expect(parseActionSteps(formatActionSteps(["draft", "social_post"]))).toEqual(["draft", "social_post"]);
  });
});

describe("createActionStep", () => {
  function stepWith(scripts: Record<string, ScriptedStep[]> = {}) {
    const invoker = createScriptedInvoker(scripts);
    const step = createActionStep({
      invoker,
      executor: new RetryExecutor(createMockLogger()),
      execution: { maxAttempts: 2, baseDelayMs: 100, sleep: createRecordingSleep() },
    });
    return { invoker, step };
  }

  function run(step: ReturnType<typeof createActionStep>, task: Task) {
    return step({ task, iteration: task.iterationCount + 1 });
  }

  it("runs the next unfinished step and records progress", async () => {
    const { invoker, step } = stepWith({ draft: [{ success: true, detail: "drafted" }] });
    const task = createRunnableTask({ action: "draft,social_post" });

    const result = await run(step, task);

    expect(invoker.calls.map((c) => c.actionName)).toEqual(["draft"]);
    expect(result).toEqual({
      outcome: "continue",
      detail: "draft: drafted",
      payload: { ...task.payload, fields: { completed_steps: "1", last_result: "drafted" } },
    });
  });

  it("completes after the last step", async () => {
    const { invoker, step } = stepWith();
    const task = createRunnableTask({
      action: "draft,social_post",
      payload: { title: "Launch", text: "Body", fields: { completed_steps: "1" } },
    });

    const result = await run(step, task);

    expect(invoker.calls.map((c) => c.actionName)).toEqual(["social_post"]);
    expect(result.outcome).toBe("complete");
    expect(result.payload?.fields.completed_steps).toBe("2");
  });

  it("completes without invoking anything when every step is done", async () => {
    const { invoker, step } = stepWith();
    const task = createRunnableTask({
      payload: { title: "Launch", text: "Body", fields: { completed_steps: "1" } },
    });

    expect(await run(step, task)).toEqual({ outcome: "complete", detail: "all action steps already completed" });
    expect(invoker.calls).toEqual([]);
  });

  it("fails a task with no routed action", async () => {
    const { step } = stepWith();

    expect(await run(step, createRunnableTask({ action: null }))).toEqual({
      outcome: "fail",
      detail: "no_action_routed",
    });
  });

  it("names the failure kind and the step", async () => {
    const { step } = stepWith({
      social_post: [new ActionError("Forbidden", { status: 403 })],
      reply: [new ActionError("Bad gateway", { status: 502 })],
    });

    expect(await run(step, createRunnableTask())).toEqual({
      outcome: "fail",
      detail: "permanent_error: social_post: Forbidden",
    });
    expect(await run(step, createRunnableTask({ action: "reply" }))).toEqual({
      outcome: "fail",
      detail: "retries_exhausted: reply: Bad gateway",
    });
  });

  it("treats an unknown action as a permanent failure", async () => {
    const { step } = stepWith({
      fax: [{ success: false, detail: 'not found: no handler registered for action "fax"' }],
    });

    expect(await run(step, createRunnableTask({ action: "fax" }))).toEqual({
      outcome: "fail",
      detail: 'permanent_error: fax: not found: no handler registered for action "fax"',
    });
  });

  it("reports a cancelled execution without invoking the action", async () => {
    const { invoker, step } = stepWith();
    const controller = new AbortController();
    controller.abort();
    const task = createRunnableTask();

    const result = await step({ task, iteration: 1, signal: controller.signal });

    expect(result).toEqual({ outcome: "cancelled", detail: "social_post" });
    expect(invoker.calls).toEqual([]);
  });
});
