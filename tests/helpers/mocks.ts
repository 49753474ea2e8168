import type { Logger } from "../../src/utils/logger.js";
import type { ActionInvoker, ActionResult, TaskPayload } from "../../src/core/types.js";
import { vi } from "vitest";

// ---- Mock Logger ----
export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn().mockReturnThis(),
    level: "silent",
  } as unknown as Logger;
}

// ---- Scripted Action Invoker ----
export type ScriptedStep = ActionResult | Error;

/**
 * Invoker that replays a script of results per action name. Once a script
 * runs out, the last entry repeats; unscripted actions succeed.
 */
export function createScriptedInvoker(
  scripts: Record<string, ScriptedStep[]> = {}
): ActionInvoker & {
  calls: Array<{ actionName: string; payload: TaskPayload }>;
} {
  const calls: Array<{ actionName: string; payload: TaskPayload }> = [];
  const positions = new Map<string, number>();

  return {
    calls,
    async invoke(actionName: string, payload: TaskPayload) {
      calls.push({ actionName, payload });
      const script = scripts[actionName];
      if (!script || script.length === 0) {
        return { success: true, detail: `${actionName} ok` };
      }
      const position = positions.get(actionName) ?? 0;
      positions.set(actionName, position + 1);
      const step = script[Math.min(position, script.length - 1)];
      if (step instanceof Error) throw step;
      return step ?? { success: true, detail: `${actionName} ok` };
    },
  };
}

/** Sleep stand-in that records requested delays and resolves immediately. */
export function createRecordingSleep(): ((ms: number) => Promise<void>) & { delays: number[] } {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return Object.assign(sleep, { delays });
}
