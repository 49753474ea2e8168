/**
 * Executor side of the system: action names map to handlers that run the
 * external posting/reply scripts. The core only ever calls `invoke`.
 */
import { execFile } from "node:child_process";
import { z } from "zod";
import type { Logger } from "../utils/logger.js";
import type { CommandConfig } from "../utils/config.js";
import { ActionError } from "./errors.js";
import type { ActionInvoker, ActionResult, TaskPayload } from "./types.js";

export type ActionHandler = (payload: TaskPayload) => Promise<ActionResult>;

export class ActionRegistry implements ActionInvoker {
  private handlers = new Map<string, ActionHandler>();

  constructor(private logger: Logger) {}

  register(actionName: string, handler: ActionHandler): void {
    if (this.handlers.has(actionName)) {
      throw new Error(`Action "${actionName}" is already registered`);
    }
    this.handlers.set(actionName, handler);
    this.logger.info({ action: actionName }, "Action registered");
  }

  has(actionName: string): boolean {
    return this.handlers.has(actionName);
  }

  listActions(): string[] {
    return [...this.handlers.keys()].sort();
  }

  async invoke(actionName: string, payload: TaskPayload): Promise<ActionResult> {
    const handler = this.handlers.get(actionName);
    if (!handler) {
      return { success: false, detail: `not found: no handler registered for action "${actionName}"` };
    }
    return handler(payload);
  }
}

const ActionOutputSchema = z.object({
  success: z.boolean(),
  detail: z.string().default(""),
  status: z.number().int().optional(),
});

/**
 * Read a script's stdout. The last non-empty line is expected to be
 * `{"success": bool, "detail": string}`; a script that exits cleanly without
 * one is taken as a success with its output as detail. A failed result that
 * carries an HTTP-like `status` becomes an ActionError so the status drives
 * retry classification.
 */
export function parseActionOutput(stdout: string): ActionResult {
  const lines = stdout.trim().split(/\r?\n/).filter((l) => l.trim().length > 0);
  const last = lines[lines.length - 1];

  if (last !== undefined) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(last);
    } catch {
      parsed = undefined;
    }
    const result = ActionOutputSchema.safeParse(parsed);
    if (result.success) {
      const { success, detail, status } = result.data;
      if (!success && status !== undefined) {
        throw new ActionError(detail || `action failed with status ${status}`, { status });
      }
      return { success, detail };
    }
  }

  return { success: true, detail: stdout.trim() };
}

/** Handler that runs a configured script with the payload as JSON on stdin. */
export function commandHandler(config: CommandConfig, logger: Logger): ActionHandler {
  return (payload) =>
    new Promise<ActionResult>((resolve, reject) => {
      const child = execFile(
        config.command,
        config.args,
        { timeout: config.timeout_ms, maxBuffer: 1024 * 1024 },
        (error, stdout, stderr) => {
          if (error) {
            if (error.killed) {
              reject(new ActionError(`Action timed out after ${config.timeout_ms}ms`, { category: "transient" }));
              return;
            }
            logger.debug({ command: config.command, code: error.code }, "Action script exited with error");
            const output = stderr.trim() || stdout.trim() || error.message;
            try {
              const result = parseActionOutput(stdout);
              if (!result.success) {
                resolve(result);
                return;
              }
            } catch (parseErr) {
              reject(parseErr);
              return;
            }
            reject(new ActionError(output));
            return;
          }

          try {
            resolve(parseActionOutput(stdout));
          } catch (parseErr) {
            reject(parseErr);
          }
        }
      );

      child.stdin?.end(JSON.stringify(payload));
    });
}

export function createActionRegistry(
  commands: Readonly<Record<string, CommandConfig>>,
  logger: Logger
): ActionRegistry {
  const registry = new ActionRegistry(logger);
  for (const [name, command] of Object.entries(commands)) {
    registry.register(name, commandHandler(command, logger));
  }
  return registry;
}
