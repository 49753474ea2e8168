import type { App } from "../app.js";
import { isTaskStatus } from "../core/types.js";
import type { TaskStatus } from "../core/types.js";
import { parseWindow } from "../core/weekly-aggregator.js";

export type CliCommand =
  | { command: "approve" | "deny"; id: string }
  | { command: "report"; window: string; dryRun: boolean }
  | { command: "tick" }
  | { command: "recover" }
  | { command: "status"; status?: TaskStatus }
  | { command: "audit"; id: string }
  | { command: "help" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = `Usage: vaultflow <command> [options]

Commands:
  approve <id>                 Grant approval; the next tick runs the task
  deny <id>                    Deny approval; the task fails
  report [--window 7d]         Write the briefing (--dry-run prints it only)
  tick                         Ingest intake documents and process runnable tasks once
  recover                      Repair interrupted moves and requeue tasks no process is running
  status [--status <status>]   List tasks
  audit <id>                   Show a task's audit trail
  help                         Show this message`;

export function parseArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;
  const positional = rest.filter((a) => !a.startsWith("--"));

  switch (command) {
    case "approve":
    case "deny":
    case "audit": {
      const id = positional[0];
      if (!id) throw new UsageError(`${command} needs a task id`);
      return { command, id };
    }
    case "report": {
      const window = optionValue(rest, "--window") ?? "7d";
      try {
        parseWindow(window);
      } catch (err) {
        throw new UsageError(err instanceof Error ? err.message : String(err));
      }
      return { command, window, dryRun: rest.includes("--dry-run") };
    }
    case "status": {
      const status = optionValue(rest, "--status");
      if (status === undefined) return { command };
      if (!isTaskStatus(status)) throw new UsageError(`unknown status "${status}"`);
      return { command, status };
    }
    case "tick":
    case "recover":
      return { command };
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { command: "help" };
    default:
      throw new UsageError(`unknown command "${command}"`);
  }
}

function optionValue(args: readonly string[], name: string): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === name) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new UsageError(`${name} needs a value`);
      }
      return value;
    }
    if (arg?.startsWith(`${name}=`)) return arg.slice(name.length + 1);
  }
  return undefined;
}

/** Run one command against a wired app. Returns the process exit code. */
export async function runCommand(
  cmd: CliCommand,
  app: App,
  out: (line: string) => void
): Promise<number> {
  switch (cmd.command) {
    case "help":
      out(USAGE);
      return 0;

    case "approve":
    case "deny": {
      // The daemon's poll, or `vaultflow tick`, runs approved tasks
      const outcome = await app.orchestrator.resolveApproval(cmd.id, cmd.command === "approve", {
        actor: "cli",
        run: false,
      });
      out(`${cmd.id}: ${outcome}`);
      return 0;
    }

    case "report": {
      const summary = await app.aggregator.run({ window: cmd.window });
      if (cmd.dryRun) {
        out(JSON.stringify(summary, null, 2));
        return 0;
      }
      const path = await app.aggregator.writeBriefing(summary);
      out(`Briefing written to ${path}`);
      return 0;
    }

    case "tick": {
      const result = await app.orchestrator.tick();
      out(`adopted ${result.adopted.length}, quarantined ${result.quarantined.length}`);
      for (const [id, outcome] of Object.entries(result.outcomes)) {
        out(`${id}: ${outcome}`);
      }
      return 0;
    }

    case "recover": {
      const repaired = await app.orchestrator.recover();
      out(`repaired ${repaired} document(s)`);
      return 0;
    }

    case "status": {
      const tasks = await app.store.list(cmd.status);
      for (const task of tasks) {
        let note = "";
        if (task.requiresApproval === true && task.approved !== true) {
          note = " [awaiting approval]";
        } else if (task.status === "in_progress") {
          note = (await app.leases.isHeld(task.id)) ? " [running]" : " [stale]";
        }
        out(`${task.id}  ${task.status}  ${task.domain ?? "-"}/${task.intent ?? "-"}  ${task.payload.title}${note}`);
      }
      if (tasks.length === 0) out("no tasks");
      return 0;
    }

    case "audit": {
      const entries = await app.audit.forTask(cmd.id);
      for (const entry of entries) {
        out(`${entry.timestamp}  ${entry.eventType}  ${entry.statusAfter ?? "-"}  ${entry.detail}`);
      }
      if (entries.length === 0) out(`no audit entries for ${cmd.id}`);
      return 0;
    }
  }
}
