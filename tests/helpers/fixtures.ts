import type { Task } from "../../src/core/types.js";
import type { PartitionsConfig } from "../../src/utils/config.js";

export const PARTITIONS: PartitionsConfig = {
  new: "Inbox",
  needs_action: "Needs_Action",
  in_progress: "In_Progress",
  done: "Done",
  failed: "Failed",
};

export const FIXED_NOW = new Date("2026-03-14T12:00:00.000Z");

let counter = 0;

/** A fresh `new` task with a unique id. */
export function createTask(overrides: Partial<Task> = {}): Task {
  counter++;
  const suffix = counter.toString(16).padStart(6, "0");
  return {
    id: `20260314_120000_gmail_${suffix}`,
    source: "gmail",
    domain: null,
    intent: null,
    priority: "low",
    status: "new",
    action: null,
    payload: { title: "Test task", text: "Body text", fields: {} },
    retryCount: 0,
    iterationCount: 0,
    requiresApproval: null,
    approved: null,
    failureReason: null,
    createdAt: FIXED_NOW.toISOString(),
    updatedAt: FIXED_NOW.toISOString(),
    ...overrides,
  };
}

/** A classified task that has passed the gate and may be claimed. */
export function createRunnableTask(overrides: Partial<Task> = {}): Task {
  return createTask({
    domain: "business",
    intent: "post",
    priority: "medium",
    action: "social_post",
    requiresApproval: false,
    approved: true,
    ...overrides,
  });
}

/** Producer document as a watcher would drop it into the intake partition. */
export function intakeDocument(options: {
  source: string;
  created?: string;
  title?: string;
  body: string;
  fields?: Record<string, string>;
}): string {
  const lines = ["---", `source: ${options.source}`];
  if (options.created) lines.push(`created: ${options.created}`);
  lines.push("status: pending");
  if (options.fields) {
    lines.push("fields:");
    for (const [key, value] of Object.entries(options.fields)) {
      lines.push(`  ${key}: ${JSON.stringify(value)}`);
    }
  }
  lines.push("---", "");
  if (options.title) lines.push(`# ${options.title}`, "");
  lines.push(options.body, "");
  return lines.join("\n");
}
