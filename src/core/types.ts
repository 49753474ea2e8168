export const TASK_SOURCES = [
  "gmail",
  "whatsapp",
  "linkedin",
  "facebook",
  "instagram",
  "twitter",
  "inbox",
] as const;

export type TaskSource = (typeof TASK_SOURCES)[number];

export const TASK_STATUSES = [
  "new",
  "needs_action",
  "in_progress",
  "done",
  "failed",
] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export type Domain = "personal" | "business";

export type Priority = "low" | "medium" | "high";

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set(["done", "failed"]);

/**
 * Allowed status edges. `in_progress → new` exists only so a cancelled
 * completion loop can leave its task resumable.
 */
export const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  new: ["needs_action", "in_progress", "failed"],
  needs_action: ["in_progress", "failed"],
  in_progress: ["done", "failed", "new"],
  done: [],
  failed: [],
};

export interface TaskPayload {
  title: string;
  text: string;
  /** Structured fields the eventual action needs (platform, contact, media, batch_size, ...). */
  fields: Record<string, string>;
}

export interface Task {
  id: string;
  source: TaskSource;
  domain: Domain | null;
  intent: string | null;
  priority: Priority;
  status: TaskStatus;
  action: string | null;
  payload: TaskPayload;
  retryCount: number;
  iterationCount: number;
  requiresApproval: boolean | null;
  /** null means pending */
  approved: boolean | null;
  failureReason: string | null;
  createdAt: string;
  updatedAt: string;
}

/** Fields the store lets callers change without a status transition. */
export type TaskPatch = Partial<
  Pick<
    Task,
    | "domain"
    | "intent"
    | "priority"
    | "action"
    | "payload"
    | "retryCount"
    | "iterationCount"
    | "requiresApproval"
    | "approved"
  >
>;

export interface Classification {
  domain: Domain;
  intent: string;
  priority: Priority;
}

export const AUDIT_EVENT_TYPES = [
  "created",
  "classified",
  "approval_requested",
  "approval_granted",
  "approval_denied",
  "attempt",
  "retry",
  "success",
  "failure",
  "moved",
  "quarantined",
  "report_generated",
  "job_failed",
] as const;

export type AuditEventType = (typeof AUDIT_EVENT_TYPES)[number];

export interface AuditEntry {
  timestamp: string;
  taskId: string | null;
  eventType: AuditEventType;
  detail: string;
  statusAfter: TaskStatus | null;
}

/** Response contract of an external action script. */
export interface ActionResult {
  success: boolean;
  detail: string;
}

export interface ActionInvoker {
  invoke(actionName: string, payload: TaskPayload): Promise<ActionResult>;
}

export function isTaskSource(value: unknown): value is TaskSource {
  return TASK_SOURCES.some((source) => source === value);
}

export function isTaskStatus(value: unknown): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}
