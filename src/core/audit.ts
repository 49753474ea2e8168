/**
 * AuditLog: append-only JSON Lines ledger of every state transition,
 * decision and error.
 *
 * - All writes go through one promise chain, so concurrent workers never
 *   interleave partial lines
 * - `record` resolves only once the entry is on disk
 * - Entries are never rewritten or removed
 */
import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { Logger } from "../utils/logger.js";
import { AUDIT_EVENT_TYPES, TASK_STATUSES } from "./types.js";
import type { AuditEntry, AuditEventType, TaskStatus } from "./types.js";

const AuditEntrySchema = z.object({
  timestamp: z.string(),
  task_id: z.string().nullable(),
  event_type: z.enum(AUDIT_EVENT_TYPES),
  detail: z.string(),
  status_after: z.enum(TASK_STATUSES).nullable(),
});

export interface AuditQuery {
  since?: Date;
  until?: Date;
  taskId?: string;
  eventType?: AuditEventType;
}

export interface AuditRecord {
  taskId: string | null;
  eventType: AuditEventType;
  detail: string;
  statusAfter: TaskStatus | null;
}

export class AuditLog {
  private queue: Promise<void> = Promise.resolve();
  private clock: () => Date;

  constructor(
    private path: string,
    private logger: Logger,
    clock?: () => Date
  ) {
    this.clock = clock ?? (() => new Date());
  }

  async record(record: AuditRecord): Promise<AuditEntry> {
    const entry: AuditEntry = { timestamp: this.clock().toISOString(), ...record };
    const line =
      JSON.stringify({
        timestamp: entry.timestamp,
        task_id: entry.taskId,
        event_type: entry.eventType,
        detail: entry.detail,
        status_after: entry.statusAfter,
      }) + "\n";

    const write = this.queue.then(async () => {
      await mkdir(dirname(this.path), { recursive: true });
      await appendFile(this.path, line, "utf-8");
    });
    // Keep the chain alive after a failed write; the caller still sees the error.
    this.queue = write.catch(() => undefined);
    await write;

    this.logger.debug(
      { taskId: entry.taskId, eventType: entry.eventType, statusAfter: entry.statusAfter },
      "Audit entry recorded"
    );
    return entry;
  }

  /** Entries in file order, filtered. Unreadable lines are skipped with a warning. */
  async read(query: AuditQuery = {}): Promise<AuditEntry[]> {
    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
      throw err;
    }

    const entries: AuditEntry[] = [];
    const lines = content.split("\n");
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]?.trim();
      if (!line) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        parsed = undefined;
      }
      const result = AuditEntrySchema.safeParse(parsed);
      if (!result.success) {
        this.logger.warn({ line: i + 1 }, "Skipping unreadable audit line");
        continue;
      }

      const entry: AuditEntry = {
        timestamp: result.data.timestamp,
        taskId: result.data.task_id,
        eventType: result.data.event_type,
        detail: result.data.detail,
        statusAfter: result.data.status_after,
      };
      if (matches(entry, query)) entries.push(entry);
    }

    return entries;
  }

  async forTask(taskId: string): Promise<AuditEntry[]> {
    return this.read({ taskId });
  }
}

function matches(entry: AuditEntry, query: AuditQuery): boolean {
  if (query.taskId !== undefined && entry.taskId !== query.taskId) return false;
  if (query.eventType !== undefined && entry.eventType !== query.eventType) return false;
  const at = Date.parse(entry.timestamp);
  if (query.since && at < query.since.getTime()) return false;
  if (query.until && at > query.until.getTime()) return false;
  return true;
}
