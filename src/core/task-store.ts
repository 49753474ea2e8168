/**
 * TaskStore: directory-partitioned, durable collection of task documents.
 *
 * Layout: one directory per status under the vault root, one markdown file
 * per task named `<id>__<slug>.md`. A file's partition always matches the
 * `status` in its header except during the two-step move below.
 *
 * Moves:
 * 1. rewrite the document in place (temp file + rename) with its new status
 * 2. rename it into the target partition
 *
 * Both steps are atomic renames, so a task is never visible in two
 * partitions and never vanishes. A crash between them leaves a document whose
 * header is ahead of its partition; `recover()` and every later transition
 * roll it forward.
 *
 * Claims run the other way round: the rename out of the source partition is
 * the check-and-set, so when several processes claim one task exactly one
 * rename succeeds and the others see ENOENT. A claim cut short before its
 * rewrite leaves a `new` or `needs_action` header in the in_progress
 * partition, which is rolled forward to `in_progress`. Adoption and
 * quarantine likewise start by renaming the raw document to its task name.
 *
 * The in-process mutex serializes callers on one id; across processes, the
 * orchestrator holds a task lease for every other mutation.
 */
import { mkdir, readFile, readdir, rename, unlink, writeFile } from "node:fs/promises";
import { randomBytes } from "node:crypto";
import { join } from "node:path";
import type { Logger } from "../utils/logger.js";
import type { PartitionsConfig } from "../utils/config.js";
import { generateTaskId, slugify } from "../utils/id.js";
import { KeyedMutex } from "./keyed-mutex.js";
import { TaskStoreError, errnoCode } from "./errors.js";
import {
  isRawIntake,
  parseFrontMatter,
  parseTaskDocument,
  serializeTask,
} from "./task-document.js";
import {
  TASK_STATUSES,
  TRANSITIONS,
  isTaskSource,
  isTerminal,
} from "./types.js";
import type { Classification, Task, TaskPatch, TaskStatus } from "./types.js";

export interface TaskStoreOptions {
  root: string;
  partitions: PartitionsConfig;
  maxRetries: number;
  maxIterations: number;
  clock?: () => Date;
}

/** A producer document in the intake partition that is not a task document yet. */
export interface RawIntake {
  file: string;
  path: string;
  content: string;
}

interface Located {
  status: TaskStatus;
  file: string;
  path: string;
}

/** Documents can move between locating and reading them; look again this often. */
const LOAD_ATTEMPTS = 3;

export class TaskStore {
  private locks = new KeyedMutex();
  private clock: () => Date;

  constructor(
    private options: TaskStoreOptions,
    private logger: Logger
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  get maxRetries(): number {
    return this.options.maxRetries;
  }

  get maxIterations(): number {
    return this.options.maxIterations;
  }

  partitionDir(status: TaskStatus): string {
    return join(this.options.root, this.options.partitions[status]);
  }

  async init(): Promise<void> {
    for (const status of TASK_STATUSES) {
      await mkdir(this.partitionDir(status), { recursive: true });
    }
  }

  /** Add a new task to the intake partition. Fails on an id collision. */
  async enqueue(task: Task): Promise<Task> {
    if (task.status !== "new") {
      throw new TaskStoreError(
        "invalid_transition",
        `enqueued tasks must be new, got ${task.status}`,
        task.id
      );
    }
    this.checkCounters(task);

    return this.locks.run(task.id, async () => {
      if (await this.locate(task.id)) {
        throw new TaskStoreError("duplicate_id", `task ${task.id} already exists`, task.id);
      }
      await this.writeAtomic(this.partitionDir("new"), taskFileName(task), serializeTask(task));
      this.logger.debug({ taskId: task.id }, "Task enqueued");
      return task;
    });
  }

  /** Read-only lookup; never repairs the document it reads. */
  async get(id: string): Promise<Task | null> {
    return this.locks.run(id, async () => {
      for (let attempt = 0; attempt < LOAD_ATTEMPTS; attempt++) {
        const located = await this.locate(id);
        if (!located) continue;
        const content = await readIfExists(located.path);
        if (content !== null) return parseTaskDocument(content, located.file);
      }
      return null;
    });
  }

  async require(id: string): Promise<Task> {
    const task = await this.get(id);
    if (!task) {
      throw new TaskStoreError("not_found", `task ${id} not found`, id);
    }
    return task;
  }

  /** All tasks, or the tasks of one partition. Unreadable documents are skipped. */
  async list(status?: TaskStatus): Promise<Task[]> {
    const statuses = status ? [status] : [...TASK_STATUSES];
    const tasks: Task[] = [];

    for (const s of statuses) {
      for (const file of await this.listFiles(s)) {
        const content = await readIfExists(join(this.partitionDir(s), file));
        if (content === null) continue;
        if (s === "new" && isRawIntake(content)) continue;
        try {
          tasks.push(parseTaskDocument(content, file));
        } catch (err) {
          this.logger.warn({ file, partition: s, error: err }, "Skipping unreadable task document");
        }
      }
    }

    return tasks;
  }

  /** Producer documents waiting for adoption. */
  async listRaw(): Promise<RawIntake[]> {
    const raws: RawIntake[] = [];
    for (const file of await this.listFiles("new")) {
      const path = join(this.partitionDir("new"), file);
      const content = await readIfExists(path);
      if (content !== null && isRawIntake(content)) {
        raws.push({ file, path, content });
      }
    }
    return raws;
  }

  /**
   * Replace a raw producer document with its canonical task document. The
   * raw file is renamed to the task's file name first, then rewritten, so the
   * message exists exactly once throughout and only one worker adopts it.
   * A task id may be the producer's own, as long as no other task has it.
   */
  async adopt(raw: RawIntake, task: Task): Promise<Task> {
    if (task.status !== "new") {
      throw new TaskStoreError("invalid_transition", "adopted tasks must be new", task.id);
    }

    return this.locks.run(task.id, async () => {
      const existing = await this.locate(task.id);
      if (existing && existing.path !== raw.path) {
        throw new TaskStoreError("duplicate_id", `task ${task.id} already exists`, task.id);
      }
      const dir = this.partitionDir("new");
      const file = taskFileName(task);
      await this.takeRaw(raw, join(dir, file), task.id);
      await this.writeAtomic(dir, file, serializeTask(task));
      this.logger.debug({ taskId: task.id, file: raw.file }, "Intake document adopted");
      return task;
    });
  }

  /**
   * Move a malformed intake document into the failed partition, keeping the
   * raw content as the body and the parse error as the failure reason.
   */
  async quarantine(raw: RawIntake, reason: string): Promise<Task> {
    const now = this.clock();
    const source = guessSource(raw.content);
    const task: Task = {
      id: generateTaskId(source, now),
      source,
      domain: null,
      intent: null,
      priority: "low",
      status: "failed",
      action: null,
      payload: {
        title: `Quarantined ${raw.file}`,
        text: "```\n" + raw.content.replace(/```/g, "'''") + "\n```",
        fields: { original_file: raw.file },
      },
      retryCount: 0,
      iterationCount: 0,
      requiresApproval: null,
      approved: null,
      failureReason: reason,
      createdAt: now.toISOString(),
      updatedAt: now.toISOString(),
    };

    return this.locks.run(task.id, async () => {
      const inbox = this.partitionDir("new");
      const file = taskFileName(task);
      await this.takeRaw(raw, join(inbox, file), task.id);
      await this.writeAtomic(inbox, file, serializeTask(task));
      await rename(join(inbox, file), join(this.partitionDir("failed"), file));
      this.logger.warn({ taskId: task.id, file: raw.file, reason }, "Intake document quarantined");
      return task;
    });
  }

  /**
   * Atomic check-and-set `new | needs_action → in_progress`. Of two
   * concurrent callers exactly one succeeds; the other gets `not_claimable`.
   */
  async claim(id: string): Promise<Task> {
    return this.locks.run(id, async () => {
      const { located, task } = await this.load(id);

      if (task.status !== "new" && task.status !== "needs_action") {
        throw new TaskStoreError("not_claimable", `task ${id} is ${task.status}`, id);
      }
      if (task.requiresApproval === null) {
        throw new TaskStoreError("not_claimable", `task ${id} has not been through the approval gate`, id);
      }
      if (task.requiresApproval && task.approved !== true) {
        throw new TaskStoreError("not_claimable", `task ${id} is awaiting approval`, id);
      }
      if (task.domain === null) {
        throw new TaskStoreError("not_claimable", `task ${id} is not classified`, id);
      }

      const dir = this.partitionDir("in_progress");
      try {
        await rename(located.path, join(dir, located.file));
      } catch (err) {
        if (errnoCode(err) === "ENOENT") {
          throw new TaskStoreError("not_claimable", `task ${id} was claimed by another worker`, id);
        }
        throw err;
      }

      const next: Task = { ...task, status: "in_progress", updatedAt: this.clock().toISOString() };
      await this.writeAtomic(dir, located.file, serializeTask(next));
      this.logger.debug({ taskId: id, from: task.status, to: "in_progress" }, "Task claimed");
      return next;
    });
  }

  async complete(id: string): Promise<Task> {
    return this.transition(id, "done");
  }

  async fail(id: string, reason: string): Promise<Task> {
    return this.transition(id, "failed", undefined, reason);
  }

  /** `new → needs_action`; only for tasks the gate marked as requiring approval. */
  async holdForApproval(id: string): Promise<Task> {
    return this.transition(id, "needs_action", (task) => {
      if (task.requiresApproval !== true) {
        throw new TaskStoreError("invalid_transition", `task ${id} does not require approval`, id);
      }
    });
  }

  /** `in_progress → new`, used when a running loop is cancelled. */
  async requeue(id: string): Promise<Task> {
    return this.transition(id, "new");
  }

  /**
   * Change fields without a status transition. Counters past their limits
   * force the task into `failed` instead of being written.
   */
  async update(id: string, patch: TaskPatch): Promise<Task> {
    return this.locks.run(id, async () => {
      const { located, task } = await this.load(id);

      if (isTerminal(task.status)) {
        throw new TaskStoreError("invalid_transition", `task ${id} is ${task.status}`, id);
      }
      if (
        patch.domain !== undefined &&
        task.domain !== null &&
        patch.domain !== task.domain
      ) {
        throw new TaskStoreError(
          "invariant_violation",
          `task ${id} is already classified as ${task.domain}; use reclassify`,
          id
        );
      }

      const next: Task = { ...task, ...patch, updatedAt: this.clock().toISOString() };

      const overflow = this.counterOverflow(next);
      if (overflow) {
        const failed: Task = {
          ...task,
          status: "failed",
          failureReason: overflow,
          updatedAt: next.updatedAt,
        };
        await this.move(located, failed);
        this.logger.warn({ taskId: id, reason: overflow }, "Counter limit exceeded, task failed");
        return failed;
      }

      await this.writeAtomic(this.partitionDir(located.status), located.file, serializeTask(next));
      return next;
    });
  }

  /** Explicitly replace a task's classification. */
  async reclassify(id: string, classification: Classification): Promise<Task> {
    return this.locks.run(id, async () => {
      const { located, task } = await this.load(id);
      if (isTerminal(task.status)) {
        throw new TaskStoreError("invalid_transition", `task ${id} is ${task.status}`, id);
      }
      const next: Task = {
        ...task,
        ...classification,
        updatedAt: this.clock().toISOString(),
      };
      await this.writeAtomic(this.partitionDir(located.status), located.file, serializeTask(next));
      return next;
    });
  }

  /**
   * Roll forward interrupted moves and claims, and rename adopted documents
   * whose filename does not carry their id. Returns the number of repairs.
   */
  async recover(): Promise<number> {
    let repaired = 0;

    for (const status of TASK_STATUSES) {
      for (const file of await this.listFiles(status)) {
        const path = join(this.partitionDir(status), file);
        const content = await readIfExists(path);
        if (content === null) continue;
        if (status === "new" && isRawIntake(content)) continue;

        let task: Task;
        try {
          task = parseTaskDocument(content, file);
        } catch (err) {
          this.logger.warn({ file, partition: status, error: err }, "Cannot recover unreadable document");
          continue;
        }

        const settled = await this.locks.run(task.id, () => this.settle({ status, file, path }, task));
        if (!settled) continue;
        let fixed = settled.task.status !== task.status || settled.located.status !== status;

        const canonical = taskFileName(settled.task);
        if (file !== canonical && !file.startsWith(`${task.id}__`)) {
          await rename(settled.located.path, join(this.partitionDir(settled.located.status), canonical));
          this.logger.warn({ taskId: task.id, from: file, to: canonical }, "Renamed task document");
          fixed = true;
        }
        if (fixed) repaired++;
      }
    }

    return repaired;
  }

  // ---- Private ----

  private async transition(
    id: string,
    to: TaskStatus,
    guard?: (task: Task) => void,
    reason?: string
  ): Promise<Task> {
    return this.locks.run(id, async () => {
      const { located, task } = await this.load(id);

      guard?.(task);

      if (!TRANSITIONS[task.status].includes(to)) {
        throw new TaskStoreError(
          "invalid_transition",
          `task ${id} cannot move ${task.status} → ${to}`,
          id
        );
      }

      const next: Task = {
        ...task,
        status: to,
        failureReason: to === "failed" ? reason ?? "unspecified" : task.failureReason,
        updatedAt: this.clock().toISOString(),
      };

      await this.move(located, next);
      this.logger.debug({ taskId: id, from: task.status, to }, "Task transitioned");
      return next;
    });
  }

  /**
   * Read a task, first finishing any interrupted move or claim it was left
   * in. A document another process moves while it is being read is looked up
   * again.
   */
  private async load(id: string): Promise<{ located: Located; task: Task }> {
    for (let attempt = 0; attempt < LOAD_ATTEMPTS; attempt++) {
      const located = await this.locate(id);
      if (!located) continue;
      const content = await readIfExists(located.path);
      if (content === null) continue;

      const settled = await this.settle(located, parseTaskDocument(content, located.file));
      if (settled) return settled;
    }
    throw new TaskStoreError("not_found", `task ${id} not found`, id);
  }

  /** Bring a document's header and partition back in line. Null if it vanished meanwhile. */
  private async settle(
    located: Located,
    task: Task
  ): Promise<{ located: Located; task: Task } | null> {
    if (task.status === located.status) return { located, task };

    if (located.status === "in_progress" && (task.status === "new" || task.status === "needs_action")) {
      const claimed: Task = { ...task, status: "in_progress" };
      await this.writeAtomic(this.partitionDir("in_progress"), located.file, serializeTask(claimed));
      this.logger.warn({ taskId: task.id, from: task.status }, "Recovered interrupted claim");
      return { located, task: claimed };
    }

    const target = join(this.partitionDir(task.status), located.file);
    try {
      await rename(located.path, target);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return null;
      throw err;
    }
    this.logger.warn(
      { taskId: task.id, from: located.status, to: task.status },
      "Recovered interrupted move"
    );
    return { located: { status: task.status, file: located.file, path: target }, task };
  }

  private async move(from: Located, next: Task): Promise<void> {
    await this.writeAtomic(this.partitionDir(from.status), from.file, serializeTask(next));
    if (next.status === from.status) return;
    try {
      await rename(from.path, join(this.partitionDir(next.status), from.file));
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        throw new TaskStoreError("conflict", `task ${next.id} was moved by another worker`, next.id);
      }
      throw err;
    }
  }

  /** Rename a raw intake document to `target`; only one worker can take it. */
  private async takeRaw(raw: RawIntake, target: string, taskId: string): Promise<void> {
    try {
      await rename(raw.path, target);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        throw new TaskStoreError("conflict", `intake document ${raw.file} was taken by another worker`, taskId);
      }
      throw err;
    }
  }

  private async locate(id: string): Promise<Located | null> {
    const prefix = `${id}__`;
    for (const status of TASK_STATUSES) {
      for (const file of await this.listFiles(status)) {
        if (file.startsWith(prefix) || file === `${id}.md`) {
          return { status, file, path: join(this.partitionDir(status), file) };
        }
      }
    }
    return null;
  }

  private async listFiles(status: TaskStatus): Promise<string[]> {
    try {
      const entries = await readdir(this.partitionDir(status));
      return entries
        .filter((name) => name.endsWith(".md") && !name.startsWith("."))
        .sort();
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return [];
      throw err;
    }
  }

  /** Temp names are unique per writer, so concurrent writers never share one. */
  private async writeAtomic(dir: string, file: string, content: string): Promise<void> {
    const tmpPath = join(dir, `.${file}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`);
    await writeFile(tmpPath, content, "utf-8");
    try {
      await rename(tmpPath, join(dir, file));
    } catch (err) {
      await unlink(tmpPath).catch((cleanupErr: unknown) => {
        this.logger.warn({ path: tmpPath, error: cleanupErr }, "Could not remove temp file");
      });
      throw err;
    }
  }

  private checkCounters(task: Task): void {
    const overflow = this.counterOverflow(task);
    if (overflow) {
      throw new TaskStoreError("invariant_violation", `task ${task.id}: ${overflow}`, task.id);
    }
  }

  private counterOverflow(task: Task): string | null {
    if (task.retryCount > this.options.maxRetries) return "retry_limit_exceeded";
    if (task.iterationCount > this.options.maxIterations) return "iteration_cap_exceeded";
    return null;
  }
}

export function taskFileName(task: Task): string {
  const description = task.payload.title || task.payload.text.slice(0, 60) || task.intent || "task";
  return `${task.id}__${slugify(description)}.md`;
}

/** Files can move between listing and reading; a vanished file reads as null. */
async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }
}

function guessSource(content: string): Task["source"] {
  try {
    const { meta } = parseFrontMatter(content);
    if (isTaskSource(meta.source)) return meta.source;
  } catch {
    // fall through: malformed header
  }
  return "inbox";
}
