import type { Logger } from "../utils/logger.js";
import type { AuditLog } from "./audit.js";
import type { TaskStore, RawIntake } from "./task-store.js";
import type { Lease, TaskLeases } from "./task-lease.js";
import type { RetryExecutor, ExecutionReporter } from "./retry-executor.js";
import type { CompletionLoop } from "./completion-loop.js";
import type { ErrorClassifierFn } from "./error-classifier.js";
import type { ApprovalContext, ApprovalPolicy } from "./approval-gate.js";
import type { ClassificationRules } from "./classifier.js";
import type { ActionInvoker, Task, TaskPayload, TaskSource } from "./types.js";
import { evaluateApproval, actionKey } from "./approval-gate.js";
import { classificationText, classify, routeAction } from "./classifier.js";
import { createActionStep, formatActionSteps } from "./action-step.js";
import { parseIntakeDocument } from "./task-document.js";
import { TaskDocumentError, TaskStoreError, toError } from "./errors.js";
import { isTerminal } from "./types.js";
import { withContext, createCorrelationId } from "./correlation.js";
import { generateTaskId } from "../utils/id.js";

export interface OrchestratorOptions {
  classifierRules: ClassificationRules;
  /** intent → ordered action steps */
  routes: Readonly<Record<string, readonly string[]>>;
  approvalPolicy: ApprovalPolicy;
  knownContacts: readonly string[];
  /** Environment override: approve everything without consulting the gate. */
  autoApproveAll: boolean;
  maxAttempts: number;
  baseDelayMs: number;
  classifyError?: ErrorClassifierFn;
  actionTimeoutMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  maxIterations: number;
  concurrency: number;
  clock?: () => Date;
}

export interface OrchestratorDeps {
  store: TaskStore;
  audit: AuditLog;
  invoker: ActionInvoker;
  executor: RetryExecutor;
  loop: CompletionLoop;
  /** Cross-process exclusion: one worker per task across every process on the vault. */
  leases: TaskLeases;
  logger: Logger;
}

export type ProcessOutcome =
  | "done"
  | "failed"
  | "awaiting_approval"
  /** Approval recorded; the next tick runs the task. */
  | "approved"
  | "requeued"
  | "skipped";

export interface ResolveApprovalOptions {
  actor?: string;
  /** Run the task right away once approved (default). Otherwise leave it to `tick`. */
  run?: boolean;
}

export interface SubmitInput {
  source: TaskSource;
  payload: Partial<TaskPayload> & Pick<TaskPayload, "text">;
  id?: string;
  createdAt?: Date;
}

export interface IngestSummary {
  adopted: Task[];
  quarantined: Task[];
}

export interface TickSummary extends IngestSummary {
  outcomes: Record<string, ProcessOutcome>;
}

/**
 * Drives tasks from intake to a terminal partition:
 * classify → approval gate → claim → completion loop (actions through the
 * retry executor) → done | failed. Tasks that need approval park in
 * needs_action until `resolveApproval` is called.
 *
 * Every mutation of a task happens under its lease, so a daemon and CLI
 * invocations can share a vault: whoever holds the lease works on the task,
 * everyone else skips it.
 */
export class Orchestrator {
  private inFlight = new Map<string, AbortController>();
  private running = new Set<Promise<ProcessOutcome>>();
  private stopping = false;
  private clock: () => Date;

  constructor(
    private deps: OrchestratorDeps,
    private options: OrchestratorOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /** Producer interface for in-process callers: create and enqueue a task. */
  async submit(input: SubmitInput): Promise<Task> {
    const createdAt = input.createdAt ?? this.clock();
    const task = this.newTask(input.id ?? generateTaskId(input.source, createdAt), input.source, createdAt, {
      title: input.payload.title ?? "",
      text: input.payload.text,
      fields: input.payload.fields ?? {},
    });
    await this.deps.store.enqueue(task);
    await this.deps.audit.record({
      taskId: task.id,
      eventType: "created",
      detail: `submitted via ${input.source}`,
      statusAfter: "new",
    });
    return task;
  }

  /** Adopt raw producer documents from the intake partition. */
  async ingest(): Promise<IngestSummary> {
    const summary: IngestSummary = { adopted: [], quarantined: [] };
    const { store, audit, logger } = this.deps;

    for (const raw of await store.listRaw()) {
      try {
        const doc = parseIntakeDocument(raw.content, raw.file);
        const createdAt = doc.createdAt ? new Date(doc.createdAt) : this.clock();
        const id = doc.id ?? generateTaskId(doc.source, createdAt);
        const task = this.newTask(id, doc.source, createdAt, doc.payload);
        await store.adopt(raw, task);
        await audit.record({
          taskId: task.id,
          eventType: "created",
          detail: `adopted ${raw.file} from ${doc.source}`,
          statusAfter: "new",
        });
        summary.adopted.push(task);
      } catch (err) {
        if (err instanceof TaskDocumentError) {
          await this.quarantine(raw, `malformed_document: ${err.message}`, summary);
        } else if (err instanceof TaskStoreError && err.code === "duplicate_id") {
          await this.quarantine(raw, `duplicate_id: ${err.message}`, summary);
        } else if (err instanceof TaskStoreError && err.code === "conflict") {
          logger.debug({ file: raw.file }, "Intake document taken by another worker");
        } else {
          logger.error({ file: raw.file, error: err }, "Failed to adopt intake document");
        }
      }
    }

    if (summary.adopted.length + summary.quarantined.length > 0) {
      logger.info(
        { adopted: summary.adopted.length, quarantined: summary.quarantined.length },
        "Intake processed"
      );
    }
    return summary;
  }

  /**
   * Move one task as far as it can go. Never throws: unexpected errors
   * fail the task and are recorded in the audit log.
   */
  async processTask(id: string): Promise<ProcessOutcome> {
    if (this.stopping || this.inFlight.has(id)) return "skipped";

    const controller = new AbortController();
    this.inFlight.set(id, controller);

    const run = withContext({ correlationId: createCorrelationId(), taskId: id }, async (): Promise<ProcessOutcome> => {
      let lease: Lease | null = null;
      try {
        lease = await this.deps.leases.acquire(id);
        if (!lease) {
          this.deps.logger.debug({ taskId: id }, "Task leased by another worker, skipping");
          return "skipped";
        }
        return await this.processInner(id, controller.signal);
      } catch (err) {
        return this.handleProcessingError(id, err);
      } finally {
        await lease?.release();
      }
    }).finally(() => {
      this.inFlight.delete(id);
      this.running.delete(run);
    });

    this.running.add(run);
    return run;
  }

  /**
   * Approval interface. `true` records the grant and, unless `run` is false,
   * resumes the task; `false` fails it with reason "approval_denied".
   */
  async resolveApproval(
    id: string,
    approved: boolean,
    options: ResolveApprovalOptions = {}
  ): Promise<ProcessOutcome> {
    const { store, audit, logger } = this.deps;
    const actor = options.actor ?? "operator";

    await this.withLease(id, async () => {
      const task = await store.require(id);
      if (task.status !== "needs_action") {
        throw new TaskStoreError(
          "invalid_transition",
          `task ${id} is not awaiting approval (status: ${task.status})`,
          id
        );
      }

      if (!approved) {
        await store.fail(id, "approval_denied");
        await audit.record({
          taskId: id,
          eventType: "approval_denied",
          detail: `denied by ${actor}`,
          statusAfter: "failed",
        });
        logger.info({ taskId: id, actor }, "Approval denied");
        return;
      }

      await store.update(id, { approved: true });
      await audit.record({
        taskId: id,
        eventType: "approval_granted",
        detail: `approved by ${actor}`,
        statusAfter: "needs_action",
      });
      logger.info({ taskId: id, actor }, "Approval granted");
    });

    if (!approved) return "failed";
    return options.run === false ? "approved" : this.processTask(id);
  }

  /** One polling pass: ingest, then process runnable tasks concurrently. */
  async tick(): Promise<TickSummary> {
    const ingested = await this.ingest();
    const { store } = this.deps;

    const runnable = [
      ...(await store.list("new")),
      ...(await store.list("needs_action")).filter((t) => t.approved === true || this.options.autoApproveAll),
    ].map((t) => t.id);

    const outcomes: Record<string, ProcessOutcome> = {};
    await mapWithConcurrency(runnable, this.options.concurrency, async (id) => {
      outcomes[id] = await this.processTask(id);
    });

    return { ...ingested, outcomes };
  }

  /**
   * Startup repair: finish interrupted moves and requeue tasks a previous
   * process left in_progress. A task whose lease a live process holds is
   * still running there and is left alone.
   */
  async recover(): Promise<number> {
    const { store, audit, logger } = this.deps;
    let repaired = await store.recover();

    for (const task of await store.list("in_progress")) {
      if (this.inFlight.has(task.id)) continue;
      const lease = await this.deps.leases.acquire(task.id);
      if (!lease) {
        logger.debug({ taskId: task.id }, "Task is running in another process, not requeued");
        continue;
      }
      try {
        await store.requeue(task.id);
        await audit.record({
          taskId: task.id,
          eventType: "moved",
          detail: "requeued after an interrupted run",
          statusAfter: "new",
        });
        logger.warn({ taskId: task.id }, "Requeued task left in_progress");
        repaired++;
      } finally {
        await lease.release();
      }
    }

    return repaired;
  }

  /** Cancel running loops and wait until their tasks are requeued. */
  async shutdown(): Promise<void> {
    this.stopping = true;
    for (const controller of this.inFlight.values()) {
      controller.abort();
    }
    await Promise.allSettled([...this.running]);
    this.deps.logger.info("Orchestrator stopped");
  }

  // ---- Private ----

  private async processInner(id: string, signal: AbortSignal): Promise<ProcessOutcome> {
    const { store, audit, logger } = this.deps;

    let task = await store.require(id);
    if (isTerminal(task.status) || task.status === "in_progress") {
      return "skipped";
    }

    if (task.domain === null) {
      const classification = classify(
        task.source,
        classificationText(task),
        this.options.classifierRules
      );
      const steps = routeAction(classification.intent, this.options.routes);
      task = await store.update(id, { ...classification, action: formatActionSteps(steps) });
      await audit.record({
        taskId: id,
        eventType: "classified",
        detail: `${classification.domain}/${classification.intent}/${classification.priority} → ${steps.join(" > ") || "no action"}`,
        statusAfter: task.status,
      });
    }

    if (task.status === "new" && task.requiresApproval === null) {
      if (this.options.autoApproveAll) {
        task = await store.update(id, { requiresApproval: false, approved: true });
        logger.warn({ taskId: id }, "Approval gate bypassed by AUTO_APPROVE_ALL override");
        await audit.record({
          taskId: id,
          eventType: "approval_granted",
          detail: "override: AUTO_APPROVE_ALL bypassed the approval gate",
          statusAfter: task.status,
        });
      } else {
        const verdict = evaluateApproval(task, this.options.approvalPolicy, await this.approvalContext());
        task = await store.update(id, { requiresApproval: verdict.required });
        if (!verdict.required) {
          await audit.record({
            taskId: id,
            eventType: "approval_granted",
            detail: `auto-approved by rule ${verdict.rule ?? "default"}`,
            statusAfter: task.status,
          });
        } else {
          return this.holdForApproval(task, verdict.rule ?? "default_deny");
        }
      }
    }

    if (task.requiresApproval === true && task.approved !== true) {
      if (this.options.autoApproveAll) {
        // Parked before the override was switched on
        task = await store.update(id, { approved: true });
        logger.warn({ taskId: id }, "AUTO_APPROVE_ALL override approved a task waiting for approval");
        await audit.record({
          taskId: id,
          eventType: "approval_granted",
          detail: "override: AUTO_APPROVE_ALL approved a waiting task",
          statusAfter: task.status,
        });
      } else if (task.status === "new") {
        return this.holdForApproval(task, "pending_approval");
      } else {
        return "awaiting_approval";
      }
    }

    task = await store.claim(id);
    return this.runLoop(task, signal);
  }

  private async holdForApproval(task: Task, rule: string): Promise<ProcessOutcome> {
    await this.deps.store.holdForApproval(task.id);
    await this.deps.audit.record({
      taskId: task.id,
      eventType: "approval_requested",
      detail: `rule: ${rule}`,
      statusAfter: "needs_action",
    });
    this.deps.logger.info(
      { taskId: task.id, rule, title: task.payload.title, action: task.action },
      "Approval needed: run `vaultflow approve <id>` or `vaultflow deny <id>`"
    );
    return "awaiting_approval";
  }

  private async runLoop(task: Task, signal: AbortSignal): Promise<ProcessOutcome> {
    const { store, audit, executor, loop, invoker, logger } = this.deps;

    const step = createActionStep({
      invoker,
      executor,
      execution: {
        maxAttempts: this.options.maxAttempts,
        baseDelayMs: this.options.baseDelayMs,
        classify: this.options.classifyError,
        timeoutMs: this.options.actionTimeoutMs,
        sleep: this.options.sleep,
      },
      reporterFor: (t) => this.reporterFor(t),
    });

    const result = await loop.run(task, step, {
      maxIterations: this.options.maxIterations,
      signal,
      onIteration: (t) =>
        store.update(t.id, { iterationCount: t.iterationCount, payload: t.payload }),
    });

    switch (result.outcome) {
      case "complete": {
        await store.complete(task.id);
        await audit.record({
          taskId: task.id,
          eventType: "success",
          detail: result.detail || `completed after ${result.iterations} iteration(s)`,
          statusAfter: "done",
        });
        logger.info({ taskId: task.id, iterations: result.iterations }, "Task completed");
        return "done";
      }
      case "fail": {
        if (result.task.status !== "failed") {
          await store.fail(task.id, result.reason);
        }
        await audit.record({
          taskId: task.id,
          eventType: "failure",
          detail: result.reason,
          statusAfter: "failed",
        });
        logger.warn({ taskId: task.id, reason: result.reason }, "Task failed");
        return "failed";
      }
      case "cancelled": {
        await store.requeue(task.id);
        await audit.record({
          taskId: task.id,
          eventType: "moved",
          detail: `cancelled after ${result.iterations} iteration(s); requeued`,
          statusAfter: "new",
        });
        return "requeued";
      }
    }
  }

  /** Per-attempt bookkeeping: retry_count on the task, failures and retries in the audit log. */
  private reporterFor(task: Task): ExecutionReporter {
    const { store, audit } = this.deps;
    return {
      onAttemptStart: async (attempt) => {
        await store.update(task.id, { retryCount: attempt });
      },
      onAttemptFailed: async ({ attempt, error, category }) => {
        await audit.record({
          taskId: task.id,
          eventType: "attempt",
          detail: `attempt ${attempt} failed (${category}): ${error.message}`,
          statusAfter: "in_progress",
        });
      },
      onRetryScheduled: async ({ attempt, delayMs }) => {
        await audit.record({
          taskId: task.id,
          eventType: "retry",
          detail: `retrying in ${delayMs}ms after attempt ${attempt}`,
          statusAfter: "in_progress",
        });
      },
    };
  }

  private async approvalContext(): Promise<ApprovalContext> {
    const done = await this.deps.store.list("done");
    return {
      knownContacts: new Set(this.options.knownContacts.map((c) => c.toLowerCase())),
      completedActions: new Set(done.map((t) => actionKey(t))),
    };
  }

  private async handleProcessingError(id: string, err: unknown): Promise<ProcessOutcome> {
    const { store, audit, logger } = this.deps;
    const error = toError(err);

    if (
      error instanceof TaskStoreError &&
      (error.code === "not_claimable" || error.code === "not_found" || error.code === "conflict")
    ) {
      logger.debug({ taskId: id, error: error.message }, "Task not processable, skipping");
      return "skipped";
    }

    logger.error({ taskId: id, error }, "Task processing failed");
    try {
      const task = await store.get(id);
      if (task && !isTerminal(task.status)) {
        await store.fail(id, `internal_error: ${error.message}`);
        await audit.record({
          taskId: id,
          eventType: "failure",
          detail: `internal_error: ${error.message}`,
          statusAfter: "failed",
        });
      }
    } catch (failErr) {
      logger.error({ taskId: id, error: failErr }, "Could not record task failure");
    }
    return "failed";
  }

  private async quarantine(raw: RawIntake, reason: string, summary: IngestSummary): Promise<void> {
    const { store, audit, logger } = this.deps;
    try {
      const task = await store.quarantine(raw, reason);
      await audit.record({
        taskId: task.id,
        eventType: "quarantined",
        detail: `${raw.file}: ${reason}`,
        statusAfter: "failed",
      });
      summary.quarantined.push(task);
    } catch (err) {
      if (err instanceof TaskStoreError && err.code === "conflict") {
        logger.debug({ file: raw.file }, "Intake document taken by another worker");
        return;
      }
      logger.error({ file: raw.file, error: err }, "Failed to quarantine intake document");
    }
  }

  /** Run `fn` holding the task's lease; `conflict` while another worker holds it. */
  private async withLease<T>(id: string, fn: () => Promise<T>): Promise<T> {
    const lease = await this.deps.leases.acquire(id);
    if (!lease) {
      throw new TaskStoreError("conflict", `task ${id} is being processed by another worker`, id);
    }
    try {
      return await fn();
    } finally {
      await lease.release();
    }
  }

  private newTask(id: string, source: TaskSource, createdAt: Date, payload: TaskPayload): Task {
    const now = this.clock().toISOString();
    return {
      id,
      source,
      domain: null,
      intent: null,
      priority: "low",
      status: "new",
      action: null,
      payload,
      retryCount: 0,
      iterationCount: 0,
      requiresApproval: null,
      approved: null,
      failureReason: null,
      createdAt: createdAt.toISOString(),
      updatedAt: now,
    };
  }
}

async function mapWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<void>
): Promise<void> {
  let next = 0;
  const worker = async () => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item !== undefined) await fn(item);
    }
  };
  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, worker));
}
