import { Cron } from "croner";
import type { Logger } from "../utils/logger.js";
import { toError } from "./errors.js";

export interface ScheduledJobDef {
  name: string;
  cronExpression: string;
  handler: () => Promise<void>;
  enabled?: boolean;
  description?: string;
}

export interface JobMetadata {
  name: string;
  cronExpression: string;
  description?: string;
  enabled: boolean;
  running: boolean;
  lastRun: Date | null;
  lastResult: "success" | "failure" | "skipped" | null;
  lastDurationMs: number | null;
  nextRun: Date | null;
}

/** Called once a job has failed its retry too. */
export type JobFailureHandler = (jobName: string, error: Error) => Promise<void>;

interface ManagedJob {
  def: ScheduledJobDef;
  cron: Cron | null;
  metadata: JobMetadata;
}

/**
 * Cron-based job scheduler using croner. Runs the orchestrator's poll pass
 * and the periodic report. A run that is still in progress when the next
 * tick fires is skipped, never overlapped.
 */
export class TaskScheduler {
  private jobs = new Map<string, ManagedJob>();

  constructor(
    private logger: Logger,
    private onJobFailed?: JobFailureHandler
  ) {}

  registerJob(
    def: ScheduledJobDef,
    configOverride?: { cron?: string; enabled?: boolean }
  ): void {
    const name = def.name;

    if (this.jobs.has(name)) {
      this.logger.warn({ job: name }, "Job already registered, replacing");
      this.removeJob(name);
    }

    const enabled = configOverride?.enabled ?? def.enabled ?? true;
    const cronExpression = configOverride?.cron ?? def.cronExpression;

    const metadata: JobMetadata = {
      name,
      cronExpression,
      description: def.description,
      enabled,
      running: false,
      lastRun: null,
      lastResult: null,
      lastDurationMs: null,
      nextRun: null,
    };

    const managed: ManagedJob = {
      def: { ...def, cronExpression, enabled },
      cron: null,
      metadata,
    };
    if (enabled) {
      this.start(managed);
    }
    this.jobs.set(name, managed);

    this.logger.info(
      { job: name, cron: cronExpression, enabled },
      "Scheduled job registered"
    );
  }

  removeJob(name: string): void {
    const managed = this.jobs.get(name);
    if (managed) {
      managed.cron?.stop();
      this.jobs.delete(name);
      this.logger.info({ job: name }, "Scheduled job removed");
    }
  }

  /**
   * Run a job now. A failing handler is retried once; if that fails too the
   * failure is logged and handed to the job failure handler.
   */
  async runJob(name: string): Promise<void> {
    const managed = this.jobs.get(name);
    if (!managed) {
      this.logger.warn({ job: name }, "Job not found for execution");
      return;
    }

    if (!managed.metadata.enabled) {
      this.logger.debug({ job: name }, "Skipping disabled job");
      return;
    }

    if (managed.metadata.running) {
      managed.metadata.lastResult = "skipped";
      this.logger.debug({ job: name }, "Previous run still in progress, skipping");
      return;
    }

    const startTime = Date.now();
    managed.metadata.running = true;
    managed.metadata.lastRun = new Date();

    try {
      await this.runWithRetry(managed);
    } finally {
      managed.metadata.running = false;
      managed.metadata.lastDurationMs = Date.now() - startTime;
      managed.metadata.nextRun = managed.cron?.nextRun() ?? null;
    }
  }

  toggleJob(
    name: string,
    enabled: boolean
  ): { previous: boolean; current: boolean } | null {
    const managed = this.jobs.get(name);
    if (!managed) return null;

    const previous = managed.metadata.enabled;
    managed.metadata.enabled = enabled;

    if (enabled && !managed.cron) {
      this.start(managed);
    } else if (!enabled && managed.cron) {
      managed.cron.stop();
      managed.cron = null;
      managed.metadata.nextRun = null;
    }

    return { previous, current: enabled };
  }

  listJobs(): JobMetadata[] {
    return Array.from(this.jobs.values()).map((j) => ({ ...j.metadata }));
  }

  shutdown(): void {
    for (const [name, managed] of this.jobs) {
      managed.cron?.stop();
      this.logger.debug({ job: name }, "Scheduled job stopped");
    }
    this.jobs.clear();
    this.logger.info("Job scheduler shut down");
  }

  private start(managed: ManagedJob): void {
    const name = managed.metadata.name;
    managed.cron = new Cron(managed.def.cronExpression, { catch: true }, async () => {
      await this.runJob(name);
    });
    managed.metadata.nextRun = managed.cron.nextRun() ?? null;
  }

  private async runWithRetry(managed: ManagedJob): Promise<void> {
    const name = managed.metadata.name;
    const maxAttempts = 2;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await managed.def.handler();
        managed.metadata.lastResult = "success";
        this.logger.debug({ job: name }, "Scheduled job completed");
        return;
      } catch (err) {
        if (attempt < maxAttempts) {
          this.logger.warn({ job: name, attempt, error: err }, "Scheduled job failed, retrying");
          continue;
        }

        managed.metadata.lastResult = "failure";
        this.logger.error({ job: name, error: err }, "Scheduled job failed after all retries");

        if (this.onJobFailed) {
          try {
            await this.onJobFailed(name, toError(err));
          } catch (handlerErr) {
            this.logger.error({ job: name, error: handlerErr }, "Job failure handler failed");
          }
        }
      }
    }
  }
}
