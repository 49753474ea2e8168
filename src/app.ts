import { join, resolve } from "node:path";
import type { AppConfig } from "./utils/config.js";
import type { Logger } from "./utils/logger.js";
import { TaskStore } from "./core/task-store.js";
import { AuditLog } from "./core/audit.js";
import { TaskLeases } from "./core/task-lease.js";
import { ActionRegistry, createActionRegistry } from "./core/actions.js";
import { RetryExecutor } from "./core/retry-executor.js";
import { CompletionLoop } from "./core/completion-loop.js";
import { Orchestrator } from "./core/orchestrator.js";
import { WeeklyAggregator } from "./core/weekly-aggregator.js";
import { TaskScheduler } from "./core/scheduler.js";
import { rulesFromConfig } from "./core/classifier.js";
import { DEFAULT_POLICY, compilePolicy } from "./core/approval-gate.js";
import {
  composeClassifiers,
  defaultErrorClassifier,
  patternClassifier,
} from "./core/error-classifier.js";
import type { ActionInvoker } from "./core/types.js";

export interface App {
  config: AppConfig;
  store: TaskStore;
  audit: AuditLog;
  leases: TaskLeases;
  actions: ActionRegistry;
  orchestrator: Orchestrator;
  aggregator: WeeklyAggregator;
  scheduler: TaskScheduler;
}

export interface AppOverrides {
  /** Replaces the configured command actions. */
  invoker?: ActionInvoker;
  clock?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Wire the vault components from configuration. Nothing is started. */
export function createApp(config: AppConfig, logger: Logger, overrides: AppOverrides = {}): App {
  const root = resolve(config.vault.root);
  const clock = overrides.clock;

  const store = new TaskStore(
    {
      root,
      partitions: config.vault.partitions,
      maxRetries: config.retry.max_attempts,
      maxIterations: config.loop.max_iterations,
      clock,
    },
    logger
  );
  const audit = new AuditLog(join(root, config.vault.audit_file), logger, clock);
  const leases = new TaskLeases(join(root, config.vault.leases_dir), logger, clock);
  const actions = createActionRegistry(config.actions.commands, logger);

  const orchestrator = new Orchestrator(
    {
      store,
      audit,
      invoker: overrides.invoker ?? actions,
      executor: new RetryExecutor(logger),
      loop: new CompletionLoop(logger),
      leases,
      logger,
    },
    {
      classifierRules: rulesFromConfig(config.classifier),
      routes: config.actions.routes,
      approvalPolicy: config.approval.rules ? compilePolicy(config.approval.rules) : DEFAULT_POLICY,
      knownContacts: config.approval.known_contacts,
      autoApproveAll: config.approval.auto_approve_all,
      maxAttempts: config.retry.max_attempts,
      baseDelayMs: config.retry.base_delay_ms,
      classifyError: composeClassifiers(
        patternClassifier({
          transient: config.retry.transient_patterns,
          permanent: config.retry.permanent_patterns,
        }),
        defaultErrorClassifier
      ),
      sleep: overrides.sleep,
      maxIterations: config.loop.max_iterations,
      concurrency: config.orchestrator.concurrency,
      clock,
    }
  );

  const aggregator = new WeeklyAggregator(
    store,
    audit,
    {
      briefingsDir: join(root, config.vault.briefings_dir),
      staleAfterHours: config.report.stale_after_hours,
      revenueKeywords: config.report.revenue_keywords,
      bottleneckKeywords: config.report.bottleneck_keywords,
      clock,
    },
    logger
  );

  const scheduler = new TaskScheduler(logger, async (jobName, error) => {
    await audit.record({
      taskId: null,
      eventType: "job_failed",
      detail: `${jobName}: ${error.message}`,
      statusAfter: null,
    });
  });

  return { config, store, audit, leases, actions, orchestrator, aggregator, scheduler };
}

/** Register the poll pass and the periodic report with the scheduler. */
export function registerJobs(app: App): void {
  const { config, scheduler, orchestrator, aggregator } = app;

  scheduler.registerJob({
    name: "orchestrator.poll",
    cronExpression: config.orchestrator.poll_cron,
    handler: async () => {
      await orchestrator.tick();
    },
    description: "Ingest intake documents and process runnable tasks",
  });

  scheduler.registerJob(
    {
      name: "report.weekly",
      cronExpression: config.report.cron,
      handler: async () => {
        await aggregator.generate({ window: config.report.window });
      },
      description: "Write the periodic briefing",
    },
    { enabled: config.report.enabled }
  );
}
