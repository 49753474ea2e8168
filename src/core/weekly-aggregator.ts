import { mkdir, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "../utils/logger.js";
import type { AuditLog } from "./audit.js";
import type { TaskStore } from "./task-store.js";
import { classificationText, containsKeyword } from "./classifier.js";
import { briefingFileName, renderBriefing } from "./briefing.js";
import { ConfigError } from "./errors.js";
import type { Task, TaskStatus } from "./types.js";

const WINDOW_UNITS_MS = {
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
} as const;

/** "24h", "7d", "2w" → milliseconds. */
export function parseWindow(window: string): number {
  const match = window.trim().match(/^(\d+)\s*([hdw])$/i);
  const amount = match?.[1];
  const unit = match?.[2]?.toLowerCase();
  if (!amount || !(unit === "h" || unit === "d" || unit === "w") || Number(amount) === 0) {
    throw new ConfigError(`Invalid report window "${window}" (expected e.g. 24h, 7d, 2w)`);
  }
  return Number(amount) * WINDOW_UNITS_MS[unit];
}

export interface TaskRef {
  id: string;
  title: string;
  status: TaskStatus;
}

export interface StaleTask extends TaskRef {
  updatedAt: string;
  waitingHours: number;
}

export interface WeeklySummary {
  window: string;
  start: string;
  end: string;
  totalTasks: number;
  byStatus: Record<TaskStatus, number>;
  byDomain: Record<string, number>;
  bySource: Record<string, number>;
  stale: StaleTask[];
  staleAfterHours: number;
  audit: {
    entries: number;
    byEventType: Record<string, number>;
    retries: number;
    failures: Array<{ taskId: string | null; reason: string }>;
  };
  highlights: {
    revenue: TaskRef[];
    bottlenecks: TaskRef[];
  };
  recommendations: string[];
}

export interface WeeklyAggregatorOptions {
  briefingsDir: string;
  staleAfterHours: number;
  revenueKeywords: readonly string[];
  bottleneckKeywords: readonly string[];
  clock?: () => Date;
}

export interface RunOptions {
  window?: string;
  now?: Date;
}

/**
 * Read-only summary of the vault over a time window, rendered as a
 * briefing document. Nothing in the store is modified.
 */
export class WeeklyAggregator {
  private clock: () => Date;

  constructor(
    private store: TaskStore,
    private audit: AuditLog,
    private options: WeeklyAggregatorOptions,
    private logger: Logger
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async run(runOptions: RunOptions = {}): Promise<WeeklySummary> {
    const window = runOptions.window ?? "7d";
    const end = runOptions.now ?? this.clock();
    const start = new Date(end.getTime() - parseWindow(window));

    const all = await this.store.list();
    const inWindow = all.filter(
      (t) => isBetween(t.createdAt, start, end) || isBetween(t.updatedAt, start, end)
    );

    const byStatus: Record<TaskStatus, number> = {
      new: 0,
      needs_action: 0,
      in_progress: 0,
      done: 0,
      failed: 0,
    };
    const byDomain: Record<string, number> = {};
    const bySource: Record<string, number> = {};
    for (const task of inWindow) {
      byStatus[task.status]++;
      const domain = task.domain ?? "unclassified";
      byDomain[domain] = (byDomain[domain] || 0) + 1;
      bySource[task.source] = (bySource[task.source] || 0) + 1;
    }

    // Stale approvals are reported whether or not they fall inside the window.
    const staleMs = this.options.staleAfterHours * WINDOW_UNITS_MS.h;
    const stale: StaleTask[] = all
      .filter((t) => t.status === "needs_action")
      .filter((t) => end.getTime() - Date.parse(t.updatedAt) > staleMs)
      .map((t) => ({
        ...ref(t),
        updatedAt: t.updatedAt,
        waitingHours: Math.floor((end.getTime() - Date.parse(t.updatedAt)) / WINDOW_UNITS_MS.h),
      }));

    const entries = await this.audit.read({ since: start, until: end });
    const byEventType: Record<string, number> = {};
    for (const entry of entries) {
      byEventType[entry.eventType] = (byEventType[entry.eventType] || 0) + 1;
    }
    const failures = entries
      .filter((e) => e.eventType === "failure" || e.eventType === "quarantined")
      .map((e) => ({ taskId: e.taskId, reason: e.detail }));

    const revenue = inWindow
      .filter((t) => this.matchesAny(classificationText(t), this.options.revenueKeywords))
      .map(ref);
    const bottlenecks = inWindow
      .filter(
        (t) =>
          this.matchesAny(classificationText(t), this.options.bottleneckKeywords) ||
          (t.status === "failed" &&
            this.matchesAny(t.failureReason ?? "", this.options.bottleneckKeywords))
      )
      .map(ref);

    const summary: WeeklySummary = {
      window,
      start: start.toISOString(),
      end: end.toISOString(),
      totalTasks: inWindow.length,
      byStatus,
      byDomain,
      bySource,
      stale,
      staleAfterHours: this.options.staleAfterHours,
      audit: {
        entries: entries.length,
        byEventType,
        retries: byEventType.retry ?? 0,
        failures,
      },
      highlights: { revenue, bottlenecks },
      recommendations: [],
    };
    summary.recommendations = recommend(summary);

    this.logger.info(
      { window, tasks: summary.totalTasks, stale: stale.length, auditEntries: entries.length },
      "Weekly summary computed"
    );
    return summary;
  }

  /** Write the briefing and record a `report_generated` audit entry. Returns the file path. */
  async writeBriefing(summary: WeeklySummary): Promise<string> {
    const dir = this.options.briefingsDir;
    await mkdir(dir, { recursive: true });

    const file = briefingFileName(summary);
    const path = join(dir, file);
    const tmpPath = join(dir, `.${file}.tmp`);
    await writeFile(tmpPath, renderBriefing(summary, this.clock()), "utf-8");
    await rename(tmpPath, path);

    await this.audit.record({
      taskId: null,
      eventType: "report_generated",
      detail: `${file} (${summary.window}, ${summary.totalTasks} tasks)`,
      statusAfter: null,
    });
    this.logger.info({ path }, "Briefing written");
    return path;
  }

  async generate(runOptions: RunOptions = {}): Promise<{ summary: WeeklySummary; path: string }> {
    const summary = await this.run(runOptions);
    const path = await this.writeBriefing(summary);
    return { summary, path };
  }

  private matchesAny(text: string, keywords: readonly string[]): boolean {
    const lower = text.toLowerCase();
    return keywords.some((kw) => containsKeyword(lower, kw));
  }
}

export function recommend(summary: WeeklySummary): string[] {
  const recommendations: string[] = [];
  const bottlenecks = summary.highlights.bottlenecks.length;
  const pending = summary.byStatus.needs_action;
  const intake = summary.byStatus.new;
  const completed = summary.byStatus.done;

  if (bottlenecks > 0) {
    recommendations.push(`Address ${bottlenecks} bottleneck(s)`);
  }
  if (summary.stale.length > 0) {
    recommendations.push(
      `Resolve ${summary.stale.length} approval(s) waiting longer than ${summary.staleAfterHours}h`
    );
  }
  if (pending > 5) {
    recommendations.push(`${pending} tasks pending review`);
  }
  if (intake > 10) {
    recommendations.push("High intake volume: process pending messages");
  }
  if (completed > 0) {
    recommendations.push(`${completed} task(s) completed in this window`);
  }
  if (recommendations.length === 0) {
    recommendations.push("All systems operating normally");
  }
  return recommendations;
}

function ref(task: Task): TaskRef {
  return { id: task.id, title: task.payload.title || task.id, status: task.status };
}

function isBetween(iso: string, start: Date, end: Date): boolean {
  const at = Date.parse(iso);
  return at >= start.getTime() && at <= end.getTime();
}
