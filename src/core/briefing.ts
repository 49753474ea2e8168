import yaml from "js-yaml";
import type { TaskRef, WeeklySummary } from "./weekly-aggregator.js";

const LIST_LIMIT = 10;

/** `Weekly_Briefing_<end date>_<end time>_<window>.md`, one file per run. */
export function briefingFileName(summary: Pick<WeeklySummary, "end" | "window">): string {
  const date = summary.end.slice(0, 10);
  const time = summary.end.slice(11, 19).replace(/:/g, "");
  const window = summary.window.replace(/\s+/g, "").toLowerCase();
  return `Weekly_Briefing_${date}_${time}_${window}.md`;
}

/**
 * Markdown briefing with the structured summary in its front matter, so
 * the document can be read by people and parsed back by tools.
 */
export function renderBriefing(summary: WeeklySummary, generatedAt: Date): string {
  const frontMatter = yaml.dump(
    {
      type: "weekly_briefing",
      generated: generatedAt.toISOString(),
      window: summary.window,
      period_start: summary.start,
      period_end: summary.end,
      total_tasks: summary.totalTasks,
      by_status: summary.byStatus,
      by_domain: summary.byDomain,
      by_source: summary.bySource,
      stale_count: summary.stale.length,
      audit_entries: summary.audit.entries,
      retries: summary.audit.retries,
      failures: summary.audit.failures.length,
      revenue_items: summary.highlights.revenue.length,
      bottlenecks: summary.highlights.bottlenecks.length,
      recommendations: summary.recommendations,
    },
    { lineWidth: -1, noRefs: true }
  );

  const { byStatus } = summary;
  const lines: string[] = [
    "---",
    frontMatter.trimEnd(),
    "---",
    "",
    "# Weekly Briefing",
    "",
    `**Period:** ${summary.start.slice(0, 10)} to ${summary.end.slice(0, 10)} (${summary.window})`,
    "",
    "## Key Metrics",
    "",
    `- **Tasks in window:** ${summary.totalTasks}`,
    `- **Completed:** ${byStatus.done}`,
    `- **Failed:** ${byStatus.failed}`,
    `- **Awaiting approval:** ${byStatus.needs_action}`,
    `- **In progress:** ${byStatus.in_progress}`,
    `- **New:** ${byStatus.new}`,
    "",
    "## By Domain",
    "",
    ...counts(summary.byDomain),
    "",
    "## By Source",
    "",
    ...counts(summary.bySource),
    "",
    `## Stale Approvals (${summary.stale.length})`,
    "",
    ...(summary.stale.length > 0
      ? summary.stale
          .slice(0, LIST_LIMIT)
          .map((t) => `- ${t.id}: ${t.title} (waiting ${t.waitingHours}h)`)
      : [`*No tasks waiting longer than ${summary.staleAfterHours}h.*`]),
    "",
    "## Revenue",
    "",
    ...refs(summary.highlights.revenue, "*No revenue items identified.*"),
    "",
    "## Bottlenecks",
    "",
    ...refs(summary.highlights.bottlenecks, "*No bottlenecks identified.*"),
    "",
    "## Audit Activity",
    "",
    ...counts(summary.audit.byEventType),
    `- **Retries scheduled:** ${summary.audit.retries}`,
    "",
    "### Failures",
    "",
    ...(summary.audit.failures.length > 0
      ? summary.audit.failures
          .slice(0, LIST_LIMIT)
          .map((f) => `- ${f.taskId ?? "system"}: ${f.reason}`)
      : ["*No failures.*"]),
    "",
    "## Recommendations",
    "",
    ...summary.recommendations.map((r) => `- ${r}`),
    "",
  ];

  return lines.join("\n");
}

function counts(table: Record<string, number>): string[] {
  const entries = Object.entries(table).sort(([a], [b]) => a.localeCompare(b));
  if (entries.length === 0) return ["*None.*"];
  return entries.map(([key, count]) => `- ${key}: ${count}`);
}

function refs(items: TaskRef[], empty: string): string[] {
  if (items.length === 0) return [empty];
  return items.slice(0, LIST_LIMIT).map((t) => `- ${t.id}: ${t.title} (${t.status})`);
}
