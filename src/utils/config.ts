import { readFileSync, existsSync } from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";
import { TASK_SOURCES } from "../core/types.js";
import { ConfigError } from "../core/errors.js";

const SourceSchema = z.enum(TASK_SOURCES);
const DomainSchema = z.enum(["personal", "business"]);
const PrioritySchema = z.enum(["low", "medium", "high"]);

const PartitionsSchema = z.object({
  new: z.string().default("Inbox"),
  needs_action: z.string().default("Needs_Action"),
  in_progress: z.string().default("In_Progress"),
  done: z.string().default("Done"),
  failed: z.string().default("Failed"),
});

const VaultConfigSchema = z.object({
  root: z.string().default("./vault"),
  partitions: PartitionsSchema.default({}),
  audit_file: z.string().default("Audit_Log.jsonl"),
  briefings_dir: z.string().default("Briefings"),
  /** Task lease lock files shared by every process on the vault. */
  leases_dir: z.string().default(".leases"),
});

const IntentRuleSchema = z.object({
  intent: z.string(),
  keywords: z.array(z.string()),
  priority: PrioritySchema,
});

const ClassifierConfigSchema = z.object({
  personal_sources: z.array(SourceSchema).default(["whatsapp"]),
  business_sources: z
    .array(SourceSchema)
    .default(["linkedin", "facebook", "instagram", "twitter"]),
  personal_keywords: z
    .array(z.string())
    .default(["family", "birthday", "dinner", "friend", "weekend", "mom", "dad", "vacation"]),
  business_keywords: z
    .array(z.string())
    .default(["launch", "client", "invoice", "campaign", "product", "customer", "meeting", "proposal", "post"]),
  default_domain: DomainSchema.default("personal"),
  intents: z.array(IntentRuleSchema).default([
    { intent: "post", keywords: ["post", "share", "tweet", "publish", "announce"], priority: "medium" },
    { intent: "request", keywords: ["please", "need", "send me", "could you send", "schedule"], priority: "medium" },
    { intent: "question", keywords: ["?", "what", "how", "when", "why"], priority: "low" },
  ]),
  urgent_keywords: z.array(z.string()).default(["urgent", "asap", "immediately", "deadline"]),
});

const RuleConditionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("always") }),
  z.object({ type: z.literal("new_contact") }),
  z.object({ type: z.literal("first_action_on_platform") }),
  z.object({ type: z.literal("batch_size_over"), limit: z.number().int().nonnegative() }),
  z.object({ type: z.literal("keyword_any"), keywords: z.array(z.string()) }),
  z.object({ type: z.literal("intent_in"), intents: z.array(z.string()) }),
  z.object({ type: z.literal("source_in"), sources: z.array(SourceSchema) }),
  z.object({ type: z.literal("domain_is"), domain: DomainSchema }),
  z.object({ type: z.literal("priority_is"), priority: PrioritySchema }),
]);

const ApprovalRuleSchema = z.object({
  name: z.string(),
  when: z.array(RuleConditionSchema).min(1),
  decision: z.enum(["require", "auto_approve"]),
});

const ApprovalConfigSchema = z.object({
  auto_approve_all: z.boolean().default(false),
  known_contacts: z.array(z.string()).default([]),
  /** Replaces the built-in policy when present. */
  rules: z.array(ApprovalRuleSchema).optional(),
});

const RetryConfigSchema = z.object({
  max_attempts: z.number().int().positive().default(3),
  base_delay_ms: z.number().int().nonnegative().default(2000),
  transient_patterns: z.array(z.string()).default([]),
  permanent_patterns: z.array(z.string()).default([]),
});

const LoopConfigSchema = z.object({
  max_iterations: z.number().int().positive().default(10),
});

const CommandSchema = z.object({
  command: z.string(),
  args: z.array(z.string()).default([]),
  timeout_ms: z.number().int().positive().default(120_000),
});

const ActionsConfigSchema = z.object({
  /** intent → ordered action steps */
  routes: z.record(z.array(z.string()).min(1)).default({
    post: ["social_post"],
    request: ["task"],
    question: ["reply"],
    update: ["archive"],
  }),
  commands: z.record(CommandSchema).default({}),
});

const OrchestratorConfigSchema = z.object({
  poll_cron: z.string().default("*/30 * * * * *"),
  concurrency: z.number().int().positive().default(4),
});

const ReportConfigSchema = z.object({
  cron: z.string().default("0 9 * * 0"),
  enabled: z.boolean().default(false),
  window: z.string().default("7d"),
  stale_after_hours: z.number().positive().default(48),
  revenue_keywords: z
    .array(z.string())
    .default(["payment", "revenue", "sale", "income", "profit", "invoice", "$"]),
  bottleneck_keywords: z
    .array(z.string())
    .default(["blocked", "stuck", "waiting", "issue", "error", "problem", "delay"]),
});

const AppConfigSchema = z.object({
  vault: VaultConfigSchema.default({}),
  classifier: ClassifierConfigSchema.default({}),
  approval: ApprovalConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  loop: LoopConfigSchema.default({}),
  actions: ActionsConfigSchema.default({}),
  orchestrator: OrchestratorConfigSchema.default({}),
  report: ReportConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ClassifierConfig = z.infer<typeof ClassifierConfigSchema>;
export type ApprovalRuleConfig = z.infer<typeof ApprovalRuleSchema>;
export type RuleCondition = z.infer<typeof RuleConditionSchema>;
export type CommandConfig = z.infer<typeof CommandSchema>;
export type PartitionsConfig = z.infer<typeof PartitionsSchema>;

/**
 * Load configuration from YAML file with environment variable overrides.
 * Env vars take precedence over YAML values.
 */
export function loadConfig(configPath?: string): AppConfig {
  const path = configPath ?? process.env.CONFIG_PATH ?? "./config/config.yaml";

  let rawConfig: Record<string, unknown> = {};

  if (existsSync(path)) {
    const fileContent = readFileSync(path, "utf-8");
    let loaded: unknown;
    try {
      loaded = yaml.load(fileContent);
    } catch (err) {
      throw new ConfigError(`Invalid YAML: ${err instanceof Error ? err.message : String(err)}`, path);
    }
    if (loaded && typeof loaded === "object" && !Array.isArray(loaded)) {
      rawConfig = { ...loaded };
    }
  }

  applyEnvOverrides(rawConfig, process.env);

  return parseConfig(rawConfig, path);
}

/** Validate an already-loaded object and fill in defaults. */
export function parseConfig(raw: unknown, path?: string): AppConfig {
  const result = AppConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`, path);
  }
  return result.data;
}

export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): void {
  if (env.VAULT_ROOT) ensureObject(config, "vault").root = env.VAULT_ROOT;

  if (env.AUTO_APPROVE_ALL !== undefined) {
    ensureObject(config, "approval").auto_approve_all =
      env.AUTO_APPROVE_ALL === "true" || env.AUTO_APPROVE_ALL === "1";
  }

  if (env.RETRY_MAX_ATTEMPTS) {
    ensureObject(config, "retry").max_attempts = parseInt(env.RETRY_MAX_ATTEMPTS, 10);
  }
  if (env.RETRY_BASE_DELAY_MS) {
    ensureObject(config, "retry").base_delay_ms = parseInt(env.RETRY_BASE_DELAY_MS, 10);
  }
  if (env.LOOP_MAX_ITERATIONS) {
    ensureObject(config, "loop").max_iterations = parseInt(env.LOOP_MAX_ITERATIONS, 10);
  }
  if (env.ORCHESTRATOR_CONCURRENCY) {
    ensureObject(config, "orchestrator").concurrency = parseInt(env.ORCHESTRATOR_CONCURRENCY, 10);
  }
}

function ensureObject(
  parent: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const existing = parent[key];
  if (existing && typeof existing === "object" && !Array.isArray(existing)) {
    const copy: Record<string, unknown> = { ...existing };
    parent[key] = copy;
    return copy;
  }
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}
