/**
 * Approval gate: decides whether a task needs explicit human confirmation
 * before it may run. Rules are evaluated in order, first match wins, and a
 * task no rule matches requires approval.
 */
import type { ApprovalRuleConfig, RuleCondition } from "../utils/config.js";
import { classificationText, containsKeyword, platformOf } from "./classifier.js";
import type { Task } from "./types.js";

export type ApprovalDecision = "require" | "auto_approve";

export interface ApprovalContext {
  /** Lower-cased senders the operator already trusts. */
  knownContacts: ReadonlySet<string>;
  /** `platform:action` pairs that already completed at least once. */
  completedActions: ReadonlySet<string>;
}

export interface ApprovalRule {
  name: string;
  decision: ApprovalDecision;
  matches: (task: Task, ctx: ApprovalContext) => boolean;
}

export type ApprovalPolicy = readonly ApprovalRule[];

export interface ApprovalVerdict {
  required: boolean;
  /** null when no rule matched and the default applied */
  rule: string | null;
}

export const DEFAULT_SENSITIVE_KEYWORDS = [
  "password",
  "payment",
  "invoice",
  "bank",
  "wire transfer",
  "contract",
  "refund",
];

export const DEFAULT_BATCH_LIMIT = 10;

export function evaluateApproval(
  task: Task,
  policy: ApprovalPolicy,
  ctx: ApprovalContext
): ApprovalVerdict {
  for (const rule of policy) {
    if (rule.matches(task, ctx)) {
      return { required: rule.decision === "require", rule: rule.name };
    }
  }
  return { required: true, rule: null };
}

export function requiresApproval(
  task: Task,
  policy: ApprovalPolicy,
  ctx: ApprovalContext
): boolean {
  return evaluateApproval(task, policy, ctx).required;
}

export function actionKey(task: Pick<Task, "source" | "payload" | "action">): string {
  return `${platformOf(task)}:${task.action ?? ""}`;
}

export function contactOf(task: Pick<Task, "payload">): string | null {
  const contact = task.payload.fields.contact ?? task.payload.fields.from;
  return contact ? contact.toLowerCase() : null;
}

export function compileCondition(
  condition: RuleCondition
): (task: Task, ctx: ApprovalContext) => boolean {
  switch (condition.type) {
    case "always":
      return () => true;
    case "new_contact":
      return (task, ctx) => {
        const contact = contactOf(task);
        return contact !== null && !ctx.knownContacts.has(contact);
      };
    case "first_action_on_platform":
      return (task, ctx) => !ctx.completedActions.has(actionKey(task));
    case "batch_size_over":
      return (task) => {
        const size = Number(task.payload.fields.batch_size ?? "1");
        return Number.isFinite(size) && size > condition.limit;
      };
    case "keyword_any":
      return (task) => {
        const text = classificationText(task).toLowerCase();
        return condition.keywords.some((kw) => containsKeyword(text, kw));
      };
    case "intent_in":
      return (task) => task.intent !== null && condition.intents.includes(task.intent);
    case "source_in":
      return (task) => condition.sources.includes(task.source);
    case "domain_is":
      return (task) => task.domain === condition.domain;
    case "priority_is":
      return (task) => task.priority === condition.priority;
  }
}

/** All conditions of a rule must hold for it to match. */
export function compileRule(rule: ApprovalRuleConfig): ApprovalRule {
  const predicates = rule.when.map(compileCondition);
  return {
    name: rule.name,
    decision: rule.decision,
    matches: (task, ctx) => predicates.every((p) => p(task, ctx)),
  };
}

export function compilePolicy(rules: readonly ApprovalRuleConfig[]): ApprovalPolicy {
  return rules.map(compileRule);
}

export const DEFAULT_POLICY_RULES: readonly ApprovalRuleConfig[] = [
  {
    name: "sensitive_keyword",
    when: [{ type: "keyword_any", keywords: DEFAULT_SENSITIVE_KEYWORDS }],
    decision: "require",
  },
  {
    name: "large_batch",
    when: [{ type: "batch_size_over", limit: DEFAULT_BATCH_LIMIT }],
    decision: "require",
  },
  {
    name: "first_action_on_platform",
    when: [{ type: "first_action_on_platform" }],
    decision: "require",
  },
  { name: "new_contact", when: [{ type: "new_contact" }], decision: "require" },
  {
    name: "low_priority_update",
    when: [
      { type: "intent_in", intents: ["update"] },
      { type: "priority_is", priority: "low" },
    ],
    decision: "auto_approve",
  },
];

export const DEFAULT_POLICY: ApprovalPolicy = compilePolicy(DEFAULT_POLICY_RULES);
