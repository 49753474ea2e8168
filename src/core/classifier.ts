import type { ClassifierConfig } from "../utils/config.js";
import type { Classification, Domain, Priority, Task, TaskSource } from "./types.js";

export interface IntentRule {
  intent: string;
  keywords: string[];
  priority: Priority;
}

export interface ClassificationRules {
  personalSources: readonly TaskSource[];
  businessSources: readonly TaskSource[];
  personalKeywords: readonly string[];
  businessKeywords: readonly string[];
  defaultDomain: Domain;
  intents: readonly IntentRule[];
  urgentKeywords: readonly string[];
}

export const FALLBACK_INTENT = "update";

export function rulesFromConfig(config: ClassifierConfig): ClassificationRules {
  return {
    personalSources: config.personal_sources,
    businessSources: config.business_sources,
    personalKeywords: config.personal_keywords,
    businessKeywords: config.business_keywords,
    defaultDomain: config.default_domain,
    intents: config.intents,
    urgentKeywords: config.urgent_keywords,
  };
}

/**
 * Rules-based task classification. Pure and deterministic.
 *
 * Domain:
 * 1. Source in a fixed personal/business set → that domain
 * 2. Ambiguous source → whichever keyword table has more hits in the content
 * 3. Tie → defaultDomain
 *
 * Intent: first intent rule with a keyword hit, else "update" at low priority.
 * Urgent keywords raise the priority to high.
 */
export function classify(
  source: TaskSource,
  content: string,
  rules: ClassificationRules
): Classification {
  const text = content.toLowerCase();

  const domain = classifyDomain(source, text, rules);

  let intent = FALLBACK_INTENT;
  let priority: Priority = "low";
  for (const rule of rules.intents) {
    if (rule.keywords.some((kw) => containsKeyword(text, kw))) {
      intent = rule.intent;
      priority = rule.priority;
      break;
    }
  }

  if (rules.urgentKeywords.some((kw) => containsKeyword(text, kw))) {
    priority = "high";
  }

  return { domain, intent, priority };
}

function classifyDomain(
  source: TaskSource,
  text: string,
  rules: ClassificationRules
): Domain {
  if (rules.personalSources.includes(source)) return "personal";
  if (rules.businessSources.includes(source)) return "business";

  const personalHits = countHits(text, rules.personalKeywords);
  const businessHits = countHits(text, rules.businessKeywords);

  if (businessHits > personalHits) return "business";
  if (personalHits > businessHits) return "personal";
  return rules.defaultDomain;
}

function countHits(text: string, keywords: readonly string[]): number {
  return keywords.filter((kw) => containsKeyword(text, kw)).length;
}

/**
 * Word-boundary match for alphanumeric keywords ("post" must not match
 * "postpone"); plain substring match for punctuation like "?" or "$".
 */
export function containsKeyword(text: string, keyword: string): boolean {
  const kw = keyword.toLowerCase();
  if (!kw) return false;
  if (!/^[a-z0-9][a-z0-9 '-]*[a-z0-9]$|^[a-z0-9]$/.test(kw)) {
    return text.includes(kw);
  }
  const escaped = kw.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(^|[^a-z0-9])${escaped}($|[^a-z0-9])`).test(text);
}

/** The text a task is classified on: title plus body. */
export function classificationText(task: Pick<Task, "payload">): string {
  return [task.payload.title, task.payload.text].filter(Boolean).join("\n");
}

/** Map an intent onto its ordered action steps. Unknown intents fall back to the "update" route. */
export function routeAction(
  intent: string,
  routes: Readonly<Record<string, readonly string[]>>
): readonly string[] {
  return routes[intent] ?? routes[FALLBACK_INTENT] ?? [];
}

/** The platform an action targets: an explicit `platform` field, else the source. */
export function platformOf(task: Pick<Task, "source" | "payload">): string {
  return task.payload.fields.platform ?? task.source;
}
