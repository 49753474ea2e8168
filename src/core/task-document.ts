/**
 * Task documents: a YAML front matter block of key/value pairs followed by a
 * free-form markdown body. Producers write a minimal header (`source`,
 * `created`, often `status: pending`, sometimes their own `id`); the store
 * writes the full header.
 */
import yaml from "js-yaml";
import { z } from "zod";
import { TaskDocumentError } from "./errors.js";
import { TASK_SOURCES, TASK_STATUSES } from "./types.js";
import type { Task, TaskPayload, TaskSource } from "./types.js";

const FRONT_MATTER = /^---\r?\n([\s\S]*?)\r?\n---(?:\r?\n|$)/;

const Timestamp = z
  .union([z.string().min(1), z.date()])
  .transform((value, ctx) => {
    const date = value instanceof Date ? value : new Date(value);
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp: ${String(value)}` });
      return z.NEVER;
    }
    return date.toISOString();
  });

const FieldValue = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const Fields = z.record(FieldValue).default({});

const TaskHeaderSchema = z.object({
  id: z.string().min(1),
  source: z.enum(TASK_SOURCES),
  status: z.enum(TASK_STATUSES),
  domain: z.enum(["personal", "business"]).nullable().default(null),
  intent: z.string().nullable().default(null),
  priority: z.enum(["low", "medium", "high"]).default("low"),
  action: z.string().nullable().default(null),
  requires_approval: z.boolean().nullable().default(null),
  approved: z.boolean().nullable().default(null),
  retry_count: z.number().int().nonnegative().default(0),
  iteration_count: z.number().int().nonnegative().default(0),
  failure_reason: z.string().nullable().default(null),
  created_at: Timestamp,
  updated_at: Timestamp,
  fields: Fields,
});

/** Producer ids become part of a file name and are matched by their `<id>__` prefix. */
const ProducerId = z
  .union([z.string(), z.number().int().nonnegative()])
  .transform((value) => String(value))
  .pipe(
    z
      .string()
      .min(1)
      .max(128)
      .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, "only letters, digits, '.', '_' and '-' are allowed")
      .refine((id) => !id.includes("__"), "must not contain '__'")
  );

const IntakeHeaderSchema = z.object({
  id: ProducerId.optional(),
  source: z.enum(TASK_SOURCES),
  created: Timestamp.optional(),
  created_at: Timestamp.optional(),
  title: z.string().optional(),
  fields: Fields,
});

export interface FrontMatter {
  meta: Record<string, unknown>;
  body: string;
}

export interface IntakeDocument {
  /** The producer's own id, if it supplied one. */
  id: string | null;
  source: TaskSource;
  createdAt: string | null;
  payload: TaskPayload;
}

export function parseFrontMatter(raw: string, file?: string): FrontMatter {
  const match = raw.match(FRONT_MATTER);
  if (!match) {
    throw new TaskDocumentError("missing front matter block", file);
  }

  let loaded: unknown;
  try {
    loaded = yaml.load(match[1] ?? "");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TaskDocumentError(`invalid front matter: ${reason}`, file);
  }

  if (!loaded || typeof loaded !== "object" || Array.isArray(loaded)) {
    throw new TaskDocumentError("front matter is not a key/value block", file);
  }

  return { meta: { ...loaded }, body: raw.slice(match[0].length) };
}

/** Split a markdown body into its leading `# heading` and the remaining text. */
export function splitTitle(body: string): { title: string; text: string } {
  const trimmed = body.trim();
  const heading = trimmed.match(/^#\s+(.+)(?:\r?\n|$)/);
  if (!heading) return { title: "", text: trimmed };
  return {
    title: (heading[1] ?? "").trim(),
    text: trimmed.slice(heading[0].length).trim(),
  };
}

export function parseTaskDocument(raw: string, file?: string): Task {
  const { meta, body } = parseFrontMatter(raw, file);
  const result = TaskHeaderSchema.safeParse(meta);
  if (!result.success) {
    throw new TaskDocumentError(describeIssues(result.error), file);
  }

  const header = result.data;
  const { title, text } = splitTitle(body);

  return {
    id: header.id,
    source: header.source,
    domain: header.domain,
    intent: header.intent,
    priority: header.priority,
    status: header.status,
    action: header.action,
    payload: { title, text, fields: header.fields },
    retryCount: header.retry_count,
    iterationCount: header.iteration_count,
    requiresApproval: header.requires_approval,
    approved: header.approved,
    failureReason: header.failure_reason,
    createdAt: header.created_at,
    updatedAt: header.updated_at,
  };
}

/** Parse a document a producer dropped into the intake partition. */
export function parseIntakeDocument(raw: string, file?: string): IntakeDocument {
  const { meta, body } = parseFrontMatter(raw, file);
  const result = IntakeHeaderSchema.safeParse(meta);
  if (!result.success) {
    throw new TaskDocumentError(describeIssues(result.error), file);
  }

  const header = result.data;
  const { title, text } = splitTitle(body);

  return {
    id: header.id ?? null,
    source: header.source,
    createdAt: header.created_at ?? header.created ?? null,
    payload: { title: header.title ?? title, text, fields: header.fields },
  };
}

/**
 * A document in the intake partition whose header is not a complete task
 * header has not been adopted yet, whether or not the producer gave it an id.
 */
export function isRawIntake(raw: string): boolean {
  try {
    const { meta } = parseFrontMatter(raw);
    return !TaskHeaderSchema.safeParse(meta).success;
  } catch {
    // Unparseable documents are raw too; adoption quarantines them.
    return true;
  }
}

export function serializeTask(task: Task): string {
  const header = {
    id: task.id,
    source: task.source,
    status: task.status,
    domain: task.domain,
    intent: task.intent,
    priority: task.priority,
    action: task.action,
    requires_approval: task.requiresApproval,
    approved: task.approved,
    retry_count: task.retryCount,
    iteration_count: task.iterationCount,
    failure_reason: task.failureReason,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
    fields: task.payload.fields,
  };

  const front = yaml.dump(header, { lineWidth: -1, noRefs: true });
  const heading = task.payload.title ? `# ${task.payload.title}\n\n` : "";
  return `---\n${front}---\n\n${heading}${task.payload.text}\n`;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "document"}: ${issue.message}`)
    .join("; ");
}
