export type TaskStoreErrorCode =
  | "duplicate_id"
  | "not_found"
  | "not_claimable"
  | "invalid_transition"
  | "invariant_violation"
  /** Another worker moved the document or holds its lease. */
  | "conflict";

export class TaskStoreError extends Error {
  constructor(
    readonly code: TaskStoreErrorCode,
    message: string,
    readonly taskId?: string
  ) {
    super(message);
    this.name = "TaskStoreError";
  }
}

/** Raised when a task document cannot be parsed or fails validation. */
export class TaskDocumentError extends Error {
  constructor(message: string, readonly file?: string) {
    super(message);
    this.name = "TaskDocumentError";
  }
}

export type FailureCategory = "transient" | "permanent";

/**
 * Failure reported by an external action. Carries an optional HTTP-like
 * status code and an explicit category hint from the collaborator.
 */
export class ActionError extends Error {
  readonly status?: number;
  readonly code?: string;
  readonly category?: FailureCategory;

  constructor(
    message: string,
    options: { status?: number; code?: string; category?: FailureCategory } = {}
  ) {
    super(message);
    this.name = "ActionError";
    this.status = options.status;
    this.code = options.code;
    this.category = options.category;
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** The `code` of a Node.js system error (`ENOENT`, `EEXIST`, ...). */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** Invalid configuration file, environment override or window string. */
export class ConfigError extends Error {
  constructor(message: string, readonly path?: string) {
    super(message);
    this.name = "ConfigError";
  }
}
