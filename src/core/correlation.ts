/**
 * Per-task correlation context using AsyncLocalStorage.
 * Propagates correlationId and taskId through the async call stack so every
 * log line written while a task is processed carries them.
 */
import { AsyncLocalStorage } from "node:async_hooks";
import { generateEventId } from "../utils/id.js";

export interface RequestContext {
  correlationId: string;
  taskId?: string;
}

export const requestContext = new AsyncLocalStorage<RequestContext>();

export function withContext<T>(
  ctx: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return requestContext.run(ctx, fn);
}

export function getCurrentContext(): RequestContext | undefined {
  return requestContext.getStore();
}

export function createCorrelationId(): string {
  return generateEventId();
}
