/**
 * AsyncLocalStorage Context Management
 *
 * Propagates correlation, job and caller IDs through every stage of a
 * pipeline run so logs and ledger entries can be tied back to one document.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  jobId?: string;
  callerId?: string;
  stage?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Correlation ID of the current context, or a fresh ULID outside of one.
 */
export function getCorrelationId(): string {
  return getContext()?.correlationId || ulid();
}

export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Record the stage currently executing. No-op outside a context.
 */
export function setContextStage(stage: string): void {
  const context = getContext();
  if (context) {
    context.stage = stage;
  }
}
