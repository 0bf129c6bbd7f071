/**
 * Cancellation Requests
 *
 * Requests arrive on the document_cancel queue and are kept in a store every
 * worker replica reads, so the replica running the job sees them whichever
 * replica consumed the request. Requests expire after a TTL and are dropped
 * when their job finishes.
 */

import { logger } from '@docintake/shared';

export interface CancellationStore {
  /** Whether the job already reached a terminal state */
  isFinished(jobId: string): Promise<boolean>;
  request(jobId: string, expiresAt: Date): Promise<void>;
  /** Expiry of the pending request, if any */
  expiryOf(jobId: string): Promise<Date | undefined>;
  clear(jobId: string): Promise<void>;
}

export interface CancellationRegistryOptions {
  ttlMs: number;
  now?: () => Date;
}

export class CancellationRegistry {
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly store: CancellationStore,
    options: CancellationRegistryOptions
  ) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * @returns false when the job had already finished and the request was ignored
   */
  async cancel(jobId: string): Promise<boolean> {
    if (await this.store.isFinished(jobId)) {
      logger.info('Ignoring cancellation of finished job', { document_id: jobId });
      return false;
    }

    await this.store.request(jobId, new Date(this.now().getTime() + this.ttlMs));
    return true;
  }

  async isCancelled(jobId: string): Promise<boolean> {
    const expiresAt = await this.store.expiryOf(jobId);
    if (!expiresAt) return false;

    if (expiresAt.getTime() <= this.now().getTime()) {
      await this.store.clear(jobId);
      return false;
    }
    return true;
  }

  clear(jobId: string): Promise<void> {
    return this.store.clear(jobId);
  }
}
