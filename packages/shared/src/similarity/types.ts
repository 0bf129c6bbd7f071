/**
 * Similarity Store
 *
 * Source of previously processed documents used as prompt examples.
 */

import type { ExtractionRecord, SimilarExample } from '../types';

export interface SimilarityStore {
  /**
   * Up to `k` prior documents most similar to `text`, optionally restricted
   * to one document type.
   */
  findSimilar(text: string, documentType: string | undefined, k: number): Promise<SimilarExample[]>;

  /** Record a successfully extracted document for future lookups. */
  index(text: string, record: ExtractionRecord): Promise<void>;
}

/** Store used when adaptive prompting is disabled. */
export class NoopSimilarityStore implements SimilarityStore {
  async findSimilar(): Promise<SimilarExample[]> {
    return [];
  }

  async index(): Promise<void> {
    return;
  }
}
