/**
 * LLM Cost Accounting
 *
 * Rates are USD per 1K tokens. Served model names often carry a date suffix
 * ("gpt-4o-mini-2024-07-18"), so the longest rate-table key that prefixes
 * the name is used.
 */

import { logger } from '../logger';
import type { ModelRate, ModelRateTable } from '../types';

export function findModelRate(model: string, table: ModelRateTable): ModelRate | undefined {
  const exact = table[model];
  if (exact) return exact;

  let best: string | undefined;
  for (const key of Object.keys(table)) {
    if (model.startsWith(key) && (best === undefined || key.length > best.length)) {
      best = key;
    }
  }
  return best === undefined ? undefined : table[best];
}

export interface CostEstimate {
  costUsd: number;
  known: boolean;
}

export function estimateCost(
  model: string,
  inputTokens: number,
  outputTokens: number,
  table: ModelRateTable
): CostEstimate {
  const rate = findModelRate(model, table);
  if (!rate) {
    logger.warn('No cost rate for model, recording zero cost', { model });
    return { costUsd: 0, known: false };
  }

  return {
    costUsd: (inputTokens / 1000) * rate.input + (outputTokens / 1000) * rate.output,
    known: true,
  };
}
