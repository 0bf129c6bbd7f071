/**
 * Conversion Quality Scorer
 *
 * Scores converted text in [0, 1] from four signals:
 * - length relative to the expected density for the page count
 * - ratio of recognized characters (letters incl. Portuguese diacritics,
 *   digits, whitespace, common punctuation)
 * - real-word density per non-empty line
 * - provider-native confidence, when the provider reports one
 *
 * Pure and deterministic. Never throws.
 */

import { logger } from '../logger';

export interface ProviderMetadata {
  pageCount?: number;
  providerConfidence?: number;
  provider?: string;
}

export interface QualityScore {
  score: number;
  warnings: string[];
  /** Provider confidence after clamping, if one was supplied */
  providerConfidence?: number;
}

export interface QualityScorerOptions {
  expectedCharsPerPage: number;
}

export const QUALITY_WARNINGS = {
  EMPTY_TEXT: 'empty_text',
  UNSCORABLE_INPUT: 'unscorable_input',
  PROVIDER_CONFIDENCE_OUT_OF_RANGE: 'provider_confidence_out_of_range',
  SCORE_OUT_OF_RANGE: 'score_out_of_range',
} as const;

/**
 * Bring a score reported by any provider into [0, 1]. A non-finite score
 * counts as 0.
 */
export function clampScore(score: number): { score: number; warning?: string } {
  if (!Number.isFinite(score)) return { score: 0, warning: QUALITY_WARNINGS.UNSCORABLE_INPUT };
  if (score < 0 || score > 1) {
    return { score: Math.min(1, Math.max(0, score)), warning: QUALITY_WARNINGS.SCORE_OUT_OF_RANGE };
  }
  return { score };
}

const WEIGHT_LENGTH = 0.3;
const WEIGHT_VALID_RATIO = 0.5;
const WEIGHT_WORD_DENSITY = 0.2;
const WEIGHT_TEXT = 0.6;
const WEIGHT_PROVIDER = 0.4;
const TARGET_WORDS_PER_LINE = 5;

const RECOGNIZED_CHAR = /[A-Za-z0-9À-ÖØ-öø-ÿ\s.,;:!?'"()[\]{}\-–—\/\\%$#@&*+=<>|_°ºª§“”‘’•…]/u;
const REAL_WORD = /[A-Za-zÀ-ÖØ-öø-ÿ]{2,}/gu;

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function lengthComponent(text: string, pageCount: number, expectedCharsPerPage: number): number {
  const pages = pageCount > 0 ? pageCount : 1;
  return clamp01(text.length / (expectedCharsPerPage * pages));
}

export function validCharRatio(text: string): number {
  if (text.length === 0) return 0;

  let recognized = 0;
  let total = 0;
  for (const ch of text) {
    total++;
    if (RECOGNIZED_CHAR.test(ch)) recognized++;
  }
  return recognized / total;
}

export function wordDensityComponent(text: string): number {
  const lines = text.split('\n').filter((line) => line.trim().length > 0);
  if (lines.length === 0) return 0;

  const words = text.match(REAL_WORD)?.length ?? 0;
  return Math.min(1, words / lines.length / TARGET_WORDS_PER_LINE);
}

export class QualityScorer {
  constructor(private readonly options: QualityScorerOptions) {}

  score(text: string, metadata: ProviderMetadata = {}): QualityScore {
    const warnings: string[] = [];
    const trimmed = text.trim();

    if (trimmed.length === 0) {
      return { score: 0, warnings: [QUALITY_WARNINGS.EMPTY_TEXT] };
    }

    const textScore =
      WEIGHT_LENGTH * lengthComponent(trimmed, metadata.pageCount ?? 1, this.options.expectedCharsPerPage) +
      WEIGHT_VALID_RATIO * validCharRatio(trimmed) +
      WEIGHT_WORD_DENSITY * wordDensityComponent(trimmed);

    let combined = textScore;
    let providerConfidence: number | undefined;

    if (metadata.providerConfidence !== undefined) {
      const raw = metadata.providerConfidence;
      if (!Number.isFinite(raw)) {
        return { score: 0, warnings: [...warnings, QUALITY_WARNINGS.UNSCORABLE_INPUT] };
      }
      if (raw < 0 || raw > 1) {
        warnings.push(QUALITY_WARNINGS.PROVIDER_CONFIDENCE_OUT_OF_RANGE);
        logger.warn('Provider confidence out of range, clamped', {
          provider: metadata.provider,
          provider_confidence: raw,
        });
      }
      providerConfidence = clamp01(raw);
      combined = WEIGHT_TEXT * textScore + WEIGHT_PROVIDER * providerConfidence;
    }

    if (!Number.isFinite(combined)) {
      return { score: 0, warnings: [...warnings, QUALITY_WARNINGS.UNSCORABLE_INPUT] };
    }

    return { score: clamp01(combined), warnings, providerConfidence };
  }
}
