/**
 * Base Conversion Provider
 *
 * Common input checks, error mapping, timing, usage recording and quality
 * scoring around a provider-specific `extract` step.
 */

import { getContext, getCorrelationId } from '../context';
import { DocumentTooLargeError, UnsupportedFormatError, toProviderError } from '../errors';
import type { UsageSink } from '../llm/types';
import { logger } from '../logger';
import { llmCostCounter } from '../metrics';
import type { QualityScorer } from '../quality/scorer';
import type { ConversionResult } from '../types';
import type { ConversionDocument, ConversionProvider, ConversionUsage, ProviderKind, RawConversion } from './types';

export interface ProviderDependencies {
  scorer: QualityScorer;
  maxDocumentBytes: number;
  /** Receives a usage record for every billable conversion call */
  usageSink?: UsageSink;
}

/**
 * Lowercased MIME type without parameters ("Text/Plain; charset=utf-8" -> "text/plain")
 */
export function normalizeMimeType(mimeType: string): string {
  return (mimeType.split(';')[0] ?? '').trim().toLowerCase();
}

export abstract class BaseConversionProvider implements ConversionProvider {
  abstract readonly name: string;
  abstract readonly kind: ProviderKind;
  protected abstract readonly mimeTypes: readonly string[];

  constructor(protected readonly deps: ProviderDependencies) {}

  supports(mimeType: string): boolean {
    return this.mimeTypes.includes(normalizeMimeType(mimeType));
  }

  async convert(document: ConversionDocument): Promise<ConversionResult> {
    if (document.bytes.length > this.deps.maxDocumentBytes) {
      throw new DocumentTooLargeError(document.bytes.length, this.deps.maxDocumentBytes);
    }
    if (!this.supports(document.mimeType)) {
      throw new UnsupportedFormatError(document.mimeType, this.name);
    }

    const startTime = Date.now();
    let raw: RawConversion;
    try {
      raw = await this.extract({ ...document, mimeType: normalizeMimeType(document.mimeType) });
    } catch (error) {
      const mapped = toProviderError(error, this.name);
      logger.warn('Conversion provider failed', {
        provider: this.name,
        code: mapped.code,
        error: mapped.message,
      });

      const billedModel = this.billedModel();
      if (billedModel !== undefined) {
        await this.recordUsage({ model: billedModel, costUsd: 0 }, false, Date.now() - startTime);
      }
      throw mapped;
    }

    const durationMs = Date.now() - startTime;
    if (raw.usage) {
      await this.recordUsage(raw.usage, true, durationMs);
    }

    const quality = this.deps.scorer.score(raw.text, {
      pageCount: raw.pageCount,
      providerConfidence: raw.providerConfidence,
      provider: this.name,
    });

    return {
      text: raw.text,
      provider: this.name,
      score: quality.score,
      warnings: [...(raw.warnings ?? []), ...quality.warnings],
      providerConfidence: quality.providerConfidence,
      pageCount: raw.pageCount,
      durationMs,
    };
  }

  protected abstract extract(document: ConversionDocument): Promise<RawConversion>;

  /** Model billed for calls to this provider; undefined for free providers. */
  protected billedModel(): string | undefined {
    return undefined;
  }

  private async recordUsage(usage: ConversionUsage, success: boolean, durationMs: number): Promise<void> {
    llmCostCounter.inc({ model: usage.model, operation: 'conversion' }, usage.costUsd);

    const sink = this.deps.usageSink;
    if (!sink) return;

    try {
      await sink.appendUsageRecord({
        jobId: getContext()?.jobId,
        correlationId: getCorrelationId(),
        operation: 'conversion',
        provider: this.name,
        model: usage.model,
        inputTokens: usage.inputTokens ?? 0,
        outputTokens: usage.outputTokens ?? 0,
        pages: usage.pages,
        costUsd: usage.costUsd,
        success,
        durationMs,
        attempt: 1,
        createdAt: new Date().toISOString(),
      });
    } catch (sinkError) {
      logger.error('Failed to record conversion usage', sinkError, { provider: this.name, model: usage.model });
    }
  }
}
