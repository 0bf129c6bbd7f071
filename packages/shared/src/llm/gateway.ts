/**
 * LLM Gateway
 *
 * Classification and field extraction over a pluggable backend. Every call
 * is timed out, metered, priced and reported to the usage sink.
 */

import type { DocumentTypeCatalog } from '../catalog';
import { buildClassificationPreview } from '../chunking';
import type { PipelineConfig } from '../config';
import { getContext, getCorrelationId } from '../context';
import { ExtractionMalformedError, ProviderUnavailableError } from '../errors';
import { logger } from '../logger';
import {
  llmCostCounter,
  llmRequestDurationHistogram,
  llmRequestsCounter,
  llmTokensCounter,
} from '../metrics';
import { buildClassificationSchema, buildExtractionSchema, type JsonSchemaFormat } from '../schemas';
import {
  CLASSIFICATION_SYSTEM_PROMPT,
  EXTRACTION_SYSTEM_PROMPT,
  STRICT_JSON_INSTRUCTION,
  formatFieldList,
  formatTypeDescriptions,
  formatTypeList,
  renderExamplesBlock,
  type PromptTemplateResolver,
} from '../templates';
import { withTimeout } from '../timeout';
import type {
  ClassificationResult,
  DocumentTypeDescriptor,
  ExtractionRecord,
  PromptApproach,
  SimilarExample,
  UsageOperation,
} from '../types';
import { NOT_FOUND, UNCLASSIFIED } from '../types';
import { estimateCost } from './cost';
import { normalizeExtractedFields, parseClassificationAnswer, parseJsonObject } from './parsing';
import type { LlmBackend, LlmMessage, LlmResponse, UsageSink } from './types';

export type LlmGatewayConfig = Pick<
  PipelineConfig,
  | 'llmModelClassification'
  | 'llmModelExtraction'
  | 'llmRequestTimeoutMs'
  | 'classificationConfidenceThreshold'
  | 'modelCosts'
  | 'similarExamplesK'
  | 'classificationPreviewChars'
>;

export interface LlmGatewayOptions {
  backend: LlmBackend;
  resolver: PromptTemplateResolver;
  usageSink: UsageSink;
  config: LlmGatewayConfig;
}

interface CallOutcome {
  response?: LlmResponse;
  error?: unknown;
}

export class LlmGateway {
  private readonly backend: LlmBackend;
  private readonly resolver: PromptTemplateResolver;
  private readonly usageSink: UsageSink;
  private readonly config: LlmGatewayConfig;

  constructor(options: LlmGatewayOptions) {
    this.backend = options.backend;
    this.resolver = options.resolver;
    this.usageSink = options.usageSink;
    this.config = options.config;
  }

  /**
   * Classify text into one catalog type or `unclassified`.
   * @throws ProviderUnavailableError / ProviderRejectedError when the backend fails
   */
  async classify(
    text: string,
    catalog: DocumentTypeCatalog,
    examples: readonly SimilarExample[] = []
  ): Promise<ClassificationResult> {
    const model = this.config.llmModelClassification;
    const selected = examples.slice(0, this.config.similarExamplesK);
    const approach: PromptApproach = selected.length > 0 ? 'adaptive' : 'base';

    const variables: Record<string, string> = {
      document_types: formatTypeList(catalog.descriptors),
      type_descriptions: formatTypeDescriptions(catalog.descriptors),
      document_text: buildClassificationPreview(text, this.config.classificationPreviewChars),
    };
    if (approach === 'adaptive') {
      variables.examples = renderExamplesBlock('classification', selected, this.config.similarExamplesK);
    }

    const prompt = this.resolver.render(`classification.${approach}`, variables);
    const response = await this.call(
      'classification',
      model,
      1,
      [
        { role: 'system', content: CLASSIFICATION_SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ],
      buildClassificationSchema(catalog.names)
    );

    const answer = parseClassificationAnswer(response.content);
    const base = { model: response.model, approach, examplesUsed: selected.length };

    if (answer.label === UNCLASSIFIED) {
      return {
        ...base,
        documentType: UNCLASSIFIED,
        confidence: answer.confidence,
        unclassifiedReason: 'model_unclassified',
      };
    }

    const descriptor = catalog.get(answer.label);
    if (!descriptor) {
      logger.warn('Classifier answered with a label outside the catalog', { label: answer.label });
      return {
        ...base,
        documentType: UNCLASSIFIED,
        confidence: 0,
        rawLabel: answer.label,
        unclassifiedReason: 'unrecognized_label',
      };
    }

    if (answer.confidence < this.config.classificationConfidenceThreshold) {
      logger.warn('Classification confidence below threshold, using unclassified', {
        classified_type: descriptor.name,
        confidence: answer.confidence,
        threshold: this.config.classificationConfidenceThreshold,
      });
      return {
        ...base,
        documentType: UNCLASSIFIED,
        confidence: answer.confidence,
        rawLabel: descriptor.name,
        unclassifiedReason: 'low_confidence',
      };
    }

    logger.info('Document classified', {
      document_type: descriptor.name,
      confidence: answer.confidence,
      approach,
    });

    return { ...base, documentType: descriptor.name, descriptor, confidence: answer.confidence };
  }

  /**
   * Extract the descriptor's fields from text. A response that is not a JSON
   * object is retried once with a strict-JSON instruction.
   * @throws ExtractionMalformedError after the retry also fails
   */
  async extract(
    text: string,
    descriptor: DocumentTypeDescriptor,
    examples: readonly SimilarExample[] = []
  ): Promise<ExtractionRecord> {
    const model = this.config.llmModelExtraction;
    const selected = examples.slice(0, this.config.similarExamplesK);
    const approach: PromptApproach = selected.length > 0 ? 'adaptive' : 'base';

    const variables: Record<string, string> = {
      document_type: descriptor.name,
      fields: formatFieldList(descriptor),
      not_found: NOT_FOUND,
      document_text: text,
    };
    if (approach === 'adaptive') {
      variables.examples = renderExamplesBlock('extraction', selected, this.config.similarExamplesK);
    }

    const prompt = this.resolver.render(`extraction.${approach}`, variables);
    const schema = buildExtractionSchema(descriptor);

    const systemMessage: LlmMessage = { role: 'system', content: EXTRACTION_SYSTEM_PROMPT };

    let lastContent = '';
    for (let attempt = 1; attempt <= 2; attempt++) {
      const userContent = attempt === 1 ? prompt : `${prompt}\n\n${STRICT_JSON_INSTRUCTION}`;

      const response = await this.call(
        'extraction',
        model,
        attempt,
        [systemMessage, { role: 'user', content: userContent }],
        schema,
        (r) => parseJsonObject(r.content) !== undefined
      );
      lastContent = response.content;

      const parsed = parseJsonObject(response.content);
      if (!parsed) {
        logger.warn('Extraction response is not a JSON object', {
          document_type: descriptor.name,
          attempt,
          preview: response.content.substring(0, 200),
        });
        continue;
      }

      const normalized = normalizeExtractedFields(parsed, descriptor);
      if (normalized.droppedFields.length > 0) {
        logger.debug('Dropped fields outside the schema', {
          document_type: descriptor.name,
          dropped: normalized.droppedFields,
        });
      }

      return {
        documentType: descriptor.name,
        fields: normalized.fields,
        missingMandatory: normalized.missingMandatory,
        droppedFields: normalized.droppedFields,
        attempts: attempt,
        model: response.model,
        approach,
        chunks: 1,
      };
    }

    throw new ExtractionMalformedError(
      `Extraction for ${descriptor.name} returned malformed output twice`,
      2,
      lastContent
    );
  }

  /**
   * One backend call under timeout, with metrics and a usage record.
   * `succeeded` decides whether a returned response counts as a success.
   */
  private async call(
    operation: UsageOperation,
    model: string,
    attempt: number,
    messages: LlmMessage[],
    responseFormat: JsonSchemaFormat,
    succeeded: (response: LlmResponse) => boolean = () => true
  ): Promise<LlmResponse> {
    const startTime = Date.now();
    const outcome: CallOutcome = {};

    try {
      outcome.response = await withTimeout(
        this.backend.complete({ model, messages, responseFormat, temperature: 0 }),
        this.config.llmRequestTimeoutMs,
        () => new ProviderUnavailableError(this.backend.name, `timed out after ${this.config.llmRequestTimeoutMs}ms`)
      );
      return outcome.response;
    } catch (error) {
      outcome.error = error;
      throw error;
    } finally {
      await this.record(operation, model, attempt, startTime, outcome, succeeded);
    }
  }

  private async record(
    operation: UsageOperation,
    requestedModel: string,
    attempt: number,
    startTime: number,
    outcome: CallOutcome,
    succeeded: (response: LlmResponse) => boolean
  ): Promise<void> {
    const durationMs = Date.now() - startTime;
    const response = outcome.response;
    const model = response?.model ?? requestedModel;
    const inputTokens = response?.inputTokens ?? 0;
    const outputTokens = response?.outputTokens ?? 0;
    const success = response !== undefined && succeeded(response);
    const { costUsd } = estimateCost(model, inputTokens, outputTokens, this.config.modelCosts);

    llmRequestsCounter.inc({ model: requestedModel, operation, status: success ? 'success' : 'error' });
    llmRequestDurationHistogram.observe({ model: requestedModel, operation }, durationMs / 1000);
    llmTokensCounter.inc({ model: requestedModel, direction: 'input' }, inputTokens);
    llmTokensCounter.inc({ model: requestedModel, direction: 'output' }, outputTokens);
    llmCostCounter.inc({ model: requestedModel, operation }, costUsd);

    if (outcome.error !== undefined) {
      logger.error('LLM request failed', outcome.error, { model: requestedModel, operation, attempt });
    }

    try {
      await this.usageSink.appendUsageRecord({
        jobId: getContext()?.jobId,
        correlationId: getCorrelationId(),
        operation,
        provider: this.backend.name,
        model,
        inputTokens,
        outputTokens,
        costUsd,
        success,
        durationMs,
        attempt,
        createdAt: new Date().toISOString(),
      });
    } catch (sinkError) {
      logger.error('Failed to record LLM usage', sinkError, { model, operation });
    }
  }
}
