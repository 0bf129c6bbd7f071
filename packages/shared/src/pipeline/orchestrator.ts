/**
 * Pipeline Orchestrator
 *
 * Drives one document through conversion, quality-gated provider fallback,
 * classification and schema-validated extraction. Every stage failure ends
 * in a reviewable terminal state; `run` never throws.
 */

import { ulid } from 'ulid';
import type { DocumentTypeCatalog } from '../catalog';
import { chunkText, mergeChunkFields } from '../chunking';
import { thresholdFor, type PipelineConfig } from '../config';
import { getContext, runWithContextAsync, setContextStage } from '../context';
import {
  DocumentTooLargeError,
  ExtractionMalformedError,
  PipelineError,
  ProviderRejectedError,
  ProviderUnavailableError,
  UnsupportedFormatError,
  toProviderError,
} from '../errors';
import type { LlmGateway } from '../llm/gateway';
import { missingMandatoryFields } from '../llm/parsing';
import { logger } from '../logger';
import {
  conversionAttemptsCounter,
  conversionScoreHistogram,
  jobsFinishedCounter,
  stageDurationHistogram,
} from '../metrics';
import type { PipelinePersistence } from '../persistence/types';
import type { ConversionDocument, ConversionProvider } from '../providers/types';
import { clampScore } from '../quality/scorer';
import { validateExtractionRecord } from '../schemas';
import type { SimilarityStore } from '../similarity/types';
import { withTimeout } from '../timeout';
import type {
  ClassificationResult,
  ConversionAttempt,
  ConversionResult,
  DocumentInput,
  DocumentJob,
  DocumentTypeDescriptor,
  ExtractionRecord,
  FailureReason,
  JobOutcome,
  JobScores,
  JobState,
  LogDetail,
  SimilarExample,
} from '../types';
import { UNCLASSIFIED } from '../types';
import { assertTransition, isTerminal } from './state-machine';

export type OrchestratorConfig = Pick<
  PipelineConfig,
  | 'qualityAcceptanceThreshold'
  | 'providerThresholds'
  | 'conversionStrategy'
  | 'scoreTieEpsilon'
  | 'maxDocumentBytes'
  | 'providerTimeoutMs'
  | 'similarExamplesK'
  | 'similarityTimeoutMs'
  | 'chunkingThresholdChars'
  | 'maxChunkChars'
  | 'chunkOverlapChars'
>;

/** The part of the LLM gateway the orchestrator depends on. */
export type DocumentAnalyzer = Pick<LlmGateway, 'classify' | 'extract'>;

export interface PipelineOrchestratorOptions {
  /** Conversion providers in priority order */
  providers: readonly ConversionProvider[];
  analyzer: DocumentAnalyzer;
  catalog: DocumentTypeCatalog;
  persistence: PipelinePersistence;
  similarity: SimilarityStore;
  config: OrchestratorConfig;
  /** Checked at every state boundary */
  isCancelled?: (jobId: string) => boolean | Promise<boolean>;
}

/** Result of one provider attempt, before it is recorded on the job. */
export interface ProviderOutcome {
  provider: string;
  priority: number;
  attempt: ConversionAttempt;
  result?: ConversionResult;
  accepted: boolean;
}

interface JobRun {
  job: DocumentJob;
  bytes: Buffer;
  attempts: ConversionAttempt[];
  scores: JobScores;
  warnings: string[];
  documentType: string | null;
  conversion?: ConversionResult;
  extraction?: ExtractionRecord;
  missingMandatory: string[];
  finishedAt?: string;
}

const FAILURE_STATE_FOR: Readonly<Record<JobState, JobState | undefined>> = {
  received: 'conversion_failed',
  converting: 'conversion_failed',
  converted: 'classification_failed',
  classifying: 'classification_failed',
  classified: 'extraction_failed',
  extracting: 'extraction_failed',
  extracted: 'extraction_failed',
  completed: undefined,
  conversion_failed: undefined,
  classification_failed: undefined,
  extraction_failed: undefined,
  cancelled: undefined,
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Best result by score. Scores within `epsilon` of the best are treated as
 * equal and the provider earliest in priority order wins.
 */
export function selectBestConversion(
  outcomes: readonly ProviderOutcome[],
  epsilon: number
): ProviderOutcome | undefined {
  const scored = outcomes.filter((o) => o.result !== undefined);
  if (scored.length === 0) return undefined;

  const best = Math.max(...scored.map((o) => o.result?.score ?? 0));
  return scored
    .filter((o) => (o.result?.score ?? 0) >= best - epsilon)
    .reduce((winner, o) => (o.priority < winner.priority ? o : winner));
}

export class PipelineOrchestrator {
  private readonly providers: readonly ConversionProvider[];
  private readonly analyzer: DocumentAnalyzer;
  private readonly catalog: DocumentTypeCatalog;
  private readonly persistence: PipelinePersistence;
  private readonly similarity: SimilarityStore;
  private readonly config: OrchestratorConfig;
  private readonly isCancelled: (jobId: string) => boolean | Promise<boolean>;

  constructor(options: PipelineOrchestratorOptions) {
    this.providers = options.providers;
    this.analyzer = options.analyzer;
    this.catalog = options.catalog;
    this.persistence = options.persistence;
    this.similarity = options.similarity;
    this.config = options.config;
    this.isCancelled = options.isCancelled ?? (() => false);
  }

  async run(input: DocumentInput): Promise<JobOutcome> {
    const run = this.startRun(input, input.bytes);

    return this.inJobContext(run, async () => {
      logger.info('Job received', { mime_type: run.job.mimeType, size_bytes: run.job.sizeBytes, filename: run.job.filename });

      try {
        await this.persist(run, { mime_type: run.job.mimeType, size_bytes: run.job.sizeBytes });
        await this.execute(run);
      } catch (error) {
        await this.failUnexpectedly(run, error);
      }

      return this.outcomeOf(run);
    });
  }

  /**
   * Record a job whose raw bytes could not be read from the object store,
   * so it still ends in a reviewable terminal state.
   */
  async recordUnreadable(input: Omit<DocumentInput, 'bytes'>, error: unknown): Promise<JobOutcome> {
    const run = this.startRun(input, Buffer.alloc(0));

    return this.inJobContext(run, async () => {
      await this.persist(run, { mime_type: run.job.mimeType, raw_uri: run.job.rawUri });
      try {
        await this.fail(run, 'conversion_failed', 'raw_document_unavailable', errorMessage(error));
      } catch (failError) {
        logger.error('Could not record job failure', failError, { state: run.job.state });
      }
      return this.outcomeOf(run);
    });
  }

  private startRun(input: Omit<DocumentInput, 'bytes'>, bytes: Buffer): JobRun {
    const now = new Date().toISOString();
    const job: DocumentJob = {
      id: input.jobId ?? ulid(),
      correlationId: input.correlationId ?? getContext()?.correlationId ?? ulid(),
      callerId: input.callerId,
      mimeType: input.mimeType,
      filename: input.filename,
      rawUri: input.rawUri,
      sizeBytes: bytes.length,
      state: 'received',
      flags: [],
      createdAt: now,
      updatedAt: now,
    };

    return {
      job,
      bytes,
      attempts: [],
      scores: { conversion: [] },
      warnings: [],
      documentType: null,
      missingMandatory: [],
    };
  }

  private inJobContext<T>(run: JobRun, fn: () => Promise<T>): Promise<T> {
    const { job } = run;
    return runWithContextAsync(
      { correlationId: job.correlationId, jobId: job.id, callerId: job.callerId, stage: job.state },
      fn
    );
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  private async execute(run: JobRun): Promise<void> {
    if (await this.stopIfCancelled(run)) return;

    if (run.job.sizeBytes > this.config.maxDocumentBytes) {
      const error = new DocumentTooLargeError(run.job.sizeBytes, this.config.maxDocumentBytes);
      await this.fail(run, 'conversion_failed', 'document_too_large', error.message);
      return;
    }

    await this.moveTo(run, 'converting');
    const converted = await this.timed('conversion', () => this.convert(run));
    if (!converted || (await this.stopIfCancelled(run))) return;

    const conversion = run.conversion;
    if (!conversion) return;

    await this.moveTo(run, 'classifying');
    const descriptor = await this.timed('classification', () => this.classify(run, conversion.text));
    if (!descriptor || (await this.stopIfCancelled(run))) return;

    await this.moveTo(run, 'extracting');
    const record = await this.timed('extraction', () => this.extract(run, conversion.text, descriptor));
    if (!record || (await this.stopIfCancelled(run))) return;

    await this.complete(run, conversion.text, descriptor, record);
  }

  /**
   * Run the fallback chain. Returns false when the job was failed.
   */
  private async convert(run: JobRun): Promise<boolean> {
    const document: ConversionDocument = {
      bytes: run.bytes,
      mimeType: run.job.mimeType,
      filename: run.job.filename,
    };

    const candidates: ConversionProvider[] = [];
    for (const provider of this.providers) {
      if (provider.supports(run.job.mimeType)) {
        candidates.push(provider);
      } else {
        this.recordAttempt(run, {
          provider: provider.name,
          outcome: 'unsupported',
          threshold: thresholdFor(this.config, provider.name),
        });
      }
    }

    if (candidates.length === 0) {
      if (await this.stopIfCancelled(run)) return false;
      const error = new UnsupportedFormatError(run.job.mimeType);
      await this.fail(run, 'conversion_failed', 'unsupported_format', error.message);
      return false;
    }

    const outcomes =
      this.config.conversionStrategy === 'concurrent'
        ? await this.convertConcurrently(document, candidates)
        : await this.convertSequentially(document, candidates);

    for (const outcome of [...outcomes].sort((a, b) => a.priority - b.priority)) {
      this.recordAttempt(run, outcome.attempt);
      if (outcome.result) {
        run.scores.conversion.push({ provider: outcome.provider, score: outcome.result.score });
      }
    }

    if (await this.stopIfCancelled(run)) return false;

    const selected = outcomes.find((o) => o.accepted) ?? selectBestConversion(outcomes, this.config.scoreTieEpsilon);
    const result = selected?.result;
    if (!selected || !result) {
      const attempted = outcomes.map((o) => o.attempt.outcome);
      const reason: FailureReason =
        attempted.length > 0 && attempted.every((o) => o === 'unavailable')
          ? 'all_providers_unavailable'
          : attempted.every((o) => o === 'unsupported')
            ? 'unsupported_format'
            : 'no_conversion_result';
      await this.fail(run, 'conversion_failed', reason, `No usable conversion from ${candidates.length} provider(s)`);
      return false;
    }

    run.conversion = result;
    run.scores.selectedConversion = result.score;
    run.warnings.push(...result.warnings);

    if (!selected.accepted) {
      run.job.flags.push('low-confidence-conversion');
      logger.warn('Best conversion is below its acceptance threshold', {
        provider: result.provider,
        score: result.score,
        threshold: selected.attempt.threshold,
      });
    }

    await this.moveTo(run, 'converted', {
      provider: result.provider,
      score: result.score,
      page_count: result.pageCount,
      low_confidence: !selected.accepted,
    });
    return true;
  }

  private async convertSequentially(
    document: ConversionDocument,
    candidates: readonly ConversionProvider[]
  ): Promise<ProviderOutcome[]> {
    const outcomes: ProviderOutcome[] = [];

    for (const [priority, provider] of candidates.entries()) {
      const outcome = await this.attemptProvider(provider, priority, document);
      outcomes.push(outcome);
      if (outcome.accepted) break;
    }

    return outcomes;
  }

  /**
   * Start every candidate at once. The first result that meets its threshold
   * settles the stage; results arriving after that are discarded.
   */
  private convertConcurrently(
    document: ConversionDocument,
    candidates: readonly ConversionProvider[]
  ): Promise<ProviderOutcome[]> {
    const completed: ProviderOutcome[] = [];

    return new Promise((resolve) => {
      let settled = false;

      for (const [priority, provider] of candidates.entries()) {
        void this.attemptProvider(provider, priority, document).then((outcome) => {
          if (settled) {
            logger.debug('Discarding late conversion result', { provider: outcome.provider });
            return;
          }
          completed.push(outcome);
          if (outcome.accepted || completed.length === candidates.length) {
            settled = true;
            resolve(completed);
          }
        });
      }
    });
  }

  /** One provider call under timeout. Never rejects. */
  private async attemptProvider(
    provider: ConversionProvider,
    priority: number,
    document: ConversionDocument
  ): Promise<ProviderOutcome> {
    const threshold = thresholdFor(this.config, provider.name);

    try {
      const converted = await withTimeout(
        provider.convert(document),
        this.config.providerTimeoutMs,
        () => new ProviderUnavailableError(provider.name, `timed out after ${this.config.providerTimeoutMs}ms`)
      );
      const result = this.withValidScore(converted);
      const accepted = result.score >= threshold;

      conversionScoreHistogram.observe({ provider: provider.name }, result.score);
      logger.info('Conversion attempt scored', {
        provider: provider.name,
        score: result.score,
        threshold,
        accepted,
      });

      return {
        provider: provider.name,
        priority,
        result,
        accepted,
        attempt: {
          provider: provider.name,
          outcome: accepted ? 'accepted' : 'below_threshold',
          score: result.score,
          threshold,
        },
      };
    } catch (error) {
      const mapped = toProviderError(error, provider.name);
      const outcome: ConversionAttempt['outcome'] =
        mapped instanceof ProviderUnavailableError
          ? 'unavailable'
          : mapped instanceof UnsupportedFormatError
            ? 'unsupported'
            : 'rejected';

      logger.warn('Conversion attempt failed', { provider: provider.name, outcome, error: mapped.message });

      return {
        provider: provider.name,
        priority,
        accepted: false,
        attempt: { provider: provider.name, outcome, threshold, error: mapped.message },
      };
    }
  }

  private withValidScore(result: ConversionResult): ConversionResult {
    const { score, warning } = clampScore(result.score);
    if (warning === undefined) return result;

    logger.warn('Provider reported an invalid score', {
      provider: result.provider,
      reported: String(result.score),
      score,
    });
    return { ...result, score, warnings: [...result.warnings, warning] };
  }

  /**
   * Returns the classified descriptor, or undefined when the job was failed.
   */
  private async classify(run: JobRun, text: string): Promise<DocumentTypeDescriptor | undefined> {
    const examples = await this.similarExamples(run, text, undefined);

    let classification: ClassificationResult;
    try {
      classification = await this.analyzer.classify(text, this.catalog, examples);
    } catch (error) {
      if (await this.stopIfCancelled(run)) return undefined;
      await this.fail(run, 'classification_failed', this.llmFailureReason(error), errorMessage(error));
      return undefined;
    }

    if (await this.stopIfCancelled(run)) return undefined;

    run.scores.classificationConfidence = classification.confidence;
    run.documentType = classification.documentType;
    if (classification.approach === 'adaptive') {
      run.job.flags.push('adaptive-classification');
    }

    const descriptor = classification.descriptor;
    if (!descriptor || classification.documentType === UNCLASSIFIED) {
      run.documentType = UNCLASSIFIED;
      const reason: FailureReason =
        classification.unclassifiedReason === 'low_confidence' ? 'low_classification_confidence' : 'unclassified';
      const message = classification.rawLabel
        ? `Classified as ${classification.rawLabel} with confidence ${classification.confidence}, not accepted`
        : 'Document did not match any catalog type';
      await this.fail(run, 'classification_failed', reason, message);
      return undefined;
    }

    await this.moveTo(run, 'classified', {
      document_type: descriptor.name,
      confidence: classification.confidence,
      model: classification.model,
      approach: classification.approach,
      examples_used: classification.examplesUsed,
    });
    return descriptor;
  }

  /**
   * Returns the extracted record, or undefined when the job was failed.
   */
  private async extract(
    run: JobRun,
    text: string,
    descriptor: DocumentTypeDescriptor
  ): Promise<ExtractionRecord | undefined> {
    const examples = await this.similarExamples(run, text, descriptor.name);

    let record: ExtractionRecord;
    try {
      record = await this.extractRecord(text, descriptor, examples);
    } catch (error) {
      if (await this.stopIfCancelled(run)) return undefined;
      if (error instanceof ExtractionMalformedError) {
        run.job.flags.push('manual-review');
        await this.fail(run, 'extraction_failed', 'extraction_malformed', error.message, {
          attempts: error.attempts,
          response_preview: error.responsePreview,
        });
        return undefined;
      }
      await this.fail(run, 'extraction_failed', this.llmFailureReason(error), errorMessage(error));
      return undefined;
    }

    if (await this.stopIfCancelled(run)) return undefined;

    run.extraction = record;
    if (record.approach === 'adaptive') run.job.flags.push('adaptive-extraction');
    if (record.chunks > 1) run.job.flags.push('chunked-extraction');

    await this.moveTo(run, 'extracted', {
      document_type: record.documentType,
      attempts: record.attempts,
      chunks: record.chunks,
      missing_mandatory: record.missingMandatory,
      dropped_fields: record.droppedFields,
    });
    return record;
  }

  /**
   * Extract a text whole, or chunk by chunk above the chunking threshold.
   * Malformed chunks are skipped; all chunks malformed is a malformed extraction.
   */
  private async extractRecord(
    text: string,
    descriptor: DocumentTypeDescriptor,
    examples: readonly SimilarExample[]
  ): Promise<ExtractionRecord> {
    if (text.length <= this.config.chunkingThresholdChars) {
      return this.analyzer.extract(text, descriptor, examples);
    }

    const chunks = chunkText(text, {
      maxChunkChars: this.config.maxChunkChars,
      overlapChars: this.config.chunkOverlapChars,
    });
    logger.info('Extracting in chunks', { document_type: descriptor.name, chunks: chunks.length });

    const records: ExtractionRecord[] = [];
    let attempts = 0;
    let lastMalformed: ExtractionMalformedError | undefined;

    for (const chunk of chunks) {
      try {
        const record = await this.analyzer.extract(chunk.text, descriptor, examples);
        records.push(record);
        attempts += record.attempts;
      } catch (error) {
        if (!(error instanceof ExtractionMalformedError)) throw error;
        attempts += error.attempts;
        lastMalformed = error;
        logger.warn('Skipping malformed chunk', { chunk: chunk.index, attempts: error.attempts });
      }
    }

    const first = records[0];
    if (!first) {
      throw new ExtractionMalformedError(
        `All ${chunks.length} chunks of ${descriptor.name} returned malformed output`,
        attempts,
        lastMalformed?.rawResponse ?? ''
      );
    }

    const fields = mergeChunkFields(
      records.map((r) => r.fields),
      descriptor.schema.fields.map((f) => f.name)
    );

    return {
      documentType: descriptor.name,
      fields,
      missingMandatory: missingMandatoryFields(fields, descriptor),
      droppedFields: Array.from(new Set(records.flatMap((r) => r.droppedFields))),
      attempts,
      model: first.model,
      approach: first.approach,
      chunks: chunks.length,
    };
  }

  private async complete(
    run: JobRun,
    text: string,
    descriptor: DocumentTypeDescriptor,
    record: ExtractionRecord
  ): Promise<void> {
    const validation = validateExtractionRecord(record, descriptor);
    if (!validation.valid) {
      run.job.flags.push('manual-review');
      await this.fail(run, 'extraction_failed', 'schema_violation', 'Extraction record does not match its schema', {
        errors: validation.errors,
      });
      return;
    }

    run.missingMandatory = [...record.missingMandatory];
    if (record.missingMandatory.length > 0) {
      run.job.flags.push('partial-extraction');
    }

    await this.moveTo(run, 'completed', {
      document_type: record.documentType,
      missing_mandatory: record.missingMandatory,
      flags: run.job.flags,
    });

    if (record.missingMandatory.length === 0) {
      try {
        await this.similarity.index(text, record);
      } catch (error) {
        logger.error('Failed to index completed document', error, { document_type: record.documentType });
      }
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async similarExamples(
    run: JobRun,
    text: string,
    documentType: string | undefined
  ): Promise<SimilarExample[]> {
    if (this.config.similarExamplesK <= 0) return [];

    try {
      return await withTimeout(
        this.similarity.findSimilar(text, documentType, this.config.similarExamplesK),
        this.config.similarityTimeoutMs,
        () => new ProviderUnavailableError('similarity-store', `timed out after ${this.config.similarityTimeoutMs}ms`)
      );
    } catch (error) {
      logger.warn('Similar examples unavailable, using base prompt', {
        document_type: documentType,
        error: errorMessage(error),
      });
      run.warnings.push('similar_examples_unavailable');
      return [];
    }
  }

  private llmFailureReason(error: unknown): FailureReason {
    return error instanceof ProviderUnavailableError || error instanceof ProviderRejectedError
      ? 'llm_unavailable'
      : 'internal_error';
  }

  private recordAttempt(run: JobRun, attempt: ConversionAttempt): void {
    run.attempts.push(attempt);
    conversionAttemptsCounter.inc({ provider: attempt.provider, outcome: attempt.outcome });
  }

  private async timed<T>(stage: string, fn: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    try {
      return await fn();
    } finally {
      stageDurationHistogram.observe({ stage }, (Date.now() - startTime) / 1000);
    }
  }

  private async stopIfCancelled(run: JobRun): Promise<boolean> {
    if (isTerminal(run.job.state)) return false;

    let cancelled: boolean;
    try {
      cancelled = await this.isCancelled(run.job.id);
    } catch (error) {
      logger.error('Cancellation check failed, continuing', error, { state: run.job.state });
      return false;
    }
    if (!cancelled) return false;

    logger.info('Job cancelled', { state: run.job.state });
    run.job.failure = { reason: 'cancelled', message: 'Cancelled by request', stage: run.job.state };
    await this.moveTo(run, 'cancelled');
    return true;
  }

  private async fail(
    run: JobRun,
    state: JobState,
    reason: FailureReason,
    message: string,
    detail: LogDetail = {}
  ): Promise<void> {
    run.job.failure = { reason, message, stage: run.job.state };
    logger.warn('Job failed', { from: run.job.state, to: state, reason, error: message });
    await this.moveTo(run, state, { reason, message, ...detail });
  }

  private async failUnexpectedly(run: JobRun, error: unknown): Promise<void> {
    logger.error('Unexpected pipeline error', error, { state: run.job.state });

    const target = FAILURE_STATE_FOR[run.job.state];
    if (!target) return;

    try {
      await this.fail(run, target, 'internal_error', errorMessage(error), {
        code: error instanceof PipelineError ? error.code : undefined,
      });
    } catch (failError) {
      logger.error('Could not record job failure', failError, { state: run.job.state });
    }
  }

  private async moveTo(run: JobRun, to: JobState, detail: LogDetail = {}): Promise<void> {
    const from = run.job.state;
    assertTransition(from, to);

    run.job.state = to;
    run.job.updatedAt = new Date().toISOString();
    setContextStage(to);

    if (isTerminal(to)) {
      run.finishedAt = run.job.updatedAt;
      jobsFinishedCounter.inc({ state: to, reason: run.job.failure?.reason ?? 'none' });
    }

    logger.info('Job transition', { from, to });
    await this.persist(run, { from, ...detail });
  }

  /** Snapshot and log entry for the current state. Failures are logged only. */
  private async persist(run: JobRun, detail: LogDetail): Promise<void> {
    const job: DocumentJob = { ...run.job, flags: [...run.job.flags] };

    try {
      await this.persistence.save({
        job,
        outcome: isTerminal(job.state) ? this.outcomeOf(run) : undefined,
      });
    } catch (error) {
      logger.error('Failed to save job snapshot', error, { state: job.state });
    }

    try {
      await this.persistence.appendLog(job.correlationId, job.state, detail);
    } catch (error) {
      logger.error('Failed to append processing log', error, { state: job.state });
    }
  }

  private outcomeOf(run: JobRun): JobOutcome {
    const { job } = run;
    return {
      jobId: job.id,
      correlationId: job.correlationId,
      callerId: job.callerId,
      state: job.state,
      flags: [...job.flags],
      failure: job.failure,
      documentType: run.documentType,
      extraction: run.extraction,
      missingMandatoryFields: [...run.missingMandatory],
      scores: {
        conversion: [...run.scores.conversion],
        selectedConversion: run.scores.selectedConversion,
        classificationConfidence: run.scores.classificationConfidence,
      },
      conversionProvider: run.conversion?.provider,
      conversionAttempts: [...run.attempts],
      warnings: [...run.warnings],
      createdAt: job.createdAt,
      finishedAt: run.finishedAt ?? job.updatedAt,
    };
  }
}
