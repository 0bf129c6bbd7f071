/**
 * Shared TypeScript Types
 *
 * Types for the document intake pipeline: jobs, conversion results,
 * the document-type catalog, classification and extraction records.
 */

// ============================================================================
// Sentinels
// ============================================================================

/** Label returned when a document cannot be assigned a catalog type. */
export const UNCLASSIFIED = 'unclassified' as const;

/** Value recorded for a schema field the document does not contain. */
export const NOT_FOUND = 'Não foi possível localizar este campo' as const;

export type Unclassified = typeof UNCLASSIFIED;

// ============================================================================
// Job Lifecycle
// ============================================================================

export type JobState =
  | 'received'
  | 'converting'
  | 'converted'
  | 'classifying'
  | 'classified'
  | 'extracting'
  | 'extracted'
  | 'completed'
  // Terminal-but-reviewable
  | 'conversion_failed'
  | 'classification_failed'
  | 'extraction_failed'
  | 'cancelled';

export type JobFlag =
  | 'low-confidence-conversion'
  | 'partial-extraction'
  | 'manual-review'
  | 'adaptive-classification'
  | 'adaptive-extraction'
  | 'chunked-extraction';

export type FailureReason =
  | 'unsupported_format'
  | 'document_too_large'
  | 'raw_document_unavailable'
  | 'all_providers_unavailable'
  | 'no_conversion_result'
  | 'unclassified'
  | 'low_classification_confidence'
  | 'llm_unavailable'
  | 'extraction_malformed'
  | 'schema_violation'
  | 'cancelled'
  | 'internal_error';

export interface JobFailure {
  reason: FailureReason;
  message: string;
  stage: JobState;
}

export interface DocumentInput {
  /** Stable job identifier (generated when absent) */
  jobId?: string;
  correlationId?: string;
  /** Opaque identity of the submitting caller */
  callerId: string;
  bytes: Buffer;
  mimeType: string;
  filename?: string;
  /** Object-store reference the bytes were read from, if any */
  rawUri?: string;
}

export interface DocumentJob {
  id: string;
  correlationId: string;
  callerId: string;
  mimeType: string;
  filename?: string;
  rawUri?: string;
  sizeBytes: number;
  state: JobState;
  flags: JobFlag[];
  failure?: JobFailure;
  createdAt: string;
  updatedAt: string;
}

// ============================================================================
// Conversion
// ============================================================================

export interface ConversionResult {
  /** Normalized text (markdown) */
  text: string;
  /** Name of the provider that produced the text */
  provider: string;
  /** Quality score in [0, 1] */
  score: number;
  warnings: string[];
  /** Provider-native confidence, clamped to [0, 1] */
  providerConfidence?: number;
  pageCount?: number;
  durationMs: number;
}

/** Outcome of one provider attempt, kept for the caller-facing result. */
export interface ConversionAttempt {
  provider: string;
  outcome: 'accepted' | 'below_threshold' | 'unavailable' | 'rejected' | 'unsupported';
  score?: number;
  threshold: number;
  error?: string;
}

// ============================================================================
// Document Type Catalog
// ============================================================================

export interface SchemaField {
  name: string;
  description: string;
  mandatory: boolean;
}

export interface ExtractionSchema {
  fields: readonly SchemaField[];
}

export interface DocumentTypeDescriptor {
  name: string;
  description: string;
  schema: ExtractionSchema;
}

// ============================================================================
// Classification & Extraction
// ============================================================================

export type PromptApproach = 'base' | 'adaptive';

export type UnclassifiedReason = 'model_unclassified' | 'unrecognized_label' | 'low_confidence';

export interface ClassificationResult {
  /** A catalog type name, or the unclassified sentinel */
  documentType: string;
  descriptor?: DocumentTypeDescriptor;
  /** Confidence in [0, 1] */
  confidence: number;
  model: string;
  approach: PromptApproach;
  examplesUsed: number;
  /** Label the model answered with, when it was rejected */
  rawLabel?: string;
  /** Why the result is unclassified; absent for a catalog type */
  unclassifiedReason?: UnclassifiedReason;
}

export interface ExtractionRecord {
  documentType: string;
  /** Field name -> value or NOT_FOUND; keys are exactly the schema's field names */
  fields: Record<string, string>;
  missingMandatory: string[];
  /** Keys the model returned that the schema does not declare */
  droppedFields: string[];
  /** LLM attempts spent (1 or 2 per chunk) */
  attempts: number;
  model: string;
  approach: PromptApproach;
  chunks: number;
}

// ============================================================================
// Similarity Examples
// ============================================================================

export interface SimilarExample {
  text: string;
  documentType: string;
  fields: Record<string, string>;
  similarity?: number;
}

// ============================================================================
// Usage / Cost Ledger
// ============================================================================

export type UsageOperation = 'conversion' | 'classification' | 'extraction' | 'embedding';

export interface UsageRecord {
  jobId?: string;
  correlationId: string;
  operation: UsageOperation;
  provider: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  /** Pages billed, for providers priced per page */
  pages?: number;
  costUsd: number;
  success: boolean;
  durationMs: number;
  attempt: number;
  createdAt: string;
}

export interface ModelRate {
  /** USD per 1K input tokens */
  input: number;
  /** USD per 1K output tokens */
  output: number;
}

export type ModelRateTable = Record<string, ModelRate>;

// ============================================================================
// Caller-facing Result
// ============================================================================

export interface JobScores {
  conversion: Array<{ provider: string; score: number }>;
  selectedConversion?: number;
  classificationConfidence?: number;
}

export interface JobOutcome {
  jobId: string;
  correlationId: string;
  callerId: string;
  state: JobState;
  flags: JobFlag[];
  failure?: JobFailure;
  documentType: string | null;
  extraction?: ExtractionRecord;
  missingMandatoryFields: string[];
  scores: JobScores;
  conversionProvider?: string;
  conversionAttempts: ConversionAttempt[];
  warnings: string[];
  createdAt: string;
  finishedAt: string;
}

/** Snapshot written to persistence on every transition. */
export interface JobSnapshot {
  job: DocumentJob;
  outcome?: JobOutcome;
}

export interface LogDetail {
  [key: string]: unknown;
}
