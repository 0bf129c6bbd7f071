/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContextAsync,
  setContextStage,
  type RequestContext,
} from './context';

// Logger
export { logger, createLogger, type Logger, type LogContext, type LogLevel } from './logger';

// Errors
export {
  PipelineError,
  UnsupportedFormatError,
  DocumentTooLargeError,
  ProviderUnavailableError,
  ProviderRejectedError,
  MissingVariableError,
  ExtractionMalformedError,
  ConfigurationError,
  InvalidTransitionError,
  toProviderError,
  type PipelineErrorCode,
} from './errors';

// Config
export {
  config,
  loadConfig,
  validatePipelineConfig,
  thresholdFor,
  DEFAULT_MODEL_COSTS,
  DEFAULT_DOCUMENT_TYPES_PATH,
  MAX_TIMER_MS,
  type Config,
  type PipelineConfig,
  type ConversionStrategy,
} from './config';

// Types
export * from './types';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type DocumentReceivedJob,
  type DocumentCancelJob,
  getRedisConnection,
  createQueue,
  createWorker,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueMetricsGauge,
  jobsFinishedCounter,
  stageDurationHistogram,
  conversionAttemptsCounter,
  conversionScoreHistogram,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  llmTokensCounter,
  llmCostCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validateCatalogFile,
  validateExtractionRecord,
  buildRecordSchema,
  buildClassificationSchema,
  buildExtractionSchema,
  type CatalogFile,
  type CatalogTypeEntry,
  type CatalogFieldEntry,
  type JsonSchemaFormat,
  type ValidationResult,
} from './schemas';

// Catalog
export { DocumentTypeCatalog, catalogFromFile, parseCatalog, loadCatalog } from './catalog';

// Quality scoring
export {
  QualityScorer,
  QUALITY_WARNINGS,
  clampScore,
  lengthComponent,
  validCharRatio,
  wordDensityComponent,
  type ProviderMetadata,
  type QualityScore,
  type QualityScorerOptions,
} from './quality/scorer';

// Chunking
export {
  chunkText,
  splitIntoBodies,
  mergeChunkFields,
  buildClassificationPreview,
  OVERLAP_SEPARATOR,
  type ChunkingOptions,
  type TextChunk,
} from './chunking';

export { withTimeout } from './timeout';

// Prompt templates
export * from './templates';

// Conversion providers
export * from './providers';

// LLM gateway
export * from './llm';

// Collaborators
export type { PipelinePersistence } from './persistence';
export { NoopSimilarityStore, type SimilarityStore } from './similarity';

// Orchestration
export * from './pipeline';
