/**
 * LLM Gateway and Backends
 */

export type { LlmBackend, LlmMessage, LlmRequest, LlmResponse, UsageSink } from './types';
export { OpenAiBackend } from './openai-backend';
export {
  LlmBackendRegistry,
  createDefaultLlmBackendRegistry,
  type LlmBackendFactory,
  type LlmBackendSettings,
  type ResolvedLlmBackend,
} from './registry';
export { estimateCost, findModelRate, type CostEstimate } from './cost';
export {
  PLAIN_ANSWER_CONFIDENCE,
  stripCodeFences,
  parseJsonObject,
  parseClassificationAnswer,
  normalizeFieldValue,
  normalizeExtractedFields,
  missingMandatoryFields,
  type ClassificationAnswer,
  type NormalizedFields,
} from './parsing';
export { LlmGateway, type LlmGatewayConfig, type LlmGatewayOptions } from './gateway';
