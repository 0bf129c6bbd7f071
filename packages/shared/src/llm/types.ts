/**
 * LLM Backend Types
 */

import type { JsonSchemaFormat } from '../schemas';
import type { UsageRecord } from '../types';

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmRequest {
  model: string;
  messages: LlmMessage[];
  /** OpenAI Structured Outputs schema, when the backend supports it */
  responseFormat?: JsonSchemaFormat;
  temperature?: number;
}

export interface LlmResponse {
  content: string;
  /** Model that actually served the request (may carry a date suffix) */
  model: string;
  inputTokens: number;
  outputTokens: number;
  requestId?: string;
}

/**
 * A chat-completion capable backend. Transient failures and timeouts reject
 * with ProviderUnavailableError; request-level rejections with ProviderRejectedError.
 */
export interface LlmBackend {
  readonly name: string;
  complete(request: LlmRequest): Promise<LlmResponse>;
}

/**
 * Receives one record per LLM call. Failures are logged by the caller, never propagated.
 */
export interface UsageSink {
  appendUsageRecord(record: UsageRecord): Promise<void>;
}
