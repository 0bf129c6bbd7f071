/**
 * LLM Backend Registry
 *
 * Resolves the configured backend name once at startup. The resolved OpenAI
 * client is shared with the vision provider and the embedding store.
 */

import OpenAI, { AzureOpenAI } from 'openai';
import { ConfigurationError } from '../errors';
import { OpenAiBackend } from './openai-backend';
import type { LlmBackend } from './types';

export interface LlmBackendSettings {
  openaiApiKey: string;
  azureOpenaiEndpoint: string;
  azureOpenaiApiKey: string;
  azureOpenaiApiVersion: string;
  llmRequestTimeoutMs: number;
}

export interface ResolvedLlmBackend {
  backend: LlmBackend;
  client: OpenAI;
}

export type LlmBackendFactory = (settings: LlmBackendSettings) => ResolvedLlmBackend;

export class LlmBackendRegistry {
  private readonly factories = new Map<string, LlmBackendFactory>();

  register(name: string, factory: LlmBackendFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return Array.from(this.factories.keys());
  }

  /**
   * @throws ConfigurationError for an unknown backend name
   */
  resolve(name: string, settings: LlmBackendSettings): ResolvedLlmBackend {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new ConfigurationError(`Unknown LLM backend: ${name}`, { backend: name, known: this.names() });
    }
    return factory(settings);
  }
}

export function createDefaultLlmBackendRegistry(): LlmBackendRegistry {
  return new LlmBackendRegistry()
    .register('openai', (settings) => {
      if (!settings.openaiApiKey) {
        throw new ConfigurationError('LLM_BACKEND=openai requires OPENAI_API_KEY');
      }
      const client = new OpenAI({
        apiKey: settings.openaiApiKey,
        timeout: settings.llmRequestTimeoutMs,
        maxRetries: 0,
      });
      return { backend: new OpenAiBackend('openai', client), client };
    })
    .register('azure-openai', (settings) => {
      if (!settings.azureOpenaiEndpoint || !settings.azureOpenaiApiKey) {
        throw new ConfigurationError('LLM_BACKEND=azure-openai requires AZURE_OPENAI_ENDPOINT and AZURE_OPENAI_API_KEY');
      }
      const client = new AzureOpenAI({
        endpoint: settings.azureOpenaiEndpoint,
        apiKey: settings.azureOpenaiApiKey,
        apiVersion: settings.azureOpenaiApiVersion,
        timeout: settings.llmRequestTimeoutMs,
        maxRetries: 0,
      });
      return { backend: new OpenAiBackend('azure-openai', client), client };
    });
}
