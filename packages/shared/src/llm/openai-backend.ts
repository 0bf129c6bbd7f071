/**
 * OpenAI Chat Completions Backend
 *
 * Serves both the public OpenAI API and Azure OpenAI deployments; the
 * difference lives entirely in the client handed to the constructor.
 */

import type OpenAI from 'openai';
import { ProviderUnavailableError, toProviderError } from '../errors';
import type { LlmBackend, LlmMessage, LlmRequest, LlmResponse } from './types';

function toMessageParam(message: LlmMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

export class OpenAiBackend implements LlmBackend {
  constructor(
    readonly name: string,
    private readonly client: OpenAI
  ) {}

  async complete(request: LlmRequest): Promise<LlmResponse> {
    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: request.model,
        messages: request.messages.map(toMessageParam),
        ...(request.responseFormat
          ? { response_format: { type: 'json_schema' as const, json_schema: request.responseFormat } }
          : {}),
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      });
    } catch (error) {
      throw toProviderError(error, this.name);
    }

    const content = response.choices[0]?.message?.content;
    if (content === null || content === undefined) {
      throw new ProviderUnavailableError(this.name, `Empty response from ${request.model}`);
    }

    return {
      content,
      model: response.model || request.model,
      inputTokens: response.usage?.prompt_tokens ?? 0,
      outputTokens: response.usage?.completion_tokens ?? 0,
      requestId: response.id,
    };
  }
}
