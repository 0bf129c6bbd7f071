/**
 * OpenAI Vision Provider
 *
 * Sends the PDF (as a file part) or the image to a vision-capable chat model
 * and asks for a faithful Markdown transcription. Token spend is priced from
 * the model rate table.
 */

import type OpenAI from 'openai';
import { ProviderUnavailableError } from '../errors';
import { estimateCost } from '../llm/cost';
import type { ModelRateTable } from '../types';
import { BaseConversionProvider, type ProviderDependencies } from './base-provider';
import type { ConversionDocument, ConversionUsage, RawConversion } from './types';

const IMAGE_MIME_TYPES = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'];

export const OPENAI_VISION_MIME_TYPES = ['application/pdf', ...IMAGE_MIME_TYPES];

export const TRANSCRIPTION_PROMPT = `Transcreva integralmente o texto deste documento em Markdown.
Preserve a ordem de leitura, tabelas e quebras de linha. Não resuma, não traduza e não comente.`;

/** Token spend of one transcription, priced from the rate table. */
export function transcriptionUsage(
  response: { model?: string; usage?: { prompt_tokens: number; completion_tokens: number } },
  requestedModel: string,
  modelCosts: ModelRateTable
): ConversionUsage {
  const model = response.model || requestedModel;
  const inputTokens = response.usage?.prompt_tokens ?? 0;
  const outputTokens = response.usage?.completion_tokens ?? 0;
  const { costUsd } = estimateCost(model, inputTokens, outputTokens, modelCosts);
  return { model, inputTokens, outputTokens, costUsd };
}

export class OpenAiVisionProvider extends BaseConversionProvider {
  readonly name = 'openai-vision';
  readonly kind = 'remote' as const;
  protected readonly mimeTypes = OPENAI_VISION_MIME_TYPES;

  constructor(
    deps: ProviderDependencies,
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly modelCosts: ModelRateTable
  ) {
    super(deps);
  }

  protected async extract(document: ConversionDocument): Promise<RawConversion> {
    const base64 = document.bytes.toString('base64');
    const dataUrl = `data:${document.mimeType};base64,${base64}`;

    const attachment: OpenAI.Chat.ChatCompletionContentPart = IMAGE_MIME_TYPES.includes(document.mimeType)
      ? { type: 'image_url', image_url: { url: dataUrl, detail: 'high' } }
      : { type: 'file', file: { filename: document.filename ?? 'document.pdf', file_data: dataUrl } };

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        {
          role: 'user',
          content: [attachment, { type: 'text', text: TRANSCRIPTION_PROMPT }],
        },
      ],
      temperature: 0,
    });

    const content = response.choices[0]?.message?.content;
    if (content === null || content === undefined) {
      throw new ProviderUnavailableError(this.name, 'Empty transcription response');
    }

    return { text: content, usage: transcriptionUsage(response, this.model, this.modelCosts) };
  }

  protected billedModel(): string {
    return this.model;
  }
}
