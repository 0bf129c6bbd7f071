/**
 * AWS Textract Provider
 *
 * Remote OCR through the synchronous DetectDocumentText API. Text is the
 * LINE blocks in reading order; provider confidence is the mean block
 * confidence, rescaled from Textract's 0-100 to 0-1.
 */

import { DetectDocumentTextCommand, type DetectDocumentTextCommandOutput } from '@aws-sdk/client-textract';
import { BaseConversionProvider, type ProviderDependencies } from './base-provider';
import type { ConversionDocument, RawConversion } from './types';

export const AWS_TEXTRACT_MIME_TYPES = ['application/pdf', 'image/jpeg', 'image/png', 'image/tiff'];

export const TEXTRACT_MODEL = 'textract-detect-document-text';

export interface TextractClientLike {
  send(command: DetectDocumentTextCommand): Promise<DetectDocumentTextCommandOutput>;
}

export interface TextractBlockLike {
  BlockType?: string;
  Text?: string;
  Confidence?: number;
}

export function textFromBlocks(blocks: readonly TextractBlockLike[]): string {
  return blocks
    .filter((block) => block.BlockType === 'LINE' && block.Text)
    .map((block) => block.Text)
    .join('\n');
}

/**
 * Mean confidence over blocks that report one, or undefined when none do.
 */
export function meanBlockConfidence(blocks: readonly TextractBlockLike[]): number | undefined {
  const confidences = blocks
    .map((block) => block.Confidence)
    .filter((confidence): confidence is number => typeof confidence === 'number');

  if (confidences.length === 0) return undefined;
  return confidences.reduce((sum, c) => sum + c, 0) / confidences.length / 100;
}

export class AwsTextractProvider extends BaseConversionProvider {
  readonly name = 'aws-textract';
  readonly kind = 'remote' as const;
  protected readonly mimeTypes = AWS_TEXTRACT_MIME_TYPES;

  constructor(
    deps: ProviderDependencies,
    private readonly client: TextractClientLike,
    private readonly costPerPage: number
  ) {
    super(deps);
  }

  protected async extract(document: ConversionDocument): Promise<RawConversion> {
    const response = await this.client.send(new DetectDocumentTextCommand({ Document: { Bytes: document.bytes } }));
    const blocks = response.Blocks ?? [];
    const pageCount = response.DocumentMetadata?.Pages ?? blocks.filter((b) => b.BlockType === 'PAGE').length;
    const billedPages = Math.max(pageCount, 1);

    return {
      text: textFromBlocks(blocks),
      pageCount: pageCount > 0 ? pageCount : undefined,
      providerConfidence: meanBlockConfidence(blocks),
      usage: { model: TEXTRACT_MODEL, pages: billedPages, costUsd: billedPages * this.costPerPage },
    };
  }

  protected billedModel(): string {
    return TEXTRACT_MODEL;
  }
}
