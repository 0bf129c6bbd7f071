/**
 * Azure AI Document Intelligence Provider
 *
 * Remote OCR for scanned PDFs and images via the prebuilt read model.
 * Provider confidence is the mean word confidence across all pages. Spend is
 * priced per analyzed page.
 */

import { BaseConversionProvider, type ProviderDependencies } from './base-provider';
import type { ConversionDocument, RawConversion } from './types';

export const AZURE_DOCUMENT_INTELLIGENCE_MIME_TYPES = [
  'application/pdf',
  'image/jpeg',
  'image/png',
  'image/bmp',
  'image/tiff',
  'image/heif',
];

/** Subset of the SDK's AnalyzeResult this provider reads. */
export interface ReadResultLike {
  content?: string;
  pages?: Array<{
    lines?: Array<{ content: string }>;
    words?: Array<{ confidence: number }>;
  }>;
}

/** The part of the SDK's DocumentAnalysisClient this provider calls. */
export interface DocumentAnalysisClientLike {
  beginAnalyzeDocument(modelId: string, document: Buffer): Promise<{ pollUntilDone(): Promise<ReadResultLike> }>;
}

export function textFromReadResult(result: ReadResultLike): string {
  const pages = result.pages ?? [];
  const fromLines = pages
    .map((page) => (page.lines ?? []).map((line) => line.content).join('\n'))
    .filter((pageText) => pageText.length > 0)
    .join('\n\n');

  return fromLines.length > 0 ? fromLines : (result.content ?? '');
}

/**
 * Mean word confidence, or undefined when the service reported no words.
 */
export function meanWordConfidence(result: ReadResultLike): number | undefined {
  let total = 0;
  let count = 0;
  for (const page of result.pages ?? []) {
    for (const word of page.words ?? []) {
      total += word.confidence;
      count++;
    }
  }
  return count > 0 ? total / count : undefined;
}

export class AzureDocumentIntelligenceProvider extends BaseConversionProvider {
  readonly name = 'azure-document-intelligence';
  readonly kind = 'remote' as const;
  protected readonly mimeTypes = AZURE_DOCUMENT_INTELLIGENCE_MIME_TYPES;

  constructor(
    deps: ProviderDependencies,
    private readonly client: DocumentAnalysisClientLike,
    private readonly modelId: string,
    private readonly costPerPage: number
  ) {
    super(deps);
  }

  protected async extract(document: ConversionDocument): Promise<RawConversion> {
    const poller = await this.client.beginAnalyzeDocument(this.modelId, document.bytes);
    const result = await poller.pollUntilDone();
    const pages = Math.max(result.pages?.length ?? 0, 1);

    return {
      text: textFromReadResult(result),
      pageCount: result.pages?.length,
      providerConfidence: meanWordConfidence(result),
      usage: { model: this.modelId, pages, costUsd: pages * this.costPerPage },
    };
  }

  protected billedModel(): string {
    return this.modelId;
  }
}
