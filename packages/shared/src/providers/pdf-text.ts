/**
 * Local PDF Text Provider
 *
 * Reads the embedded text layer of a PDF with pdfjs-dist, rebuilding lines
 * from item positions. Plain-text and Markdown inputs pass through.
 * Scanned PDFs come out nearly empty and score low, which hands them to
 * the remote providers.
 */

import { ProviderRejectedError } from '../errors';
import { logger } from '../logger';
import { BaseConversionProvider } from './base-provider';
import type { ConversionDocument, RawConversion } from './types';

const TEXT_MIME_TYPES = ['text/plain', 'text/markdown'];

interface PositionedText {
  x: number;
  str: string;
}

type PdfJs = typeof import('pdfjs-dist');

let pdfjsLoader: Promise<PdfJs> | undefined;

function loadPdfJs(): Promise<PdfJs> {
  if (!pdfjsLoader) {
    pdfjsLoader = import('pdfjs-dist').then((pdfjsLib) => {
      pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/build/pdf.worker.js');
      return pdfjsLib;
    });
  }
  return pdfjsLoader;
}

/**
 * Group text items by Y position, top to bottom, each line left to right.
 */
export function buildLines(items: Array<{ x: number; y: number; str: string }>): string[] {
  const itemsByY = new Map<number, PositionedText[]>();

  for (const item of items) {
    if (item.str.trim() === '') continue;
    const y = Math.round(item.y);
    const line = itemsByY.get(y) ?? [];
    line.push({ x: Math.round(item.x), str: item.str });
    itemsByY.set(y, line);
  }

  return Array.from(itemsByY.keys())
    .sort((a, b) => b - a)
    .map((y) =>
      (itemsByY.get(y) ?? [])
        .sort((a, b) => a.x - b.x)
        .map((item) => item.str)
        .join(' ')
        .trim()
    )
    .filter((line) => line.length > 0);
}

/** The part of pdf.js' document proxy read here. */
export interface PdfDocumentLike {
  numPages: number;
  getPage(pageNumber: number): Promise<{
    getTextContent(): Promise<{ items: ReadonlyArray<{ str: string; transform: unknown[] } | { type: string }> }>;
  }>;
  destroy(): Promise<void>;
}

/**
 * Rebuilt text of every page. The document is destroyed afterwards, whether
 * or not reading succeeded.
 */
export async function readPageLines(pdf: PdfDocumentLike): Promise<string[]> {
  try {
    const pages: string[] = [];
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      const items: Array<{ x: number; y: number; str: string }> = [];
      for (const item of textContent.items) {
        if ('str' in item) {
          items.push({ x: Number(item.transform[4]), y: Number(item.transform[5]), str: item.str });
        }
      }

      pages.push(buildLines(items).join('\n'));
    }
    return pages;
  } finally {
    await pdf.destroy();
  }
}

export class PdfTextProvider extends BaseConversionProvider {
  readonly name = 'pdf-text';
  readonly kind = 'local' as const;
  protected readonly mimeTypes = ['application/pdf', ...TEXT_MIME_TYPES];

  protected async extract(document: ConversionDocument): Promise<RawConversion> {
    if (TEXT_MIME_TYPES.includes(document.mimeType)) {
      return { text: document.bytes.toString('utf-8'), pageCount: 1 };
    }
    return this.extractPdf(document);
  }

  private async extractPdf(document: ConversionDocument): Promise<RawConversion> {
    const pdfjsLib = await loadPdfJs();

    let pdf;
    try {
      pdf = await pdfjsLib.getDocument({ data: new Uint8Array(document.bytes) }).promise;
    } catch (error) {
      // pdf.js parse errors mean the bytes are not a readable PDF
      throw new ProviderRejectedError(this.name, error instanceof Error ? error.message : String(error), error);
    }

    const pages = await readPageLines(pdf);

    const text = pages.filter((pageText) => pageText.length > 0).join('\n\n');

    logger.debug('PDF text layer extracted', {
      filename: document.filename,
      pages: pdf.numPages,
      chars: text.length,
    });

    return { text, pageCount: pdf.numPages };
  }
}
