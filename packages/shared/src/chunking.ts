/**
 * Text Chunking
 *
 * Long documents are extracted chunk by chunk: paragraph-aligned bodies of at
 * most `maxChunkChars`, each preceded by the tail of the previous body so a
 * field split across the boundary is still readable. Classification reads a
 * head/middle/tail preview instead of the whole text.
 */

import { NOT_FOUND } from './types';

export const OVERLAP_SEPARATOR = '\n...\n';
const PARAGRAPH_SEPARATOR = '\n\n';
const PREVIEW_SEPARATOR = '\n...\n';

export interface ChunkingOptions {
  maxChunkChars: number;
  overlapChars: number;
}

export interface TextChunk {
  index: number;
  /** Text sent to extraction: overlap (if any) + body */
  text: string;
  /** This chunk's own slice of the document */
  body: string;
}

function hardSplit(paragraph: string, maxChars: number): string[] {
  const pieces: string[] = [];
  for (let start = 0; start < paragraph.length; start += maxChars) {
    pieces.push(paragraph.slice(start, start + maxChars));
  }
  return pieces;
}

/**
 * Pack paragraphs greedily into bodies of at most `maxChars`.
 * A paragraph longer than `maxChars` on its own is cut into fixed slices.
 */
export function splitIntoBodies(text: string, maxChars: number): string[] {
  const bodies: string[] = [];
  let current = '';

  for (const paragraph of text.split(PARAGRAPH_SEPARATOR)) {
    const pieces = paragraph.length > maxChars ? hardSplit(paragraph, maxChars) : [paragraph];

    for (const piece of pieces) {
      const candidate = current ? current + PARAGRAPH_SEPARATOR + piece : piece;
      if (candidate.length <= maxChars) {
        current = candidate;
        continue;
      }
      if (current.trim()) bodies.push(current.trim());
      current = piece;
    }
  }

  if (current.trim()) bodies.push(current.trim());
  return bodies;
}

export function chunkText(text: string, options: ChunkingOptions): TextChunk[] {
  if (text.length <= options.maxChunkChars) {
    return [{ index: 0, text, body: text }];
  }

  const bodies = splitIntoBodies(text, options.maxChunkChars);

  return bodies.map((body, index) => {
    const previous = bodies[index - 1];
    if (previous === undefined || options.overlapChars <= 0) {
      return { index, text: body, body };
    }
    const overlap = previous.slice(-options.overlapChars);
    return { index, text: overlap + OVERLAP_SEPARATOR + body, body };
  });
}

/**
 * Field-wise merge of per-chunk extractions. The first found value wins,
 * except that a longer value found later replaces a shorter one.
 */
export function mergeChunkFields(
  chunkFields: ReadonlyArray<Record<string, string>>,
  fieldNames: readonly string[]
): Record<string, string> {
  const merged: Record<string, string> = {};

  for (const name of fieldNames) {
    let value: string = NOT_FOUND;
    for (const fields of chunkFields) {
      const candidate = fields[name];
      if (candidate === undefined || candidate === NOT_FOUND) continue;
      if (value === NOT_FOUND || candidate.length > value.length) {
        value = candidate;
      }
    }
    merged[name] = value;
  }

  return merged;
}

/**
 * Text shown to the classifier. Up to `previewChars` as-is; a text longer
 * than 2.5x that is sampled at head, middle and tail (0.4x each), anything
 * in between is cut to its head.
 */
export function buildClassificationPreview(text: string, previewChars: number): string {
  if (text.length <= previewChars) return text;

  if (text.length > previewChars * 2.5) {
    const sample = Math.floor(previewChars * 0.4);
    const middleStart = Math.floor(text.length / 2 - sample / 2);
    return [
      text.slice(0, sample),
      text.slice(middleStart, middleStart + sample),
      text.slice(-sample),
    ].join(PREVIEW_SEPARATOR);
  }

  return text.slice(0, previewChars);
}
