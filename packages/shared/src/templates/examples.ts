/**
 * Prompt Fragments
 *
 * Pure formatting of catalog entries and similar-document examples into the
 * text blocks the templates expect.
 */

import type { DocumentTypeDescriptor, SimilarExample } from '../types';
import type { ExamplesKind } from './types';

const EXAMPLE_PREVIEW_CHARS = 500;

function preview(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > EXAMPLE_PREVIEW_CHARS ? `${trimmed.slice(0, EXAMPLE_PREVIEW_CHARS)}...` : trimmed;
}

/**
 * Render up to `limit` examples. Returns '' when there are none to show.
 */
export function renderExamplesBlock(kind: ExamplesKind, examples: readonly SimilarExample[], limit: number): string {
  const selected = examples.slice(0, Math.max(0, limit));

  return selected
    .map((example, index) => {
      const header = `Exemplo ${index + 1} (${example.documentType}):`;
      if (kind === 'classification') {
        return `${header}\n${preview(example.text)}`;
      }
      return `${header}\nTexto: ${preview(example.text)}\nCampos extraídos: ${JSON.stringify(example.fields)}`;
    })
    .join('\n\n');
}

export function formatTypeList(descriptors: readonly DocumentTypeDescriptor[]): string {
  return descriptors.map((d) => `- ${d.name}`).join('\n');
}

export function formatTypeDescriptions(descriptors: readonly DocumentTypeDescriptor[]): string {
  return descriptors.map((d) => `- ${d.name}: ${d.description}`).join('\n');
}

export function formatFieldList(descriptor: DocumentTypeDescriptor): string {
  return descriptor.schema.fields
    .map((f) => `- ${f.name}: ${f.description}${f.mandatory ? ' (obrigatório)' : ''}`)
    .join('\n');
}
