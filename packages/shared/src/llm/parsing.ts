/**
 * LLM Response Parsing
 *
 * Turns raw model output into classification labels and schema-shaped
 * field maps. Nothing here calls a model.
 */

import type { DocumentTypeDescriptor } from '../types';
import { NOT_FOUND } from '../types';

/** Confidence assumed for a bare-label answer that reports none. */
export const PLAIN_ANSWER_CONFIDENCE = 0.85;

const CODE_FENCE = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```$/;

/** Model phrasings that mean "this field is not in the document". */
const NOT_FOUND_PHRASES = new Set([
  NOT_FOUND.toLowerCase(),
  'não encontrado',
  'nao encontrado',
  'não informado',
  'nao informado',
  'não disponível',
  'não consta',
  'not found',
  'n/a',
  'null',
  'none',
  '-',
]);

export function stripCodeFences(content: string): string {
  const trimmed = content.trim();
  const match = CODE_FENCE.exec(trimmed);
  return match?.[1] !== undefined ? match[1].trim() : trimmed;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON object out of model output. Returns undefined when the
 * output is not a JSON object (arrays and scalars included).
 */
export function parseJsonObject(content: string): Record<string, unknown> | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(content));
  } catch {
    return undefined;
  }
  return isPlainObject(parsed) ? parsed : undefined;
}

export interface ClassificationAnswer {
  label: string;
  confidence: number;
}

function cleanLabel(label: string): string {
  return label.trim().replace(/^["'“”\s]+|["'“”.\s]+$/g, '');
}

/**
 * Accepts the structured `{ document_type, confidence }` answer or a bare label.
 */
export function parseClassificationAnswer(content: string): ClassificationAnswer {
  const parsed = parseJsonObject(content);

  if (parsed && typeof parsed.document_type === 'string') {
    const confidence = parsed.confidence;
    return {
      label: cleanLabel(parsed.document_type),
      confidence: typeof confidence === 'number' && Number.isFinite(confidence)
        ? Math.min(1, Math.max(0, confidence))
        : PLAIN_ANSWER_CONFIDENCE,
    };
  }

  return { label: cleanLabel(stripCodeFences(content)), confidence: PLAIN_ANSWER_CONFIDENCE };
}

export function normalizeFieldValue(value: unknown): string {
  if (value === undefined || value === null) return NOT_FOUND;

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '' || NOT_FOUND_PHRASES.has(trimmed.toLowerCase())) return NOT_FOUND;
    return trimmed;
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }

  return JSON.stringify(value);
}

export interface NormalizedFields {
  fields: Record<string, string>;
  missingMandatory: string[];
  droppedFields: string[];
}

/**
 * Project a parsed object onto the schema: undeclared keys are dropped,
 * declared keys that are absent or "not found" become NOT_FOUND.
 */
export function normalizeExtractedFields(
  parsed: Record<string, unknown>,
  descriptor: DocumentTypeDescriptor
): NormalizedFields {
  const declared = new Set(descriptor.schema.fields.map((f) => f.name));
  const fields: Record<string, string> = {};

  for (const field of descriptor.schema.fields) {
    const value = Object.prototype.hasOwnProperty.call(parsed, field.name) ? parsed[field.name] : undefined;
    fields[field.name] = normalizeFieldValue(value);
  }

  return {
    fields,
    missingMandatory: missingMandatoryFields(fields, descriptor),
    droppedFields: Object.keys(parsed).filter((key) => !declared.has(key)),
  };
}

export function missingMandatoryFields(
  fields: Record<string, string>,
  descriptor: DocumentTypeDescriptor
): string[] {
  return descriptor.schema.fields
    .filter((f) => f.mandatory && (fields[f.name] === undefined || fields[f.name] === NOT_FOUND))
    .map((f) => f.name);
}
