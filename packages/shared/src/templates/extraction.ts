/**
 * Field Extraction Prompts
 *
 * One prompt pair for every document type: the field list comes from the
 * catalog schema, so adding a type never needs a new template.
 */

import type { PromptTemplate } from './types';

export const EXTRACTION_SYSTEM_PROMPT = `Você é um especialista em extração de dados de documentos brasileiros.
Extraia APENAS informações claramente presentes no texto. NÃO invente nem deduza valores.
Responda com um único objeto JSON cujas chaves são exatamente os nomes de campo solicitados, todos com valores em texto.`;

export const EXTRACTION_BASE_TEMPLATE: PromptTemplate = {
  name: 'extraction.base',
  version: '1.0.0',
  variables: ['document_type', 'fields', 'not_found', 'document_text'],
  text: `Tipo de documento: {{document_type}}

Campos a extrair:
{{fields}}

Se um campo não estiver presente, use exatamente o valor "{{not_found}}".

Documento:
{{document_text}}`,
};

export const EXTRACTION_ADAPTIVE_TEMPLATE: PromptTemplate = {
  name: 'extraction.adaptive',
  version: '1.0.0',
  variables: ['document_type', 'examples', 'fields', 'not_found', 'document_text'],
  text: `Tipo de documento: {{document_type}}

EXEMPLOS DE EXTRAÇÕES SIMILARES BEM-SUCEDIDAS:
{{examples}}

Campos a extrair:
{{fields}}

Se um campo não estiver presente, use exatamente o valor "{{not_found}}".

Documento:
{{document_text}}`,
};

/**
 * Appended to the extraction prompt on the single retry after a malformed response.
 */
export const STRICT_JSON_INSTRUCTION = `IMPORTANTE: a resposta anterior não era um JSON válido.
Responda SOMENTE com um objeto JSON, sem texto antes ou depois e sem blocos de código Markdown.`;
