/**
 * Document Classification Prompts
 *
 * The model picks exactly one catalog name, or `unclassified`, and reports
 * its confidence. The adaptive variant adds similar, already classified
 * documents as examples.
 */

import type { PromptTemplate } from './types';

export const CLASSIFICATION_SYSTEM_PROMPT = `Você é um especialista em classificação de documentos empresariais e fiscais brasileiros.
Responda somente com o nome exato de um dos tipos suportados, ou "unclassified" quando nenhum se aplicar com segurança, e a sua confiança entre 0 e 1.`;

export const CLASSIFICATION_BASE_TEMPLATE: PromptTemplate = {
  name: 'classification.base',
  version: '1.0.0',
  variables: ['document_types', 'type_descriptions', 'document_text'],
  text: `Classifique o documento abaixo em um dos tipos suportados.

TIPOS SUPORTADOS:
{{document_types}}

CARACTERÍSTICAS DOS DOCUMENTOS:
{{type_descriptions}}

TEXTO DO DOCUMENTO:
{{document_text}}

Use exatamente um nome da lista acima. Se não conseguir classificar com confiança, responda "unclassified".`,
};

export const CLASSIFICATION_ADAPTIVE_TEMPLATE: PromptTemplate = {
  name: 'classification.adaptive',
  version: '1.0.0',
  variables: ['document_types', 'type_descriptions', 'examples', 'document_text'],
  text: `Classifique o documento abaixo em um dos tipos suportados.

TIPOS SUPORTADOS:
{{document_types}}

CARACTERÍSTICAS DOS DOCUMENTOS:
{{type_descriptions}}

EXEMPLOS DE DOCUMENTOS SIMILARES JÁ CLASSIFICADOS:
{{examples}}

TEXTO DO DOCUMENTO:
{{document_text}}

Use exatamente um nome da lista acima. Se não conseguir classificar com confiança, responda "unclassified".`,
};
