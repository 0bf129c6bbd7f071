/**
 * Prompt Templates
 *
 * Classification and extraction prompts, base and adaptive variants.
 */

export type { PromptTemplate, TemplateName, TemplateVariables, ExamplesKind } from './types';

export {
  CLASSIFICATION_SYSTEM_PROMPT,
  CLASSIFICATION_BASE_TEMPLATE,
  CLASSIFICATION_ADAPTIVE_TEMPLATE,
} from './classification';

export {
  EXTRACTION_SYSTEM_PROMPT,
  EXTRACTION_BASE_TEMPLATE,
  EXTRACTION_ADAPTIVE_TEMPLATE,
  STRICT_JSON_INSTRUCTION,
} from './extraction';

export { PromptTemplateResolver, DEFAULT_TEMPLATES, placeholdersOf, validateTemplates } from './resolver';

export { renderExamplesBlock, formatTypeList, formatTypeDescriptions, formatFieldList } from './examples';
