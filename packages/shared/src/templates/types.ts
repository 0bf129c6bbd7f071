/**
 * Prompt Template Types
 */

export type TemplateName =
  | 'classification.base'
  | 'classification.adaptive'
  | 'extraction.base'
  | 'extraction.adaptive';

/**
 * A named, versioned prompt with `{{placeholder}}` tokens.
 * `variables` must list exactly the placeholders used in `text`.
 */
export interface PromptTemplate {
  readonly name: TemplateName;
  readonly version: string;
  readonly variables: readonly string[];
  readonly text: string;
}

export type TemplateVariables = Record<string, string | undefined>;

export type ExamplesKind = 'classification' | 'extraction';
