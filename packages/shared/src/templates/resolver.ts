/**
 * Prompt Template Resolver
 *
 * Immutable table of templates keyed by name. Declared variables are checked
 * against the placeholders in each template when the resolver is built, and
 * rendering never emits a partially substituted prompt.
 */

import { ConfigurationError, MissingVariableError } from '../errors';
import { CLASSIFICATION_ADAPTIVE_TEMPLATE, CLASSIFICATION_BASE_TEMPLATE } from './classification';
import { EXTRACTION_ADAPTIVE_TEMPLATE, EXTRACTION_BASE_TEMPLATE } from './extraction';
import type { PromptTemplate, TemplateName, TemplateVariables } from './types';

const PLACEHOLDER = /\{\{([a-zA-Z0-9_]+)\}\}/g;

export const DEFAULT_TEMPLATES: readonly PromptTemplate[] = [
  CLASSIFICATION_BASE_TEMPLATE,
  CLASSIFICATION_ADAPTIVE_TEMPLATE,
  EXTRACTION_BASE_TEMPLATE,
  EXTRACTION_ADAPTIVE_TEMPLATE,
];

/**
 * Distinct placeholder names in order of first appearance
 */
export function placeholdersOf(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(PLACEHOLDER)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) names.push(name);
  }
  return names;
}

/**
 * Throws ConfigurationError when a template's declared variables differ
 * from the placeholders its text uses.
 */
export function validateTemplates(templates: readonly PromptTemplate[]): void {
  const seen = new Set<string>();

  for (const template of templates) {
    if (seen.has(template.name)) {
      throw new ConfigurationError(`Duplicate prompt template ${template.name}`);
    }
    seen.add(template.name);

    const used = placeholdersOf(template.text);
    const declared = new Set(template.variables);
    const undeclared = used.filter((v) => !declared.has(v));
    const unused = template.variables.filter((v) => !used.includes(v));

    if (undeclared.length > 0 || unused.length > 0) {
      throw new ConfigurationError(`Prompt template ${template.name}@${template.version} is inconsistent`, {
        template: template.name,
        undeclared,
        unused,
      });
    }
  }
}

export class PromptTemplateResolver {
  private readonly templates: ReadonlyMap<TemplateName, PromptTemplate>;

  constructor(templates: readonly PromptTemplate[] = DEFAULT_TEMPLATES) {
    validateTemplates(templates);
    this.templates = new Map(templates.map((t) => [t.name, Object.freeze({ ...t })]));
  }

  get(name: TemplateName): PromptTemplate {
    const template = this.templates.get(name);
    if (!template) {
      throw new ConfigurationError(`Unknown prompt template ${name}`);
    }
    return template;
  }

  version(name: TemplateName): string {
    return this.get(name).version;
  }

  /**
   * Substitute every placeholder occurrence literally. Values are inserted
   * as-is: braces inside a value are never expanded again.
   */
  render(name: TemplateName, variables: TemplateVariables): string {
    const template = this.get(name);

    for (const variable of template.variables) {
      if (variables[variable] === undefined) {
        throw new MissingVariableError(name, variable);
      }
    }

    return template.text.replace(PLACEHOLDER, (_token, variable: string) => variables[variable] ?? '');
  }
}
