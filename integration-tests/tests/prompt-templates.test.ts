/**
 * Prompt Template Tests
 *
 * Rendering, variable checks, and the example/field blocks fed into prompts.
 */

import {
  ConfigurationError,
  MissingVariableError,
  PromptTemplateResolver,
  DEFAULT_TEMPLATES,
  formatFieldList,
  formatTypeList,
  placeholdersOf,
  renderExamplesBlock,
  validateTemplates,
  type DocumentTypeDescriptor,
  type SimilarExample,
} from '@docintake/shared';
import { catalog } from './helpers';

function descriptorOf(name: string): DocumentTypeDescriptor {
  const descriptor = catalog.get(name);
  if (!descriptor) throw new Error(`catalog has no ${name}`);
  return descriptor;
}

describe('PromptTemplateResolver', () => {
  const resolver = new PromptTemplateResolver();

  it('substitutes every placeholder', () => {
    const prompt = resolver.render('extraction.base', {
      document_type: 'CNH',
      fields: '- nome_completo: Nome',
      not_found: 'N/D',
      document_text: 'texto',
    });

    expect(prompt).toBe(
      'Tipo de documento: CNH\n\nCampos a extrair:\n- nome_completo: Nome\n\n' +
        'Se um campo não estiver presente, use exatamente o valor "N/D".\n\nDocumento:\ntexto'
    );
  });

  it('does not expand braces inside substituted values', () => {
    const prompt = resolver.render('extraction.base', {
      document_type: 'CNH',
      fields: '- a',
      not_found: 'N/D',
      document_text: 'literal {{fields}} here',
    });

    expect(prompt.endsWith('Documento:\nliteral {{fields}} here')).toBe(true);
  });

  it('throws MissingVariableError naming the unsupplied variable', () => {
    expect.assertions(3);
    try {
      resolver.render('extraction.base', { document_type: 'CNH', fields: '- a', not_found: 'N/D' });
    } catch (error) {
      expect(error).toBeInstanceOf(MissingVariableError);
      if (error instanceof MissingVariableError) {
        expect(error.variable).toBe('document_text');
        expect(error.templateName).toBe('extraction.base');
      }
    }
  });

  it('exposes template versions and rejects unknown names', () => {
    const custom = new PromptTemplateResolver([
      { name: 'classification.base', version: '2.0.0', variables: ['a'], text: 'x {{a}} {{a}}' },
    ]);

    expect(custom.version('classification.base')).toBe('2.0.0');
    expect(custom.render('classification.base', { a: '1' })).toBe('x 1 1');
    expect(() => custom.get('extraction.base')).toThrow(ConfigurationError);
  });

  it('ships consistent default templates', () => {
    expect(() => validateTemplates(DEFAULT_TEMPLATES)).not.toThrow();
    expect(DEFAULT_TEMPLATES.map((t) => t.name)).toEqual([
      'classification.base',
      'classification.adaptive',
      'extraction.base',
      'extraction.adaptive',
    ]);
  });
});

describe('validateTemplates', () => {
  it('rejects undeclared and unused variables', () => {
    expect(() =>
      validateTemplates([{ name: 'extraction.base', version: '1', variables: ['a'], text: '{{b}}' }])
    ).toThrow(ConfigurationError);
  });

  it('rejects duplicate names', () => {
    const template = { name: 'extraction.base' as const, version: '1', variables: [], text: 'plain' };
    expect(() => validateTemplates([template, template])).toThrow('Duplicate prompt template extraction.base');
  });

  it('lists placeholders once in order of appearance', () => {
    expect(placeholdersOf('{{a}} {{b}} {{a}} {c}')).toEqual(['a', 'b']);
  });
});

describe('prompt fragments', () => {
  const examples: SimilarExample[] = [
    { text: 'primeiro', documentType: 'CNH', fields: { nome_completo: 'Maria' } },
    { text: '  segundo  ', documentType: 'CNH', fields: {} },
    { text: 'terceiro', documentType: 'CNH', fields: {} },
  ];

  it('renders classification examples up to the limit', () => {
    expect(renderExamplesBlock('classification', examples, 2)).toBe(
      'Exemplo 1 (CNH):\nprimeiro\n\nExemplo 2 (CNH):\nsegundo'
    );
  });

  it('renders extraction examples with their fields', () => {
    expect(renderExamplesBlock('extraction', examples, 1)).toBe(
      'Exemplo 1 (CNH):\nTexto: primeiro\nCampos extraídos: {"nome_completo":"Maria"}'
    );
  });

  it('renders nothing for no examples or a zero limit', () => {
    expect(renderExamplesBlock('classification', [], 3)).toBe('');
    expect(renderExamplesBlock('classification', examples, 0)).toBe('');
  });

  it('truncates long example text', () => {
    const block = renderExamplesBlock('classification', [{ text: 'a'.repeat(600), documentType: 'CNH', fields: {} }], 1);
    expect(block).toBe(`Exemplo 1 (CNH):\n${'a'.repeat(500)}...`);
  });

  it('marks mandatory fields', () => {
    const lines = formatFieldList(descriptorOf('CEI da Obra')).split('\n');

    expect(lines).toHaveLength(5);
    expect(lines[0]?.startsWith('- razao_social: ')).toBe(true);
    expect(lines[0]?.endsWith(' (obrigatório)')).toBe(true);
    expect(lines[2]?.startsWith('- endereco_completo: ')).toBe(true);
    expect(lines[2]?.endsWith(' (obrigatório)')).toBe(false);
  });

  it('lists every catalog type', () => {
    const list = formatTypeList(catalog.descriptors).split('\n');
    expect(list).toHaveLength(10);
    expect(list).toContain('- Nota Fiscal de Serviços Eletrônica');
  });
});
