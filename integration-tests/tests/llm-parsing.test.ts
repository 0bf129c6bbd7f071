/**
 * LLM Response Parsing & Cost Tests
 */

import {
  DEFAULT_MODEL_COSTS,
  NOT_FOUND,
  PLAIN_ANSWER_CONFIDENCE,
  estimateCost,
  findModelRate,
  normalizeExtractedFields,
  normalizeFieldValue,
  parseClassificationAnswer,
  parseJsonObject,
  stripCodeFences,
  type DocumentTypeDescriptor,
} from '@docintake/shared';
import { catalog } from './helpers';

function descriptorOf(name: string): DocumentTypeDescriptor {
  const descriptor = catalog.get(name);
  if (!descriptor) throw new Error(`catalog has no ${name}`);
  return descriptor;
}

describe('parseJsonObject', () => {
  it('strips Markdown code fences', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(parseJsonObject('```json\n{"a":1}\n```')).toEqual({ a: 1 });
  });

  it('returns undefined for anything but an object', () => {
    expect(parseJsonObject('[1, 2]')).toBeUndefined();
    expect(parseJsonObject('42')).toBeUndefined();
    expect(parseJsonObject('null')).toBeUndefined();
    expect(parseJsonObject('Desculpe, não consegui ler o documento.')).toBeUndefined();
  });
});

describe('parseClassificationAnswer', () => {
  it('reads the structured answer', () => {
    expect(parseClassificationAnswer('{"document_type":"CNH","confidence":0.9}')).toEqual({
      label: 'CNH',
      confidence: 0.9,
    });
  });

  it('clamps confidence into [0, 1]', () => {
    expect(parseClassificationAnswer('{"document_type":"CNH","confidence":1.7}').confidence).toBe(1);
    expect(parseClassificationAnswer('{"document_type":"CNH","confidence":-2}').confidence).toBe(0);
  });

  it('assigns the plain-answer confidence when none is reported', () => {
    expect(parseClassificationAnswer('{"document_type":"CNH"}').confidence).toBe(PLAIN_ANSWER_CONFIDENCE);
    expect(parseClassificationAnswer('CNH')).toEqual({ label: 'CNH', confidence: PLAIN_ANSWER_CONFIDENCE });
  });

  it('cleans quotes and trailing periods from bare labels', () => {
    expect(parseClassificationAnswer('"Cartão CNPJ"').label).toBe('Cartão CNPJ');
    expect(parseClassificationAnswer('"CNH".').label).toBe('CNH');
    expect(parseClassificationAnswer('  Alvará Municipal.\n').label).toBe('Alvará Municipal');
  });
});

describe('normalizeFieldValue', () => {
  it('maps absent and not-found phrasings to the sentinel', () => {
    expect(normalizeFieldValue(undefined)).toBe(NOT_FOUND);
    expect(normalizeFieldValue(null)).toBe(NOT_FOUND);
    expect(normalizeFieldValue('   ')).toBe(NOT_FOUND);
    expect(normalizeFieldValue(' n/a ')).toBe(NOT_FOUND);
    expect(normalizeFieldValue('Não encontrado')).toBe(NOT_FOUND);
  });

  it('stringifies scalars and nested values', () => {
    expect(normalizeFieldValue(' AB ')).toBe('AB');
    expect(normalizeFieldValue(1500.5)).toBe('1500.5');
    expect(normalizeFieldValue(true)).toBe('true');
    expect(normalizeFieldValue({ nome: 'Maria' })).toBe('{"nome":"Maria"}');
  });
});

describe('normalizeExtractedFields', () => {
  it('projects the answer onto the schema', () => {
    const result = normalizeExtractedFields(
      {
        razao_social: 'Construtora Modelo Ltda',
        cnpj: '00.000.000/0001-00',
        numero_cei: '',
        responsavel: 'ignorado',
      },
      descriptorOf('CEI da Obra')
    );

    expect(result).toEqual({
      fields: {
        razao_social: 'Construtora Modelo Ltda',
        cnpj: '00.000.000/0001-00',
        endereco_completo: NOT_FOUND,
        numero_cei: NOT_FOUND,
        data_registro: NOT_FOUND,
      },
      missingMandatory: ['numero_cei'],
      droppedFields: ['responsavel'],
    });
  });

  it('reads only own properties of the answer', () => {
    const descriptor: DocumentTypeDescriptor = {
      name: 'Registro Interno',
      description: 'Campos com nomes de propriedades herdadas',
      schema: {
        fields: [
          { name: 'constructor', description: 'Construtor', mandatory: true },
          { name: 'toString', description: 'Texto', mandatory: false },
        ],
      },
    };

    expect(normalizeExtractedFields({ toString: 'valor' }, descriptor)).toEqual({
      fields: { constructor: NOT_FOUND, toString: 'valor' },
      missingMandatory: ['constructor'],
      droppedFields: [],
    });
  });
});

describe('cost accounting', () => {
  it('matches dated model names to the longest rate prefix', () => {
    expect(findModelRate('gpt-4o-mini-2024-07-18', DEFAULT_MODEL_COSTS)).toEqual({ input: 0.00015, output: 0.0006 });
    expect(findModelRate('gpt-4o-2024-08-06', DEFAULT_MODEL_COSTS)).toEqual({ input: 0.0025, output: 0.01 });
    expect(findModelRate('other-model', DEFAULT_MODEL_COSTS)).toBeUndefined();
  });

  it('prices tokens per thousand', () => {
    const estimate = estimateCost('gpt-4o', 1000, 500, DEFAULT_MODEL_COSTS);
    expect(estimate.known).toBe(true);
    expect(estimate.costUsd).toBeCloseTo(0.0075, 10);
  });

  it('records zero for unknown models', () => {
    expect(estimateCost('other-model', 1000, 1000, DEFAULT_MODEL_COSTS)).toEqual({ costUsd: 0, known: false });
  });
});
