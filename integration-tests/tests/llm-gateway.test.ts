/**
 * LLM Gateway Tests
 *
 * Classification mapping, extraction with a single strict-JSON retry, and
 * usage reporting, all against a scripted backend.
 */

import {
  CLASSIFICATION_SYSTEM_PROMPT,
  EXTRACTION_SYSTEM_PROMPT,
  ExtractionMalformedError,
  LlmGateway,
  NOT_FOUND,
  PromptTemplateResolver,
  ProviderUnavailableError,
  STRICT_JSON_INSTRUCTION,
  UNCLASSIFIED,
  ConfigurationError,
  createDefaultLlmBackendRegistry,
  type DocumentTypeDescriptor,
  type LlmBackendSettings,
  type LlmBackend,
  type LlmRequest,
  type LlmResponse,
  type PipelineConfig,
  type SimilarExample,
} from '@docintake/shared';
import {
  BANK_RECEIPT_TEXT,
  CNH_TEXT,
  InMemoryPersistence,
  ScriptedBackend,
  catalog,
  classificationReply,
  sleep,
  testConfig,
  type ScriptedReply,
} from './helpers';

function descriptorOf(name: string): DocumentTypeDescriptor {
  const descriptor = catalog.get(name);
  if (!descriptor) throw new Error(`catalog has no ${name}`);
  return descriptor;
}

function setup(script: ScriptedReply[], overrides: Partial<PipelineConfig> = {}) {
  const backend = new ScriptedBackend(script);
  const sink = new InMemoryPersistence();
  const gateway = new LlmGateway({
    backend,
    resolver: new PromptTemplateResolver(),
    usageSink: sink,
    config: testConfig(overrides),
  });
  return { backend, sink, gateway };
}

function userMessage(request: LlmRequest | undefined): string {
  return request?.messages.find((m) => m.role === 'user')?.content ?? '';
}

const CNH_ANSWER = JSON.stringify({
  nome_completo: 'Maria da Silva Teste',
  cpf: '000.000.000-00',
  categoria: 'AB',
  numero_cnh: 'Não encontrado',
  data_validade: '01/01/2030',
  tipo_sanguineo: 'O+',
});

const EXAMPLES: SimilarExample[] = [
  { text: 'CNH exemplo um', documentType: 'CNH', fields: { categoria: 'B' } },
  { text: 'CNH exemplo dois', documentType: 'CNH', fields: { categoria: 'A' } },
  { text: 'CNH exemplo tres', documentType: 'CNH', fields: { categoria: 'C' } },
];

describe('LlmGateway.classify', () => {
  it('returns the catalog type and records usage', async () => {
    const { backend, sink, gateway } = setup([classificationReply('Comprovante Bancário', 0.92)]);

    const result = await gateway.classify(BANK_RECEIPT_TEXT, catalog);

    expect(result).toEqual({
      documentType: 'Comprovante Bancário',
      descriptor: catalog.get('Comprovante Bancário'),
      confidence: 0.92,
      model: 'gpt-4o-mini',
      approach: 'base',
      examplesUsed: 0,
    });

    const request = backend.requests[0];
    expect(request?.messages[0]).toEqual({ role: 'system', content: CLASSIFICATION_SYSTEM_PROMPT });
    expect(request?.responseFormat?.name).toBe('document_classification');
    expect(request?.temperature).toBe(0);
    expect(userMessage(request)).toContain('- Cartão CNPJ\n');
    expect(userMessage(request)).toContain(BANK_RECEIPT_TEXT);

    expect(sink.usage).toHaveLength(1);
    expect(sink.usage[0]).toMatchObject({
      operation: 'classification',
      provider: 'scripted',
      model: 'gpt-4o-mini',
      inputTokens: 100,
      outputTokens: 20,
      success: true,
      attempt: 1,
    });
    // 100 * 0.00015 / 1000 + 20 * 0.0006 / 1000
    expect(sink.usage[0]?.costUsd).toBeCloseTo(0.000027, 12);
  });

  it('maps a label outside the catalog to unclassified with confidence 0', async () => {
    const { gateway } = setup([classificationReply('Boleto Bancário', 0.99)]);

    const result = await gateway.classify('texto qualquer', catalog);

    expect(result.documentType).toBe(UNCLASSIFIED);
    expect(result.confidence).toBe(0);
    expect(result.rawLabel).toBe('Boleto Bancário');
    expect(result.unclassifiedReason).toBe('unrecognized_label');
    expect(result.descriptor).toBeUndefined();
  });

  it('maps low confidence to unclassified and keeps the proposed label', async () => {
    const { gateway } = setup([classificationReply('CNH', 0.3)]);

    const result = await gateway.classify(CNH_TEXT, catalog);

    expect(result).toMatchObject({
      documentType: UNCLASSIFIED,
      confidence: 0.3,
      rawLabel: 'CNH',
      unclassifiedReason: 'low_confidence',
    });
  });

  it('passes through an unclassified answer', async () => {
    const { gateway } = setup([classificationReply(UNCLASSIFIED, 0.9)]);

    const result = await gateway.classify('lista de compras', catalog);

    expect(result.documentType).toBe(UNCLASSIFIED);
    expect(result.unclassifiedReason).toBe('model_unclassified');
  });

  it('accepts a bare label with the plain-answer confidence', async () => {
    const { gateway } = setup(['CNH']);

    const result = await gateway.classify(CNH_TEXT, catalog);

    expect(result.documentType).toBe('CNH');
    expect(result.confidence).toBe(0.85);
  });

  it('uses the adaptive prompt with at most K examples', async () => {
    const { backend, gateway } = setup([classificationReply('CNH', 0.95)], { similarExamplesK: 2 });

    const result = await gateway.classify(CNH_TEXT, catalog, EXAMPLES);

    expect(result.approach).toBe('adaptive');
    expect(result.examplesUsed).toBe(2);
    const prompt = userMessage(backend.requests[0]);
    expect(prompt).toContain('Exemplo 2 (CNH):\nCNH exemplo dois');
    expect(prompt).not.toContain('Exemplo 3');
  });

  it('ignores examples when K is 0', async () => {
    const { backend, gateway } = setup([classificationReply('CNH', 0.95)]);

    const result = await gateway.classify(CNH_TEXT, catalog, EXAMPLES);

    expect(result.approach).toBe('base');
    expect(result.examplesUsed).toBe(0);
    expect(userMessage(backend.requests[0])).not.toContain('Exemplo 1');
  });

  it('propagates backend failures and records an unsuccessful call', async () => {
    const { sink, gateway } = setup([new ProviderUnavailableError('scripted', 'HTTP 503')]);

    await expect(gateway.classify(CNH_TEXT, catalog)).rejects.toBeInstanceOf(ProviderUnavailableError);

    expect(sink.usage).toHaveLength(1);
    expect(sink.usage[0]).toMatchObject({ success: false, inputTokens: 0, outputTokens: 0, costUsd: 0 });
  });

  it('times out a slow backend as unavailable', async () => {
    const slow: LlmBackend = {
      name: 'slow',
      async complete(request: LlmRequest): Promise<LlmResponse> {
        await sleep(200);
        return { content: classificationReply('CNH', 0.9), model: request.model, inputTokens: 1, outputTokens: 1 };
      },
    };
    const gateway = new LlmGateway({
      backend: slow,
      resolver: new PromptTemplateResolver(),
      usageSink: new InMemoryPersistence(),
      config: testConfig({ llmRequestTimeoutMs: 20 }),
    });

    await expect(gateway.classify(CNH_TEXT, catalog)).rejects.toBeInstanceOf(ProviderUnavailableError);
  });

  it('does not fail when the usage sink fails', async () => {
    const { sink, gateway } = setup([classificationReply('CNH', 0.9)]);
    sink.failing = true;

    await expect(gateway.classify(CNH_TEXT, catalog)).resolves.toMatchObject({ documentType: 'CNH' });
  });
});

describe('LlmGateway.extract', () => {
  const cnh = descriptorOf('CNH');

  it('returns exactly the schema fields with missing mandatory ones listed', async () => {
    const { backend, gateway } = setup([CNH_ANSWER]);

    const record = await gateway.extract(CNH_TEXT, cnh);

    expect(Object.keys(record.fields).sort()).toEqual(cnh.schema.fields.map((f) => f.name).sort());
    expect(record.fields.nome_completo).toBe('Maria da Silva Teste');
    expect(record.fields.categoria).toBe('AB');
    expect(record.fields.numero_cnh).toBe(NOT_FOUND);
    expect(record.fields.rg).toBe(NOT_FOUND);
    expect(record.missingMandatory).toEqual(['numero_cnh']);
    expect(record.droppedFields).toEqual(['tipo_sanguineo']);
    expect(record).toMatchObject({ documentType: 'CNH', attempts: 1, approach: 'base', chunks: 1, model: 'gpt-4o-mini' });

    const request = backend.requests[0];
    expect(request?.messages[0]).toEqual({ role: 'system', content: EXTRACTION_SYSTEM_PROMPT });
    expect(request?.responseFormat?.name).toBe('document_extraction');
    expect(userMessage(request)).toContain(`use exatamente o valor "${NOT_FOUND}"`);
  });

  it('retries once with a strict-JSON instruction after a malformed response', async () => {
    const { backend, sink, gateway } = setup(['Segue o resultado: nome Maria', CNH_ANSWER]);

    const record = await gateway.extract(CNH_TEXT, cnh);

    expect(record.attempts).toBe(2);
    expect(backend.requests).toHaveLength(2);
    expect(userMessage(backend.requests[0]).endsWith(STRICT_JSON_INSTRUCTION)).toBe(false);
    expect(userMessage(backend.requests[1]).endsWith(`\n\n${STRICT_JSON_INSTRUCTION}`)).toBe(true);
    expect(sink.usage.map((u) => [u.attempt, u.success])).toEqual([
      [1, false],
      [2, true],
    ]);
  });

  it('fails with ExtractionMalformedError after exactly one retry', async () => {
    const { backend, gateway } = setup(['nada aqui', 'ainda nada']);

    const error = await gateway.extract(CNH_TEXT, cnh).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionMalformedError);
    if (error instanceof ExtractionMalformedError) {
      expect(error.attempts).toBe(2);
      expect(error.rawResponse).toBe('ainda nada');
    }
    expect(backend.requests).toHaveLength(2);
  });

  it('uses the adaptive template when examples are supplied', async () => {
    const { backend, gateway } = setup([CNH_ANSWER], { similarExamplesK: 3 });

    const record = await gateway.extract(CNH_TEXT, cnh, EXAMPLES.slice(0, 1));

    expect(record.approach).toBe('adaptive');
    expect(userMessage(backend.requests[0])).toContain(
      'Exemplo 1 (CNH):\nTexto: CNH exemplo um\nCampos extraídos: {"categoria":"B"}'
    );
  });

  it('is deterministic for the same text and response', async () => {
    const { gateway } = setup([CNH_ANSWER]);

    const first = await gateway.extract(CNH_TEXT, cnh);
    const second = await gateway.extract(CNH_TEXT, cnh);

    expect(second).toEqual(first);
  });
});

describe('LlmBackendRegistry', () => {
  const settings: LlmBackendSettings = {
    openaiApiKey: 'test-key',
    azureOpenaiEndpoint: '',
    azureOpenaiApiKey: '',
    azureOpenaiApiVersion: '2024-10-21',
    llmRequestTimeoutMs: 1000,
  };
  const registry = createDefaultLlmBackendRegistry();

  it('resolves the OpenAI backend without calling it', () => {
    const { backend } = registry.resolve('openai', settings);
    expect(backend.name).toBe('openai');
  });

  it('fails at startup on unknown names or missing credentials', () => {
    expect(() => registry.resolve('local-llama', settings)).toThrow('Unknown LLM backend: local-llama');
    expect(() => registry.resolve('openai', { ...settings, openaiApiKey: '' })).toThrow(ConfigurationError);
    expect(() => registry.resolve('azure-openai', settings)).toThrow(ConfigurationError);
  });
});
