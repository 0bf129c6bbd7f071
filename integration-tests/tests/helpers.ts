/**
 * Test Helpers
 *
 * In-process stand-ins for the LLM backend, conversion providers,
 * persistence and the similarity store.
 */

import {
  DEFAULT_DOCUMENT_TYPES_PATH,
  LlmGateway,
  PipelineOrchestrator,
  PromptTemplateResolver,
  loadCatalog,
  loadConfig,
  normalizeMimeType,
  type ConversionDocument,
  type ConversionProvider,
  type ConversionResult,
  type DocumentTypeCatalog,
  type ExtractionRecord,
  type JobSnapshot,
  type JobState,
  type LlmBackend,
  type LlmRequest,
  type LlmResponse,
  type LogDetail,
  type PipelineConfig,
  type PipelinePersistence,
  type SimilarExample,
  type SimilarityStore,
  type UsageRecord,
} from '@docintake/shared';

export const catalog: DocumentTypeCatalog = loadCatalog(DEFAULT_DOCUMENT_TYPES_PATH);

/**
 * Defaults from an empty environment, adaptive prompting off.
 */
export function testConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return { ...loadConfig({}), similarExamplesK: 0, ...overrides };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// LLM backend
// ============================================================================

export type ScriptedReply = string | Error | { content: string; inputTokens?: number; outputTokens?: number; model?: string };

/**
 * Replies from a script in order; the last entry repeats once the script runs out.
 */
export class ScriptedBackend implements LlmBackend {
  readonly name = 'scripted';
  readonly requests: LlmRequest[] = [];
  private readonly script: ScriptedReply[];

  constructor(script: ScriptedReply[]) {
    this.script = [...script];
  }

  async complete(request: LlmRequest): Promise<LlmResponse> {
    this.requests.push(request);
    const reply = this.script.length > 1 ? this.script.shift() : this.script[0];

    if (reply === undefined) throw new Error('ScriptedBackend has no replies');
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'string') {
      return { content: reply, model: request.model, inputTokens: 100, outputTokens: 20 };
    }
    return {
      content: reply.content,
      model: reply.model ?? request.model,
      inputTokens: reply.inputTokens ?? 100,
      outputTokens: reply.outputTokens ?? 20,
    };
  }
}

/**
 * Routes requests to separate scripts for classification and extraction,
 * told apart by the structured-output schema name.
 */
export class RoutingBackend implements LlmBackend {
  readonly name = 'routing';
  readonly classification: ScriptedBackend;
  readonly extraction: ScriptedBackend;

  constructor(classification: ScriptedReply[], extraction: ScriptedReply[]) {
    this.classification = new ScriptedBackend(classification);
    this.extraction = new ScriptedBackend(extraction);
  }

  complete(request: LlmRequest): Promise<LlmResponse> {
    return request.responseFormat?.name === 'document_classification'
      ? this.classification.complete(request)
      : this.extraction.complete(request);
  }
}

export function classificationReply(documentType: string, confidence: number): string {
  return JSON.stringify({ document_type: documentType, confidence });
}

// ============================================================================
// Conversion providers
// ============================================================================

export interface FakeProviderOptions {
  name: string;
  mimeTypes?: string[];
  text?: string;
  score?: number;
  error?: Error;
  delayMs?: number;
}

export class FakeProvider implements ConversionProvider {
  readonly name: string;
  readonly kind = 'remote' as const;
  calls = 0;
  private readonly mimeTypes: string[];

  constructor(private readonly options: FakeProviderOptions) {
    this.name = options.name;
    this.mimeTypes = options.mimeTypes ?? ['application/pdf', 'text/plain'];
  }

  supports(mimeType: string): boolean {
    return this.mimeTypes.includes(normalizeMimeType(mimeType));
  }

  async convert(_document: ConversionDocument): Promise<ConversionResult> {
    this.calls++;
    if (this.options.delayMs) await sleep(this.options.delayMs);
    if (this.options.error) throw this.options.error;

    return {
      text: this.options.text ?? '',
      provider: this.name,
      score: this.options.score ?? 0,
      warnings: [],
      durationMs: this.options.delayMs ?? 0,
    };
  }
}

// ============================================================================
// Collaborators
// ============================================================================

export class InMemoryPersistence implements PipelinePersistence {
  readonly snapshots: JobSnapshot[] = [];
  readonly usage: UsageRecord[] = [];
  readonly logs: Array<{ correlationId: string; stage: JobState; detail: LogDetail }> = [];
  failing = false;

  async save(snapshot: JobSnapshot): Promise<void> {
    if (this.failing) throw new Error('persistence down');
    this.snapshots.push(snapshot);
  }

  async appendUsageRecord(record: UsageRecord): Promise<void> {
    if (this.failing) throw new Error('persistence down');
    this.usage.push(record);
  }

  async appendLog(correlationId: string, stage: JobState, detail: LogDetail): Promise<void> {
    if (this.failing) throw new Error('persistence down');
    this.logs.push({ correlationId, stage, detail });
  }

  states(): JobState[] {
    return this.snapshots.map((s) => s.job.state);
  }
}

export class InMemorySimilarityStore implements SimilarityStore {
  readonly indexed: Array<{ text: string; record: ExtractionRecord }> = [];
  readonly lookups: Array<{ documentType: string | undefined; k: number }> = [];
  failing = false;
  delayMs = 0;

  constructor(private readonly examples: SimilarExample[] = []) {}

  async findSimilar(_text: string, documentType: string | undefined, k: number): Promise<SimilarExample[]> {
    this.lookups.push({ documentType, k });
    if (this.delayMs) await sleep(this.delayMs);
    if (this.failing) throw new Error('vector store down');
    return this.examples
      .filter((e) => documentType === undefined || e.documentType === documentType)
      .slice(0, k);
  }

  async index(text: string, record: ExtractionRecord): Promise<void> {
    this.indexed.push({ text, record });
  }
}

// ============================================================================
// Pipeline assembly
// ============================================================================

export interface TestPipeline {
  orchestrator: PipelineOrchestrator;
  gateway: LlmGateway;
  persistence: InMemoryPersistence;
  similarity: InMemorySimilarityStore;
}

export function buildTestPipeline(options: {
  providers: ConversionProvider[];
  backend: LlmBackend;
  config?: Partial<PipelineConfig>;
  similarity?: InMemorySimilarityStore;
  isCancelled?: (jobId: string) => boolean | Promise<boolean>;
}): TestPipeline {
  const cfg = testConfig(options.config);
  const persistence = new InMemoryPersistence();
  const similarity = options.similarity ?? new InMemorySimilarityStore();
  const gateway = new LlmGateway({
    backend: options.backend,
    resolver: new PromptTemplateResolver(),
    usageSink: persistence,
    config: cfg,
  });

  const orchestrator = new PipelineOrchestrator({
    providers: options.providers,
    analyzer: gateway,
    catalog,
    persistence,
    similarity,
    config: cfg,
    isCancelled: options.isCancelled,
  });

  return { orchestrator, gateway, persistence, similarity };
}

export const BANK_RECEIPT_TEXT = `COMPROVANTE DE TRANSFERÊNCIA
Banco Exemplo S.A. - Código 999
Agência 0001 Conta 12345-6
Favorecido: Construtora Modelo Ltda
Valor: R$ 1.500,00
Data da transação: 10/03/2024`;

export const CNH_TEXT = `CARTEIRA NACIONAL DE HABILITAÇÃO
Nome: Maria da Silva Teste
CPF: 000.000.000-00
Categoria: AB
Validade: 01/01/2030`;
