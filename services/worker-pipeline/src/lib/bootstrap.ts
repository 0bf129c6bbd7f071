/**
 * Pipeline Assembly
 *
 * Resolves the configured catalog, LLM backend and conversion providers
 * once at startup. A bad name or missing credential fails here.
 */

import { Pool } from 'pg';
import {
  logger,
  loadCatalog,
  createDefaultLlmBackendRegistry,
  createDefaultProviderRegistry,
  LlmGateway,
  NoopSimilarityStore,
  PipelineOrchestrator,
  PromptTemplateResolver,
  QualityScorer,
  type Config,
  type SimilarityStore,
} from '@docintake/shared';
import type { CancellationRegistry } from './cancellation';
import { PgPersistence } from './db';
import { PgVectorSimilarityStore } from './similarity';

export interface PipelineDependencies {
  pool: Pool;
  cancellations: CancellationRegistry;
}

export function buildPipeline(cfg: Config, deps: PipelineDependencies): PipelineOrchestrator {
  const catalog = loadCatalog(cfg.documentTypesPath);
  const resolver = new PromptTemplateResolver();
  const persistence = new PgPersistence(deps.pool);
  const scorer = new QualityScorer({ expectedCharsPerPage: cfg.expectedCharsPerPage });

  const { backend, client } = createDefaultLlmBackendRegistry().resolve(cfg.llmBackend, cfg);

  const providers = createDefaultProviderRegistry().resolve(cfg.conversionProviders, {
    scorer,
    maxDocumentBytes: cfg.maxDocumentBytes,
    usageSink: persistence,
    azureDocumentIntelligence: {
      endpoint: cfg.azureDocumentIntelligenceEndpoint,
      key: cfg.azureDocumentIntelligenceKey,
      modelId: cfg.azureDocumentIntelligenceModel,
      costPerPage: cfg.azureDocumentIntelligenceCostPerPage,
    },
    awsTextract: {
      region: cfg.awsRegion,
      accessKeyId: cfg.awsAccessKeyId,
      secretAccessKey: cfg.awsSecretAccessKey,
      costPerPage: cfg.textractCostPerPage,
    },
    openai: { client, visionModel: cfg.llmModelVision, modelCosts: cfg.modelCosts },
  });

  const similarity: SimilarityStore =
    cfg.similarExamplesK > 0
      ? new PgVectorSimilarityStore({
          pool: deps.pool,
          client,
          embeddingModel: cfg.embeddingModel,
          usageSink: persistence,
          modelCosts: cfg.modelCosts,
        })
      : new NoopSimilarityStore();

  const gateway = new LlmGateway({ backend, resolver, usageSink: persistence, config: cfg });

  logger.info('Pipeline assembled', {
    catalog_version: catalog.version,
    document_types: catalog.names.length,
    providers: providers.map((p) => p.name),
    llm_backend: backend.name,
    strategy: cfg.conversionStrategy,
    adaptive_examples: cfg.similarExamplesK,
  });

  return new PipelineOrchestrator({
    providers,
    analyzer: gateway,
    catalog,
    persistence,
    similarity,
    config: cfg,
    isCancelled: (jobId) => deps.cancellations.isCancelled(jobId),
  });
}
