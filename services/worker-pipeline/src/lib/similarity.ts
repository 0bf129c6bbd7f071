/**
 * pgvector Similarity Store
 *
 * Completed extractions are embedded with the OpenAI embeddings API and
 * stored in Postgres; lookups are cosine-distance nearest neighbours,
 * optionally restricted to one document type.
 */

import type OpenAI from 'openai';
import { Pool } from 'pg';
import {
  logger,
  estimateCost,
  getContext,
  getCorrelationId,
  toProviderError,
  type ExtractionRecord,
  type ModelRateTable,
  type SimilarExample,
  type SimilarityStore,
  type UsageSink,
} from '@docintake/shared';

/** Characters of document text sent for embedding. */
const EMBEDDING_INPUT_CHARS = 8000;

export interface PgVectorSimilarityStoreOptions {
  pool: Pool;
  client: OpenAI;
  embeddingModel: string;
  usageSink: UsageSink;
  modelCosts: ModelRateTable;
}

interface ExampleRow {
  text: string;
  document_type: string;
  fields: unknown;
  similarity: number;
}

function toFieldMap(value: unknown): Record<string, string> {
  const fields: Record<string, string> = {};
  if (typeof value !== 'object' || value === null) return fields;

  for (const [name, fieldValue] of Object.entries(value)) {
    if (typeof fieldValue === 'string') fields[name] = fieldValue;
  }
  return fields;
}

/** pgvector literal: "[0.1,0.2,...]" */
function toVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(',')}]`;
}

export class PgVectorSimilarityStore implements SimilarityStore {
  constructor(private readonly options: PgVectorSimilarityStoreOptions) {}

  async findSimilar(text: string, documentType: string | undefined, k: number): Promise<SimilarExample[]> {
    if (k <= 0) return [];

    const embedding = await this.embed(text);
    const result = await this.options.pool.query<ExampleRow>(
      `SELECT text, document_type, fields, 1 - (embedding <=> $1::vector) AS similarity
       FROM similarity_examples
       WHERE ($2::text IS NULL OR document_type = $2)
       ORDER BY embedding <=> $1::vector
       LIMIT $3`,
      [toVectorLiteral(embedding), documentType ?? null, k]
    );

    logger.debug('Similar examples found', { document_type: documentType, count: result.rows.length });

    return result.rows.map((row) => ({
      text: row.text,
      documentType: row.document_type,
      fields: toFieldMap(row.fields),
      similarity: Number(row.similarity),
    }));
  }

  async index(text: string, record: ExtractionRecord): Promise<void> {
    const embedding = await this.embed(text);

    await this.options.pool.query(
      `INSERT INTO similarity_examples (document_type, text, fields, embedding)
       VALUES ($1, $2, $3, $4::vector)`,
      [record.documentType, text, JSON.stringify(record.fields), toVectorLiteral(embedding)]
    );

    logger.info('Indexed document for similarity lookups', { document_type: record.documentType });
  }

  private async embed(text: string): Promise<number[]> {
    const { client, embeddingModel, usageSink, modelCosts } = this.options;
    const startTime = Date.now();
    let inputTokens = 0;
    let model = embeddingModel;
    let success = false;

    try {
      const response = await client.embeddings.create({
        model: embeddingModel,
        input: text.slice(0, EMBEDDING_INPUT_CHARS),
      });
      inputTokens = response.usage.prompt_tokens;
      model = response.model || embeddingModel;

      const embedding = response.data[0]?.embedding;
      if (!embedding) {
        throw new Error(`Empty embedding response from ${embeddingModel}`);
      }
      success = true;
      return embedding;
    } catch (error) {
      throw toProviderError(error, 'openai-embeddings');
    } finally {
      const { costUsd } = estimateCost(model, inputTokens, 0, modelCosts);
      try {
        await usageSink.appendUsageRecord({
          jobId: getContext()?.jobId,
          correlationId: getCorrelationId(),
          operation: 'embedding',
          provider: 'openai',
          model,
          inputTokens,
          outputTokens: 0,
          costUsd,
          success,
          durationMs: Date.now() - startTime,
          attempt: 1,
          createdAt: new Date().toISOString(),
        });
      } catch (sinkError) {
        logger.error('Failed to record embedding usage', sinkError, { model });
      }
    }
  }
}
