/**
 * Conversion Provider Registry
 *
 * Maps provider names to factories. The configured priority list is resolved
 * once at startup; an unknown name fails there, never mid-job.
 */

import { TextractClient } from '@aws-sdk/client-textract';
import { AzureKeyCredential, DocumentAnalysisClient } from '@azure/ai-form-recognizer';
import type OpenAI from 'openai';
import { ConfigurationError } from '../errors';
import { logger } from '../logger';
import type { ModelRateTable } from '../types';
import { AwsTextractProvider } from './aws-textract';
import { AzureDocumentIntelligenceProvider } from './azure-document-intelligence';
import type { ProviderDependencies } from './base-provider';
import { OpenAiVisionProvider } from './openai-vision';
import { PdfTextProvider } from './pdf-text';
import type { ConversionProvider } from './types';

export interface ProviderFactoryContext extends ProviderDependencies {
  azureDocumentIntelligence?: {
    endpoint: string;
    key: string;
    modelId: string;
    costPerPage: number;
  };
  awsTextract?: {
    region: string;
    accessKeyId: string;
    secretAccessKey: string;
    costPerPage: number;
  };
  openai?: {
    client: OpenAI;
    visionModel: string;
    modelCosts: ModelRateTable;
  };
}

export type ProviderFactory = (context: ProviderFactoryContext) => ConversionProvider;

export class ProviderRegistry {
  private readonly factories = new Map<string, ProviderFactory>();

  register(name: string, factory: ProviderFactory): this {
    this.factories.set(name, factory);
    logger.debug('Registered conversion provider', { provider: name });
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return Array.from(this.factories.keys());
  }

  /**
   * Instantiate providers in the given priority order.
   * @throws ConfigurationError for an unknown or duplicated name
   */
  resolve(names: readonly string[], context: ProviderFactoryContext): ConversionProvider[] {
    const seen = new Set<string>();

    return names.map((name) => {
      const factory = this.factories.get(name);
      if (!factory) {
        throw new ConfigurationError(`Unknown conversion provider: ${name}`, {
          provider: name,
          known: this.names(),
        });
      }
      if (seen.has(name)) {
        throw new ConfigurationError(`Conversion provider listed twice: ${name}`, { provider: name });
      }
      seen.add(name);
      return factory(context);
    });
  }
}

export function createDefaultProviderRegistry(): ProviderRegistry {
  return new ProviderRegistry()
    .register('pdf-text', (ctx) => new PdfTextProvider(ctx))
    .register('azure-document-intelligence', (ctx) => {
      const azure = ctx.azureDocumentIntelligence;
      if (!azure || !azure.endpoint || !azure.key) {
        throw new ConfigurationError(
          'azure-document-intelligence requires AZURE_DOCUMENT_INTELLIGENCE_ENDPOINT and AZURE_DOCUMENT_INTELLIGENCE_KEY'
        );
      }
      const client = new DocumentAnalysisClient(azure.endpoint, new AzureKeyCredential(azure.key));
      return new AzureDocumentIntelligenceProvider(ctx, client, azure.modelId, azure.costPerPage);
    })
    .register('aws-textract', (ctx) => {
      const aws = ctx.awsTextract;
      if (!aws || !aws.region || !aws.accessKeyId || !aws.secretAccessKey) {
        throw new ConfigurationError('aws-textract requires AWS_REGION, AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY');
      }
      const client = new TextractClient({
        region: aws.region,
        credentials: { accessKeyId: aws.accessKeyId, secretAccessKey: aws.secretAccessKey },
      });
      return new AwsTextractProvider(ctx, client, aws.costPerPage);
    })
    .register('openai-vision', (ctx) => {
      if (!ctx.openai) {
        throw new ConfigurationError('openai-vision requires an OpenAI client');
      }
      return new OpenAiVisionProvider(ctx, ctx.openai.client, ctx.openai.visionModel, ctx.openai.modelCosts);
    });
}
