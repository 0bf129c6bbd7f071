/**
 * Conversion Providers
 */

export type { ConversionProvider, ConversionDocument, ConversionUsage, ProviderKind, RawConversion } from './types';
export { BaseConversionProvider, normalizeMimeType, type ProviderDependencies } from './base-provider';
export { PdfTextProvider, buildLines, readPageLines, type PdfDocumentLike } from './pdf-text';
export {
  AwsTextractProvider,
  AWS_TEXTRACT_MIME_TYPES,
  TEXTRACT_MODEL,
  textFromBlocks,
  meanBlockConfidence,
  type TextractBlockLike,
  type TextractClientLike,
} from './aws-textract';
export {
  AzureDocumentIntelligenceProvider,
  AZURE_DOCUMENT_INTELLIGENCE_MIME_TYPES,
  textFromReadResult,
  meanWordConfidence,
  type DocumentAnalysisClientLike,
  type ReadResultLike,
} from './azure-document-intelligence';
export {
  OpenAiVisionProvider,
  OPENAI_VISION_MIME_TYPES,
  TRANSCRIPTION_PROMPT,
  transcriptionUsage,
} from './openai-vision';
export {
  ProviderRegistry,
  createDefaultProviderRegistry,
  type ProviderFactory,
  type ProviderFactoryContext,
} from './registry';
