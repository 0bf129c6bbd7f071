/**
 * Conversion Provider Types
 */

import type { ConversionResult } from '../types';

export type ProviderKind = 'local' | 'remote';

export interface ConversionDocument {
  bytes: Buffer;
  mimeType: string;
  filename?: string;
}

/**
 * Billable spend of one remote conversion call.
 */
export interface ConversionUsage {
  model: string;
  inputTokens?: number;
  outputTokens?: number;
  pages?: number;
  costUsd: number;
}

/**
 * What a provider itself produces, before quality scoring.
 */
export interface RawConversion {
  text: string;
  pageCount?: number;
  /** Provider-native confidence, not yet clamped */
  providerConfidence?: number;
  warnings?: string[];
  usage?: ConversionUsage;
}

/**
 * Converts document bytes into normalized text.
 *
 * `convert` rejects with UnsupportedFormatError or DocumentTooLargeError before
 * any work, with ProviderUnavailableError on transient failures, and with
 * ProviderRejectedError when the provider judges the document malformed.
 */
export interface ConversionProvider {
  readonly name: string;
  readonly kind: ProviderKind;
  supports(mimeType: string): boolean;
  convert(document: ConversionDocument): Promise<ConversionResult>;
}
