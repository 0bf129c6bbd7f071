/**
 * Pipeline Error Taxonomy
 *
 * Every error raised by a pipeline component carries a stable code and a
 * retryable flag. The orchestrator maps these onto terminal job states;
 * none of them is allowed to escape a job run.
 */

export type PipelineErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'DOCUMENT_TOO_LARGE'
  | 'PROVIDER_UNAVAILABLE'
  | 'PROVIDER_REJECTED'
  | 'MISSING_VARIABLE'
  | 'EXTRACTION_MALFORMED'
  | 'CONFIGURATION_ERROR'
  | 'INVALID_TRANSITION';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly retryable: boolean;
  readonly details: Record<string, unknown>;

  constructor(
    code: PipelineErrorCode,
    message: string,
    options: { retryable?: boolean; details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'PipelineError';
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.details = options.details ?? {};
  }
}

/** Declared MIME type is not handled. Caller input defect, never retried. */
export class UnsupportedFormatError extends PipelineError {
  constructor(mimeType: string, provider?: string) {
    super(
      'UNSUPPORTED_FORMAT',
      provider
        ? `Provider ${provider} does not support ${mimeType}`
        : `No conversion provider supports ${mimeType}`,
      { details: { mimeType, provider } }
    );
    this.name = 'UnsupportedFormatError';
  }
}

export class DocumentTooLargeError extends PipelineError {
  constructor(sizeBytes: number, maxBytes: number) {
    super('DOCUMENT_TOO_LARGE', `Document is ${sizeBytes} bytes, limit is ${maxBytes}`, {
      details: { sizeBytes, maxBytes },
    });
    this.name = 'DocumentTooLargeError';
  }
}

/** Transient provider or LLM failure, including timeouts. Eligible for fallback. */
export class ProviderUnavailableError extends PipelineError {
  readonly provider: string;

  constructor(provider: string, message: string, cause?: unknown) {
    super('PROVIDER_UNAVAILABLE', `${provider} unavailable: ${message}`, {
      retryable: true,
      details: { provider },
      cause,
    });
    this.name = 'ProviderUnavailableError';
    this.provider = provider;
  }
}

/** The provider judged the document itself malformed. Not retried on that provider. */
export class ProviderRejectedError extends PipelineError {
  readonly provider: string;

  constructor(provider: string, message: string, cause?: unknown) {
    super('PROVIDER_REJECTED', `${provider} rejected document: ${message}`, {
      details: { provider },
      cause,
    });
    this.name = 'ProviderRejectedError';
    this.provider = provider;
  }
}

export class MissingVariableError extends PipelineError {
  readonly templateName: string;
  readonly variable: string;

  constructor(templateName: string, variable: string) {
    super('MISSING_VARIABLE', `Template ${templateName} references unsupplied variable {{${variable}}}`, {
      details: { templateName, variable },
    });
    this.name = 'MissingVariableError';
    this.templateName = templateName;
    this.variable = variable;
  }
}

export class ExtractionMalformedError extends PipelineError {
  readonly attempts: number;
  readonly rawResponse: string;
  readonly responsePreview: string;

  constructor(message: string, attempts: number, rawResponse: string) {
    super('EXTRACTION_MALFORMED', message, { details: { attempts } });
    this.name = 'ExtractionMalformedError';
    this.attempts = attempts;
    this.rawResponse = rawResponse ?? '';
    this.responsePreview = (rawResponse ?? '').substring(0, 500);
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('CONFIGURATION_ERROR', message, { details });
    this.name = 'ConfigurationError';
  }
}

export class InvalidTransitionError extends PipelineError {
  constructor(from: string, to: string) {
    super('INVALID_TRANSITION', `Illegal job transition ${from} -> ${to}`, { details: { from, to } });
    this.name = 'InvalidTransitionError';
  }
}

/**
 * HTTP status of an SDK error: `status` (OpenAI), `statusCode` (Azure) or
 * `$metadata.httpStatusCode` (AWS).
 */
function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;

  if ('status' in error) {
    const status = error.status;
    if (typeof status === 'number') return status;
  }
  if ('statusCode' in error) {
    const statusCode = error.statusCode;
    if (typeof statusCode === 'number') return statusCode;
  }
  if ('$metadata' in error) {
    const metadata = error.$metadata;
    if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata) {
      const httpStatusCode = metadata.httpStatusCode;
      if (typeof httpStatusCode === 'number') return httpStatusCode;
    }
  }
  return undefined;
}

/**
 * Map an SDK or network error from a provider call onto the taxonomy.
 * 408/429/5xx, missing status (connection, timeout) -> unavailable; other 4xx -> rejected.
 */
export function toProviderError(error: unknown, provider: string): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const status = statusOf(error);

  if (status !== undefined && status >= 400 && status < 500 && status !== 408 && status !== 429) {
    return new ProviderRejectedError(provider, `HTTP ${status}: ${message}`, error);
  }

  return new ProviderUnavailableError(provider, message, error);
}
