/**
 * JSON Schema Validation
 *
 * Ajv validation for the document-type catalog file and for extraction
 * records, plus the OpenAI Structured Outputs schemas derived from the
 * same catalog.
 */

import Ajv2020, { type JSONSchemaType, type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import type { DocumentTypeDescriptor, ExtractionRecord } from './types';
import { UNCLASSIFIED } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});
addFormats(ajv);

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function formatErrors(validate: ValidateFunction): string[] {
  return (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`);
}

// ============================================================================
// Catalog File
// ============================================================================

export interface CatalogFieldEntry {
  name: string;
  description: string;
  mandatory: boolean;
}

export interface CatalogTypeEntry {
  name: string;
  description: string;
  fields: CatalogFieldEntry[];
}

export interface CatalogFile {
  version: string;
  documentTypes: CatalogTypeEntry[];
}

const catalogFileSchema: JSONSchemaType<CatalogFile> = {
  type: 'object',
  additionalProperties: false,
  required: ['version', 'documentTypes'],
  properties: {
    version: { type: 'string' },
    documentTypes: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['name', 'description', 'fields'],
        properties: {
          name: { type: 'string', minLength: 1 },
          description: { type: 'string' },
          fields: {
            type: 'array',
            minItems: 1,
            items: {
              type: 'object',
              additionalProperties: false,
              required: ['name', 'description', 'mandatory'],
              properties: {
                name: { type: 'string', pattern: '^[a-z][a-z0-9_]*$' },
                description: { type: 'string' },
                mandatory: { type: 'boolean' },
              },
            },
          },
        },
      },
    },
  },
};

export const validateCatalogFile = ajv.compile<CatalogFile>(catalogFileSchema);

export function catalogFileErrors(): string[] {
  return formatErrors(validateCatalogFile);
}

// ============================================================================
// Extraction Records
// ============================================================================

/**
 * JSON schema of the `fields` object of a record for one document type:
 * every declared field present as a string, nothing else.
 */
export function buildRecordSchema(descriptor: DocumentTypeDescriptor): Record<string, unknown> {
  const properties: Record<string, unknown> = {};
  for (const field of descriptor.schema.fields) {
    properties[field.name] = { type: 'string' };
  }

  return {
    type: 'object',
    additionalProperties: false,
    required: descriptor.schema.fields.map((f) => f.name),
    properties,
  };
}

const recordValidators = new WeakMap<DocumentTypeDescriptor, ValidateFunction>();

function recordValidatorFor(descriptor: DocumentTypeDescriptor): ValidateFunction {
  let validate = recordValidators.get(descriptor);
  if (!validate) {
    validate = ajv.compile(buildRecordSchema(descriptor));
    recordValidators.set(descriptor, validate);
  }
  return validate;
}

/**
 * Validate an ExtractionRecord's fields against its type's schema
 */
export function validateExtractionRecord(
  record: ExtractionRecord,
  descriptor: DocumentTypeDescriptor
): ValidationResult {
  if (record.documentType !== descriptor.name) {
    return { valid: false, errors: [`/documentType: expected ${descriptor.name}, got ${record.documentType}`] };
  }

  const validate = recordValidatorFor(descriptor);
  if (!validate(record.fields)) {
    const errors = formatErrors(validate);
    logger.warn('ExtractionRecord validation failed', { document_type: descriptor.name, errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

// ============================================================================
// OpenAI Structured Outputs
// ============================================================================

export interface JsonSchemaFormat {
  name: string;
  strict: boolean;
  schema: Record<string, unknown>;
}

/**
 * JSON Schema for classification response (OpenAI Structured Outputs)
 */
export function buildClassificationSchema(typeNames: string[]): JsonSchemaFormat {
  return {
    name: 'document_classification',
    strict: true,
    schema: {
      type: 'object',
      additionalProperties: false,
      required: ['document_type', 'confidence'],
      properties: {
        document_type: {
          type: 'string',
          enum: [...typeNames, UNCLASSIFIED],
          description: 'Exact catalog name of the document type',
        },
        confidence: {
          type: 'number',
          description: 'Confidence score from 0 to 1',
        },
      },
    },
  };
}

/**
 * JSON Schema for field extraction of one document type
 */
export function buildExtractionSchema(descriptor: DocumentTypeDescriptor): JsonSchemaFormat {
  const properties: Record<string, unknown> = {};
  for (const field of descriptor.schema.fields) {
    properties[field.name] = { type: 'string', description: field.description };
  }

  return {
    name: 'document_extraction',
    strict: true,
    schema: {
      type: 'object',
      additionalProperties: false,
      required: descriptor.schema.fields.map((f) => f.name),
      properties,
    },
  };
}
