/**
 * Document Type Catalog
 *
 * The fixed set of Brazilian business documents the pipeline recognizes,
 * loaded once from JSON, validated with Ajv, and frozen.
 */

import fs from 'fs';
import { ConfigurationError } from './errors';
import { logger } from './logger';
import { catalogFileErrors, validateCatalogFile, type CatalogFile } from './schemas';
import type { DocumentTypeDescriptor, SchemaField } from './types';

export class DocumentTypeCatalog {
  private readonly byName: ReadonlyMap<string, DocumentTypeDescriptor>;

  constructor(
    readonly version: string,
    descriptors: DocumentTypeDescriptor[]
  ) {
    const byName = new Map<string, DocumentTypeDescriptor>();
    for (const descriptor of descriptors) {
      if (byName.has(descriptor.name)) {
        throw new ConfigurationError(`Duplicate document type in catalog: ${descriptor.name}`);
      }
      byName.set(descriptor.name, freezeDescriptor(descriptor));
    }
    this.byName = byName;
  }

  get names(): string[] {
    return Array.from(this.byName.keys());
  }

  get descriptors(): DocumentTypeDescriptor[] {
    return Array.from(this.byName.values());
  }

  get(name: string): DocumentTypeDescriptor | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  mandatoryFields(name: string): string[] {
    return this.get(name)?.schema.fields.filter((f) => f.mandatory).map((f) => f.name) ?? [];
  }
}

function freezeDescriptor(descriptor: DocumentTypeDescriptor): DocumentTypeDescriptor {
  const seen = new Set<string>();
  const fields: SchemaField[] = descriptor.schema.fields.map((field) => {
    if (seen.has(field.name)) {
      throw new ConfigurationError(`Duplicate field ${field.name} in ${descriptor.name}`);
    }
    seen.add(field.name);
    return Object.freeze({ ...field });
  });

  return Object.freeze({
    name: descriptor.name,
    description: descriptor.description,
    schema: Object.freeze({ fields: Object.freeze(fields) }),
  });
}

export function catalogFromFile(file: CatalogFile): DocumentTypeCatalog {
  return new DocumentTypeCatalog(
    file.version,
    file.documentTypes.map((entry) => ({
      name: entry.name,
      description: entry.description,
      schema: { fields: entry.fields },
    }))
  );
}

/**
 * Parse and validate catalog JSON. Throws ConfigurationError on any defect.
 */
export function parseCatalog(raw: string, source = 'inline'): DocumentTypeCatalog {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Document type catalog ${source} is not valid JSON`, {
      source,
      error: err instanceof Error ? err.message : String(err),
    });
  }

  if (!validateCatalogFile(parsed)) {
    throw new ConfigurationError(`Document type catalog ${source} failed validation`, {
      source,
      errors: catalogFileErrors(),
    });
  }

  return catalogFromFile(parsed);
}

export function loadCatalog(filePath: string): DocumentTypeCatalog {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read document type catalog at ${filePath}`, {
      path: filePath,
      error: err instanceof Error ? err.message : String(err),
    });
  }

  const catalog = parseCatalog(raw, filePath);
  logger.info('Document type catalog loaded', {
    path: filePath,
    version: catalog.version,
    types: catalog.names.length,
  });
  return catalog;
}
