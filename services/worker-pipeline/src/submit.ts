/**
 * Submit a local file to the pipeline.
 *
 * Usage: submit <file> [mime-type] [caller-id]
 *
 * Copies the file into the object store and enqueues document_received.
 */

import path from 'path';
import { ulid } from 'ulid';
import {
  config,
  logger,
  createQueue,
  QUEUE_NAMES,
  type DocumentReceivedJob,
} from '@docintake/shared';
import { storeRawDocument } from './lib/object-store';

const MIME_TYPES_BY_EXTENSION: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.txt': 'text/plain',
  '.md': 'text/markdown',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.bmp': 'image/bmp',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
};

async function submit(filePath: string, mimeType: string | undefined, callerId: string): Promise<void> {
  const resolvedMime = mimeType ?? MIME_TYPES_BY_EXTENSION[path.extname(filePath).toLowerCase()];
  if (!resolvedMime) {
    throw new Error(`Cannot infer MIME type of ${filePath}; pass it explicitly`);
  }

  const documentId = ulid();
  const rawUri = await storeRawDocument(filePath, documentId, config.objectStorePath);

  const payload: DocumentReceivedJob = {
    correlation_id: ulid(),
    document_id: documentId,
    raw_uri: rawUri,
    mime_type: resolvedMime,
    caller_id: callerId,
    source_filename: path.basename(filePath),
    received_at: new Date().toISOString(),
  };

  const queue = createQueue<DocumentReceivedJob>(QUEUE_NAMES.DOCUMENT_RECEIVED);
  try {
    await queue.add('document_received', payload, { jobId: documentId });
    logger.info('Submitted document', {
      document_id: documentId,
      correlation_id: payload.correlation_id,
      mime_type: resolvedMime,
      raw_uri: rawUri,
    });
  } finally {
    await queue.close();
  }
}

const [filePath, mimeType, callerId] = process.argv.slice(2);

if (!filePath) {
  logger.error('Usage: submit <file> [mime-type] [caller-id]');
  process.exit(2);
}

submit(filePath, mimeType, callerId ?? 'local-cli')
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    logger.error('Submit failed', error);
    process.exit(1);
  });
