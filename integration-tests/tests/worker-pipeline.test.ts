/**
 * Pipeline Worker Helper Tests
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { DocumentReceivedJob, JobOutcome } from '@docintake/shared';
import { CancellationRegistry, type CancellationStore } from '../../services/worker-pipeline/src/lib/cancellation';
import {
  readRawDocument,
  resolveRawUri,
  storeRawDocument,
} from '../../services/worker-pipeline/src/lib/object-store';
import { processDocument } from '../../services/worker-pipeline/src/lib/process-document';
import { BANK_RECEIPT_TEXT, FakeProvider, RoutingBackend, buildTestPipeline, classificationReply } from './helpers';

/** Shared store as every replica would see it. */
class MemoryCancellationStore implements CancellationStore {
  readonly requests = new Map<string, Date>();
  readonly finished = new Set<string>();

  async isFinished(jobId: string): Promise<boolean> {
    return this.finished.has(jobId);
  }

  async request(jobId: string, expiresAt: Date): Promise<void> {
    this.requests.set(jobId, expiresAt);
  }

  async expiryOf(jobId: string): Promise<Date | undefined> {
    return this.requests.get(jobId);
  }

  async clear(jobId: string): Promise<void> {
    this.requests.delete(jobId);
  }
}

describe('CancellationRegistry', () => {
  const start = new Date('2024-03-10T12:00:00.000Z');

  it('makes a request visible to every replica sharing the store', async () => {
    const store = new MemoryCancellationStore();
    const consumer = new CancellationRegistry(store, { ttlMs: 60000, now: () => start });
    const runner = new CancellationRegistry(store, { ttlMs: 60000, now: () => start });

    await expect(consumer.cancel('job-1')).resolves.toBe(true);

    await expect(runner.isCancelled('job-1')).resolves.toBe(true);
    await expect(runner.isCancelled('job-2')).resolves.toBe(false);
    expect(store.requests.get('job-1')?.toISOString()).toBe('2024-03-10T12:01:00.000Z');

    await runner.clear('job-1');
    await expect(consumer.isCancelled('job-1')).resolves.toBe(false);
  });

  it('ignores requests for finished jobs', async () => {
    const store = new MemoryCancellationStore();
    store.finished.add('already-finished');
    const registry = new CancellationRegistry(store, { ttlMs: 60000, now: () => start });

    await expect(registry.cancel('already-finished')).resolves.toBe(false);
    await expect(registry.isCancelled('already-finished')).resolves.toBe(false);
    expect(store.requests.size).toBe(0);
  });

  it('drops expired requests', async () => {
    const store = new MemoryCancellationStore();
    let now = start;
    const registry = new CancellationRegistry(store, { ttlMs: 60000, now: () => now });

    await registry.cancel('job-unknown');
    now = new Date('2024-03-10T12:01:00.000Z');

    await expect(registry.isCancelled('job-unknown')).resolves.toBe(false);
    expect(store.requests.has('job-unknown')).toBe(false);
  });
});

describe('processDocument', () => {
  const job: DocumentReceivedJob = {
    correlation_id: 'corr-1',
    document_id: 'doc-1',
    raw_uri: 'file:///object-store/doc-1.pdf',
    mime_type: 'application/pdf',
    caller_id: 'test-caller',
    source_filename: 'recibo.pdf',
    received_at: '2024-03-10T12:00:00.000Z',
  };

  function pipeline() {
    return buildTestPipeline({
      providers: [new FakeProvider({ name: 'primary', text: BANK_RECEIPT_TEXT, score: 0.9 })],
      backend: new RoutingBackend([classificationReply('Comprovante Bancário', 0.93)], ['{}']),
    });
  }

  const missing = async (): Promise<Buffer> => {
    throw new Error('ENOENT: no such file');
  };

  it('runs the stored bytes through the pipeline and clears cancellation', async () => {
    const { orchestrator } = pipeline();
    const settled: string[] = [];

    const outcome: JobOutcome = await processDocument(
      job,
      { number: 1, maxAttempts: 3 },
      {
        orchestrator,
        readRaw: async () => Buffer.from(BANK_RECEIPT_TEXT),
        onSettled: async (documentId) => {
          settled.push(documentId);
        },
      }
    );

    expect(outcome).toMatchObject({ jobId: 'doc-1', correlationId: 'corr-1', state: 'completed' });
    expect(settled).toEqual(['doc-1']);
  });

  it('rethrows a read failure while retries remain', async () => {
    const { orchestrator, persistence } = pipeline();
    const settled: string[] = [];

    await expect(
      processDocument(
        job,
        { number: 2, maxAttempts: 3 },
        {
          orchestrator,
          readRaw: missing,
          onSettled: async (documentId) => {
            settled.push(documentId);
          },
        }
      )
    ).rejects.toThrow('ENOENT: no such file');

    expect(persistence.snapshots).toHaveLength(0);
    expect(settled).toEqual([]);
  });

  it('records conversion_failed on the final attempt', async () => {
    const { orchestrator, persistence } = pipeline();

    const outcome = await processDocument(job, { number: 3, maxAttempts: 3 }, { orchestrator, readRaw: missing });

    expect(outcome.state).toBe('conversion_failed');
    expect(outcome.failure).toEqual({
      reason: 'raw_document_unavailable',
      message: 'ENOENT: no such file',
      stage: 'received',
    });
    expect(persistence.states()).toEqual(['received', 'conversion_failed']);
  });
});

describe('object store', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'docintake-store-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('resolves file URIs and store-relative paths', () => {
    expect(resolveRawUri('file:///data/doc.pdf', '/object-store')).toBe('/data/doc.pdf');
    expect(resolveRawUri('/data/doc.pdf', '/object-store')).toBe('/data/doc.pdf');
    expect(resolveRawUri('raw/doc.pdf', '/object-store')).toBe('/object-store/raw/doc.pdf');
  });

  it('stores a copy under the document id and reads it back', async () => {
    const source = path.join(root, 'Recibo.TXT');
    await fs.writeFile(source, 'Valor: R$ 1.500,00');
    const storeDir = path.join(root, 'store');

    const uri = await storeRawDocument(source, 'doc-1', storeDir);

    expect(uri).toBe(`file://${path.join(storeDir, 'doc-1.txt')}`);
    const bytes = await readRawDocument(uri, storeDir);
    expect(bytes.toString('utf-8')).toBe('Valor: R$ 1.500,00');
  });
});
