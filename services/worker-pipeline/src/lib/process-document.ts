/**
 * document_received Handling
 *
 * Reads the raw bytes and runs the orchestrator. A read failure is retried by
 * BullMQ; on the last attempt the job is recorded as conversion_failed
 * instead, so every received document ends with a stored terminal state.
 */

import {
  logger,
  runWithContextAsync,
  type DocumentReceivedJob,
  type JobOutcome,
  type PipelineOrchestrator,
} from '@docintake/shared';

const log = logger.child({ service: 'worker-pipeline' });

export interface DocumentAttempt {
  /** 1-based attempt number */
  number: number;
  maxAttempts: number;
}

export interface ProcessDocumentDependencies {
  orchestrator: Pick<PipelineOrchestrator, 'run' | 'recordUnreadable'>;
  readRaw: (rawUri: string) => Promise<Buffer>;
  /** Called once the job has a terminal outcome */
  onSettled?: (documentId: string) => Promise<void>;
}

export async function processDocument(
  data: DocumentReceivedJob,
  attempt: DocumentAttempt,
  deps: ProcessDocumentDependencies
): Promise<JobOutcome> {
  const { correlation_id, document_id, raw_uri, mime_type, caller_id, source_filename } = data;
  const input = {
    jobId: document_id,
    correlationId: correlation_id,
    callerId: caller_id,
    mimeType: mime_type,
    filename: source_filename,
    rawUri: raw_uri,
  };

  return runWithContextAsync({ correlationId: correlation_id, jobId: document_id, callerId: caller_id }, async () => {
    log.info('Processing document_received', { raw_uri, mime_type, attempt: attempt.number });

    let bytes: Buffer;
    try {
      bytes = await deps.readRaw(raw_uri);
    } catch (error) {
      if (attempt.number < attempt.maxAttempts) {
        log.warn('Raw document read failed, will retry', {
          raw_uri,
          attempt: attempt.number,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }
      log.error('Raw document unreadable after final attempt', error, { raw_uri });
      const failed = await deps.orchestrator.recordUnreadable(input, error);
      await settle(document_id, deps);
      return failed;
    }

    const outcome = await deps.orchestrator.run({ ...input, bytes });
    await settle(document_id, deps);

    log.info('Document finished', {
      state: outcome.state,
      flags: outcome.flags,
      reason: outcome.failure?.reason,
      document_type: outcome.documentType,
    });
    return outcome;
  });
}

async function settle(documentId: string, deps: ProcessDocumentDependencies): Promise<void> {
  if (!deps.onSettled) return;
  try {
    await deps.onSettled(documentId);
  } catch (error) {
    log.error('Failed to clear cancellation request', error, { document_id: documentId });
  }
}
