/**
 * Pipeline Persistence
 *
 * Job snapshots, the usage ledger and the processing log. The orchestrator
 * treats every call as best-effort.
 */

import type { UsageSink } from '../llm/types';
import type { JobSnapshot, JobState, LogDetail } from '../types';

export interface PipelinePersistence extends UsageSink {
  save(snapshot: JobSnapshot): Promise<void>;
  appendLog(correlationId: string, stage: JobState, detail: LogDetail): Promise<void>;
}
