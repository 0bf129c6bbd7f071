/**
 * Job State Machine
 *
 * received → converting → converted → classifying → classified →
 * extracting → extracted → completed, with a reviewable failure state per
 * stage and cancellation from any non-terminal state.
 */

import { InvalidTransitionError } from '../errors';
import type { JobState } from '../types';

const TRANSITIONS: Readonly<Record<JobState, readonly JobState[]>> = {
  received: ['converting', 'conversion_failed', 'cancelled'],
  converting: ['converted', 'conversion_failed', 'cancelled'],
  converted: ['classifying', 'classification_failed', 'cancelled'],
  classifying: ['classified', 'classification_failed', 'cancelled'],
  classified: ['extracting', 'extraction_failed', 'cancelled'],
  extracting: ['extracted', 'extraction_failed', 'cancelled'],
  extracted: ['completed', 'extraction_failed', 'cancelled'],
  completed: [],
  conversion_failed: [],
  classification_failed: [],
  extraction_failed: [],
  cancelled: [],
};

export const TERMINAL_STATES: readonly JobState[] = [
  'completed',
  'conversion_failed',
  'classification_failed',
  'extraction_failed',
  'cancelled',
];

export function isTerminal(state: JobState): boolean {
  return TRANSITIONS[state].length === 0;
}

export function canTransition(from: JobState, to: JobState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * @throws InvalidTransitionError when the move is not in the table
 */
export function assertTransition(from: JobState, to: JobState): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}
