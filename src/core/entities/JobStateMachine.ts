import { JobStatus } from './Job.js';
import { InvalidTransitionError } from '../errors/ResearchErrors.js';

/**
 * Valid status transitions of a research job.
 * queued -> researching -> generating -> completed, failed from any non-terminal state.
 */
const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['researching', 'failed'],
  researching: ['generating', 'failed'],
  generating: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function isTerminalStatus(status: JobStatus): boolean {
  return status === 'completed' || status === 'failed';
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Throws InvalidTransitionError unless `from -> to` is a valid edge
 */
export function assertTransition(from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}
