export const SUCCEEDED_STATUS = 'succeeded';

/**
 * Statuses that end the wait with a failure. `paused` and `pause-requested`
 * belong here: the runner has no way to resume a run.
 */
export const TERMINAL_FAILURE_STATUSES = [
  'failed',
  'stopped',
  'blocked-by-open-door',
  'paused',
  'pause-requested',
] as const;

export type TerminalFailureStatus = (typeof TERMINAL_FAILURE_STATUSES)[number];

export type RunPhase =
  | { phase: 'succeeded' }
  | { phase: 'failed'; status: TerminalFailureStatus }
  | { phase: 'pending'; status: string };

function isTerminalFailure(status: string): status is TerminalFailureStatus {
  return TERMINAL_FAILURE_STATUSES.some((candidate) => candidate === status);
}

/** Any status outside the terminal set, including unseen and empty ones, is pending. */
export function classifyRunStatus(status: string): RunPhase {
  if (status === SUCCEEDED_STATUS) return { phase: 'succeeded' };
  if (isTerminalFailure(status)) return { phase: 'failed', status };
  return { phase: 'pending', status };
}

export function describeStatus(status: string): string {
  return status.length > 0 ? status : 'unknown';
}
