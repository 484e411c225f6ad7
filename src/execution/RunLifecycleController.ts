import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '../logging/logger.js';
import type { RobotApiClient } from '../robot/RobotApiClient.js';
import type { Endpoint } from '../robot/types.js';
import { classifyRunStatus, describeStatus, type TerminalFailureStatus } from './RunStatus.js';

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await sleep(ms);
  },
};

export type RunRequest = {
  endpoint: Endpoint;
  protocolPath: string;
  timeoutSeconds: number;
};

export type RunOutcome =
  | { kind: 'succeeded'; protocolId: string; runId: string; polls: number }
  | {
      kind: 'failed';
      protocolId: string;
      runId: string;
      status: TerminalFailureStatus;
      errors: unknown;
      polls: number;
    }
  | { kind: 'timed-out'; protocolId: string; runId: string; timeoutSeconds: number; polls: number };

export type RunLifecycleControllerOptions = {
  client: RobotApiClient;
  pollIntervalMs: number;
  logger: Logger;
  clock?: Clock;
};

/**
 * Drives one protocol through upload, run creation, `play` and status polling.
 *
 * Steps before polling are attempted once each. The timeout is checked after
 * every poll and never interrupts one in progress; a timed-out run keeps
 * running on the robot.
 */
export class RunLifecycleController {
  private readonly client: RobotApiClient;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: RunLifecycleControllerOptions) {
    this.client = options.client;
    this.pollIntervalMs = options.pollIntervalMs;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
  }

  async execute(request: RunRequest): Promise<RunOutcome> {
    const { endpoint } = request;

    this.logger.info({ protocolPath: request.protocolPath }, `Uploading protocol: ${request.protocolPath}`);
    const protocolId = await this.client.uploadProtocol(endpoint, request.protocolPath);
    this.logger.info({ protocolId }, `Uploaded protocol id: ${protocolId}`);

    this.logger.info('Creating run');
    const runId = await this.client.createRun(endpoint, protocolId);
    this.logger.info({ runId }, `Created run id: ${runId}`);

    this.logger.info({ runId }, 'Starting run');
    await this.client.postAction(endpoint, runId, 'play');

    return this.waitForTerminalStatus(endpoint, protocolId, runId, request.timeoutSeconds);
  }

  private async waitForTerminalStatus(
    endpoint: Endpoint,
    protocolId: string,
    runId: string,
    timeoutSeconds: number,
  ): Promise<RunOutcome> {
    const startedAt = this.clock.now();
    const timeoutMs = timeoutSeconds * 1000;
    let polls = 0;

    for (;;) {
      const state = await this.client.getRunStatus(endpoint, runId);
      polls += 1;

      const phase = classifyRunStatus(state.status);
      switch (phase.phase) {
        case 'succeeded':
          return { kind: 'succeeded', protocolId, runId, polls };
        case 'failed':
          return { kind: 'failed', protocolId, runId, status: phase.status, errors: state.errors, polls };
        case 'pending':
          this.logger.info({ runId, status: phase.status }, `Run status: ${describeStatus(phase.status)}`);
          break;
      }

      const elapsedMs = this.clock.now() - startedAt;
      if (elapsedMs > timeoutMs) {
        return { kind: 'timed-out', protocolId, runId, timeoutSeconds, polls };
      }

      await this.clock.sleep(this.pollIntervalMs);
    }
  }
}
