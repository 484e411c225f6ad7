import type { AppConfig } from '../config/types.js';
import { HealthProbe } from '../discovery/HealthProbe.js';
import { HostResolver } from '../discovery/HostResolver.js';
import { SystemNeighborTable, type NeighborTableSource } from '../discovery/NeighborTable.js';
import { RunFailedError, TimeoutError } from '../execution/errors.js';
import {
  RunLifecycleController,
  type Clock,
  type RunOutcome,
} from '../execution/RunLifecycleController.js';
import { createModuleLogger, type Logger } from '../logging/logger.js';
import { ChildProcessRunner, type CommandRunner } from '../process/CommandRunner.js';
import { RobotApiClient } from '../robot/RobotApiClient.js';
import type { Endpoint, FetchLike } from '../robot/types.js';
import { SmokeTestLauncher, type MountSelection } from '../smoke/SmokeTestLauncher.js';

export type RunProtocolSettings = {
  protocolPath: string;
  host?: string;
  timeoutSeconds: number;
};

export type SmokeTestSettings = {
  host?: string;
  mount: MountSelection;
};

export type OrchestratorDependencies = {
  logger: Logger;
  fetchFn?: FetchLike;
  runner?: CommandRunner;
  neighborTable?: NeighborTableSource;
  clock?: Clock;
  /** Environment the smoke test reads PYTHON_BIN and CONDA_PREFIX from */
  env?: Record<string, string | undefined>;
};

/**
 * Entry point for the runner's flows. Built once from the loaded config; no
 * component below it reads the process environment.
 */
export class ProtocolRunOrchestrator {
  private readonly resolver: HostResolver;
  private readonly controller: RunLifecycleController;
  private readonly smokeTest: SmokeTestLauncher;
  private readonly logger: Logger;

  constructor(config: AppConfig, deps: OrchestratorDependencies) {
    const runner = deps.runner ?? new ChildProcessRunner();
    this.logger = createModuleLogger(deps.logger, 'orchestrator');

    this.resolver = new HostResolver({
      port: config.robot.port,
      discovery: config.discovery,
      neighborTable: deps.neighborTable ?? new SystemNeighborTable({
        runner,
        timeoutMs: config.discovery.neighborCommandTimeoutMs,
        logger: createModuleLogger(deps.logger, 'neighbor-table'),
      }),
      probe: new HealthProbe({
        port: config.robot.port,
        apiVersion: config.robot.apiVersion,
        timeoutMs: config.robot.probeTimeoutMs,
        ...(deps.fetchFn ? { fetchFn: deps.fetchFn } : {}),
      }),
      logger: createModuleLogger(deps.logger, 'host-resolver'),
    });

    this.controller = new RunLifecycleController({
      client: new RobotApiClient({
        apiVersion: config.robot.apiVersion,
        requestTimeoutMs: config.robot.requestTimeoutMs,
        ...(deps.fetchFn ? { fetchFn: deps.fetchFn } : {}),
      }),
      pollIntervalMs: config.polling.intervalMs,
      logger: createModuleLogger(deps.logger, 'run'),
      ...(deps.clock ? { clock: deps.clock } : {}),
    });

    this.smokeTest = new SmokeTestLauncher({
      config: config.smokeTest,
      runner,
      logger: createModuleLogger(deps.logger, 'smoke-test'),
      env: deps.env ?? {},
    });
  }

  async resolveHost(hint?: string): Promise<Endpoint> {
    return this.resolver.resolve(hint);
  }

  /**
   * Runs one protocol to a terminal status. Resolves only on success; a failed
   * or timed-out run is thrown as RunFailedError or TimeoutError.
   */
  async runProtocol(settings: RunProtocolSettings): Promise<Extract<RunOutcome, { kind: 'succeeded' }>> {
    const endpoint = await this.resolver.resolve(settings.host);
    const outcome = await this.controller.execute({
      endpoint,
      protocolPath: settings.protocolPath,
      timeoutSeconds: settings.timeoutSeconds,
    });

    switch (outcome.kind) {
      case 'succeeded':
        this.logger.info({ runId: outcome.runId, polls: outcome.polls }, `Run succeeded: ${outcome.runId}`);
        return outcome;
      case 'failed':
        throw new RunFailedError(outcome.runId, outcome.status, outcome.errors);
      case 'timed-out':
        throw new TimeoutError(outcome.runId, outcome.timeoutSeconds);
    }
  }

  /** Script and interpreter are checked before the robot is looked for. */
  async runSmokeTest(settings: SmokeTestSettings): Promise<void> {
    const plan = await this.smokeTest.prepare();
    const endpoint = await this.resolver.resolve(settings.host);
    await this.smokeTest.launch(plan, { endpoint, mount: settings.mount });
  }
}
