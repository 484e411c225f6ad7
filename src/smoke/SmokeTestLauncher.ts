import { statSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { SmokeTestConfig } from '../config/types.js';
import { ConfigError, SmokeTestError } from '../execution/errors.js';
import type { Logger } from '../logging/logger.js';
import type { CommandRunner } from '../process/CommandRunner.js';
import type { Endpoint } from '../robot/types.js';

export const MOUNT_SELECTIONS = ['left', 'right', 'both'] as const;

export type MountSelection = (typeof MOUNT_SELECTIONS)[number];

export const PYTHON_BIN_ENV = 'PYTHON_BIN';
export const CONDA_PREFIX_ENV = 'CONDA_PREFIX';

const INTERPRETER_CHECK_TIMEOUT_MS = 30_000;

/** Checked in order after an activated conda environment. */
const PATH_INTERPRETERS = ['python', 'python3'];

/** What `prepare` found: the interpreter to use and the absolute script path. */
export type SmokeTestPlan = {
  python: string;
  script: string;
};

export type SmokeTestRequest = {
  endpoint: Endpoint;
  mount: MountSelection;
};

export type SmokeTestLauncherOptions = {
  config: SmokeTestConfig;
  runner: CommandRunner;
  logger: Logger;
  /** Environment consulted for PYTHON_BIN and CONDA_PREFIX */
  env: Record<string, string | undefined>;
};

/**
 * Hands a resolved robot and a mount selection to the external pipette
 * smoke-test program. The program owns the terminal while it runs because it
 * prompts the operator between steps.
 */
export class SmokeTestLauncher {
  private readonly config: SmokeTestConfig;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly env: Record<string, string | undefined>;

  constructor(options: SmokeTestLauncherOptions) {
    this.config = options.config;
    this.runner = options.runner;
    this.logger = options.logger;
    this.env = options.env;
  }

  /** Local prerequisites, checked before the robot is contacted. */
  async prepare(): Promise<SmokeTestPlan> {
    const script = resolve(this.config.script);
    if (!statSync(script, { throwIfNoEntry: false })?.isFile()) {
      throw new ConfigError(`Smoke test script not found: ${script}`);
    }
    return { python: await this.resolveInterpreter(), script };
  }

  /**
   * A pinned interpreter (PYTHON_BIN, else `smokeTest.pythonBin`) must work
   * or the launch fails. Otherwise the first of the conda environment's
   * python, `python` and `python3` that imports the required module wins.
   */
  async resolveInterpreter(): Promise<string> {
    const required = this.config.requiredModule;
    const pinned = this.env[PYTHON_BIN_ENV]?.trim() || this.config.pythonBin;
    if (pinned) {
      if (await this.canImport(pinned)) return pinned;
      throw new ConfigError(`Python interpreter '${pinned}' cannot import ${required}`);
    }

    for (const candidate of this.interpreterCandidates()) {
      if (await this.canImport(candidate)) return candidate;
    }
    throw new ConfigError(
      `No Python interpreter that can import ${required} was found. Activate your Opentrons environment first.`,
    );
  }

  async launch(plan: SmokeTestPlan, request: SmokeTestRequest): Promise<void> {
    const { endpoint, mount } = request;
    this.logger.info('Starting OT-2 smoke test over robot-server API.');
    this.logger.info({ mount }, `Selected start mount: ${mount}`);
    this.logger.info({ host: endpoint.host }, `Robot host: ${endpoint.host}`);
    this.logger.info({ python: plan.python }, `Using Python interpreter: ${plan.python}`);

    const result = await this.runner.run({
      command: plan.python,
      args: [plan.script],
      env: {
        OT2_HOST: endpoint.host,
        OT2_PORT: String(endpoint.port),
        OT2_SMOKE_TEST_MOUNT: mount,
      },
      stdio: 'inherit',
    });

    if (!result.ok) {
      const reason = result.stderr ? `: ${result.stderr}` : '';
      throw new SmokeTestError(`Smoke test exited with code ${result.exitCode}${reason}`, result.exitCode);
    }
    this.logger.info('Smoke test finished');
  }

  private interpreterCandidates(): string[] {
    const condaPrefix = this.env[CONDA_PREFIX_ENV]?.trim();
    return condaPrefix ? [join(condaPrefix, 'bin', 'python'), ...PATH_INTERPRETERS] : [...PATH_INTERPRETERS];
  }

  private async canImport(python: string): Promise<boolean> {
    const result = await this.runner.run({
      command: python,
      args: ['-c', `import ${this.config.requiredModule}`],
      timeoutMs: INTERPRETER_CHECK_TIMEOUT_MS,
    });
    this.logger.debug({ python, exitCode: result.exitCode, timedOut: result.timedOut }, 'Interpreter check');
    return result.ok;
  }
}
