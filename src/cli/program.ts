import { Command, CommanderError, Option } from 'commander';
import { loadConfig, resolveHostHint } from '../config/loader.js';
import type { AppConfig, LogLevel } from '../config/types.js';
import type { NeighborTableSource } from '../discovery/NeighborTable.js';
import { RobotRunError } from '../execution/errors.js';
import type { Clock } from '../execution/RunLifecycleController.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { ProtocolRunOrchestrator } from '../orchestrator/ProtocolRunOrchestrator.js';
import type { CommandRunner } from '../process/CommandRunner.js';
import type { FetchLike } from '../robot/types.js';
import type { MountSelection } from '../smoke/SmokeTestLauncher.js';
import {
  assertProtocolFile,
  parseLogLevel,
  parseMount,
  parsePort,
  parseTimeoutSeconds,
} from './options.js';

/**
 * Package version - kept in step with package.json
 */
const VERSION = '0.1.0';

export type CliDependencies = {
  env: Record<string, string | undefined>;
  /** Builds the process logger once the level is known */
  createLogger?: (level: LogLevel) => Logger;
  fetchFn?: FetchLike;
  runner?: CommandRunner;
  neighborTable?: NeighborTableSource;
  clock?: Clock;
  writeOut?: (text: string) => void;
  writeErr?: (text: string) => void;
};

type GlobalOptions = {
  config?: string;
  port?: number;
  logLevel?: LogLevel;
};

type CommandContext = {
  config: AppConfig;
  orchestrator: ProtocolRunOrchestrator;
};

/**
 * Holds the logger of the current invocation so failures raised before or
 * after command setup are reported the same way.
 */
export class CliSession {
  private logger: Logger | undefined;

  constructor(private readonly deps: CliDependencies) {}

  private makeLogger(level: LogLevel): Logger {
    return this.deps.createLogger ? this.deps.createLogger(level) : createLogger({ level });
  }

  async prepare(command: Command): Promise<CommandContext> {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const { config: loaded } = await loadConfig({
      ...(globals.config ? { configPath: globals.config } : {}),
      env: this.deps.env,
    });
    const config: AppConfig = {
      ...loaded,
      robot: { ...loaded.robot, ...(globals.port !== undefined ? { port: globals.port } : {}) },
      logging: { level: globals.logLevel ?? loaded.logging.level },
    };
    const logger = this.makeLogger(config.logging.level);
    this.logger = logger;

    const orchestrator = new ProtocolRunOrchestrator(config, {
      logger,
      ...(this.deps.fetchFn ? { fetchFn: this.deps.fetchFn } : {}),
      ...(this.deps.runner ? { runner: this.deps.runner } : {}),
      ...(this.deps.neighborTable ? { neighborTable: this.deps.neighborTable } : {}),
      ...(this.deps.clock ? { clock: this.deps.clock } : {}),
      env: this.deps.env,
    });
    return { config, orchestrator };
  }

  reportFailure(err: unknown): void {
    const logger = this.logger ?? this.makeLogger('info');
    if (err instanceof RobotRunError) {
      logger.error({ code: err.code, ...err.details() }, err.message);
      return;
    }
    if (err instanceof CommanderError) {
      const message = err.code === 'commander.help' ? 'A command is required' : err.message;
      logger.error({ code: 'CONFIG_ERROR', commanderCode: err.code }, message);
      return;
    }
    logger.error({ err }, err instanceof Error ? err.message : String(err));
  }
}

/**
 * Create and configure the CLI program.
 */
export function createProgram(deps: CliDependencies, session: CliSession = new CliSession(deps)): Command {
  const program = new Command();

  program
    .name('ot2-runner')
    .description('Run protocols on a USB-connected OT-2 over the robot-server HTTP API')
    .version(VERSION, '-v, --version', 'Output the current version')
    .option('--config <path>', 'Config file (default: $OT2_RUNNER_CONFIG or ./ot2-runner.yaml)')
    .option('--port <port>', 'robot-server port (default: 31950)', parsePort)
    .option('--log-level <level>', 'debug, info, warn, error or silent', parseLogLevel)
    .showHelpAfterError()
    .exitOverride();

  if (deps.writeOut || deps.writeErr) {
    program.configureOutput({
      ...(deps.writeOut ? { writeOut: deps.writeOut } : {}),
      ...(deps.writeErr ? { writeErr: deps.writeErr } : {}),
    });
  }

  program
    .command('run')
    .description('Upload a protocol, start it and wait for it to finish')
    .requiredOption('--protocol <path>', 'Protocol file to upload and run')
    .option('--host <host>', 'OT-2 host or IP (default: $OT2_HOST, else auto-discover)')
    .addOption(
      new Option('--timeout <seconds>', 'Max seconds to wait for completion (default: 600)').argParser(parseTimeoutSeconds),
    )
    .action(async (options: { protocol: string; host?: string; timeout?: number }, command: Command) => {
      const protocolPath = assertProtocolFile(options.protocol);
      const { config, orchestrator } = await session.prepare(command);
      const host = resolveHostHint(options.host, deps.env);
      await orchestrator.runProtocol({
        protocolPath,
        timeoutSeconds: options.timeout ?? config.polling.timeoutSeconds,
        ...(host ? { host } : {}),
      });
    });

  program
    .command('smoke-test')
    .description('Resolve the robot and hand it to the pipette smoke-test program')
    .addOption(
      new Option('--mount <mount>', 'Start mount: left, right, or both').argParser(parseMount).default('both'),
    )
    .option('--host <host>', 'OT-2 host or IP (default: $OT2_HOST, else auto-discover)')
    .action(async (options: { mount: MountSelection; host?: string }, command: Command) => {
      const { orchestrator } = await session.prepare(command);
      const host = resolveHostHint(options.host, deps.env);
      await orchestrator.runSmokeTest({
        mount: options.mount,
        ...(host ? { host } : {}),
      });
    });

  program
    .command('resolve-host')
    .description('Print the reachable robot host')
    .option('--host <host>', 'Host to verify instead of auto-discovering')
    .action(async (options: { host?: string }, command: Command) => {
      const { orchestrator } = await session.prepare(command);
      const endpoint = await orchestrator.resolveHost(resolveHostHint(options.host, deps.env));
      (deps.writeOut ?? ((text: string) => process.stdout.write(text)))(`${endpoint.host}\n`);
    });

  return program;
}

/**
 * Run the CLI program and return the process exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
  const session = new CliSession(deps);
  const program = createProgram(deps, session);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    // --help and --version surface as CommanderError with exit code 0
    if (error instanceof CommanderError && error.exitCode === 0) {
      return 0;
    }
    session.reportFailure(error);
    return 1;
  }
}
