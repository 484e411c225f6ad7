/**
 * Configuration types for the OT-2 runner.
 *
 * These types define the structure of `ot2-runner.yaml`. Every field has a
 * default, so the file itself is optional.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Top-level runner configuration.
 */
export interface AppConfig {
  robot: RobotConfig;
  discovery: DiscoveryConfig;
  polling: PollingConfig;
  smokeTest: SmokeTestConfig;
  logging: LoggingConfig;
}

/**
 * Robot control service settings.
 */
export interface RobotConfig {
  /** robot-server port (default: 31950) */
  port: number;
  /** Value of the `opentrons-version` header sent with every request (default: '2') */
  apiVersion: string;
  /** Per-probe timeout for `GET /health` in ms (default: 2000) */
  probeTimeoutMs: number;
  /** Time limit for each run API request, body included, in ms (default: 30000) */
  requestTimeoutMs: number;
}

/**
 * Host discovery settings.
 */
export interface DiscoveryConfig {
  /** mDNS name tried before any neighbor-table entry */
  wellKnownHost: string;
  /** Neighbor-table names ending in this suffix become candidates */
  linkLocalDomainSuffix: string;
  /** Neighbor-table IPv4 addresses starting with this prefix become candidates */
  linkLocalSubnetPrefix: string;
  /** Timeout for each neighbor-table command in ms */
  neighborCommandTimeoutMs: number;
}

/**
 * Run status polling settings.
 */
export interface PollingConfig {
  /** Sleep between status polls in ms (default: 2000) */
  intervalMs: number;
  /** Default wall-clock budget for a run in seconds (default: 600) */
  timeoutSeconds: number;
}

/**
 * External pipette smoke-test program.
 */
export interface SmokeTestConfig {
  /** Smoke-test script, relative to the working directory */
  script: string;
  /** Interpreter to use instead of searching; `PYTHON_BIN` in the environment wins */
  pythonBin?: string;
  /** Module an interpreter must be able to import to be accepted */
  requiredModule: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

export const DEFAULT_ROBOT_PORT = 31950;

export const DEFAULT_CONFIG: AppConfig = {
  robot: {
    port: DEFAULT_ROBOT_PORT,
    apiVersion: '2',
    probeTimeoutMs: 2_000,
    requestTimeoutMs: 30_000,
  },
  discovery: {
    wellKnownHost: 'opentrons.local',
    linkLocalDomainSuffix: '.local',
    linkLocalSubnetPrefix: '169.254.',
    neighborCommandTimeoutMs: 5_000,
  },
  polling: {
    intervalMs: 2_000,
    timeoutSeconds: 600,
  },
  smokeTest: {
    script: 'ot2_pipette_smoke_test.py',
    requiredModule: 'opentrons',
  },
  logging: {
    level: 'info',
  },
};
