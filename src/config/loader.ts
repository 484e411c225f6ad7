/**
 * Configuration loader for the OT-2 runner.
 *
 * Loads config from an optional YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { statSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from '../execution/errors.js';
import type {
  AppConfig,
  DiscoveryConfig,
  LoggingConfig,
  PollingConfig,
  RobotConfig,
  SmokeTestConfig,
} from './types.js';
import { DEFAULT_CONFIG, LOG_LEVELS } from './types.js';

export const CONFIG_PATH_ENV = 'OT2_RUNNER_CONFIG';
export const HOST_ENV = 'OT2_HOST';
export const DEFAULT_CONFIG_PATH = './ot2-runner.yaml';

type Env = Record<string, string | undefined>;

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: env OT2_RUNNER_CONFIG or './ot2-runner.yaml') */
  configPath?: string;
  /** Environment used for path lookup and ${VAR} substitution */
  env?: Env;
}

export interface LoadedConfig {
  config: AppConfig;
  /** Absolute path of the file that was read, absent when defaults were used */
  source?: string;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends ConfigError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
  }

  override details(): Record<string, unknown> {
    return { path: this.path, value: this.value };
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

function substituteEnvVars(value: string, env: Env): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    return defaultValue ?? '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown, env: Env): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVarsRecursive(item, env));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, env);
    }
    return result;
  }
  return obj;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function asSection(config: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const section = config[key];
  if (section === undefined) return undefined;
  if (!isPlainObject(section)) {
    throw new ConfigValidationError('must be an object', key, section);
  }
  return section;
}

const DIGITS = /^\s*\d+\s*$/;

/**
 * `${VAR}` substitution always yields a string; integer fields accept a
 * string of digits and store it as a number.
 */
function coerceInteger(c: Record<string, unknown>, key: string): unknown {
  const value = c[key];
  if (typeof value === 'string' && DIGITS.test(value)) {
    c[key] = Number.parseInt(value, 10);
  }
  return c[key];
}

function validatePositiveInteger(c: Record<string, unknown>, key: string, path: string, max?: number): void {
  const value = coerceInteger(c, key);
  if (value === undefined) return;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || (max !== undefined && value > max)) {
    const range = max !== undefined ? `between 1 and ${max}` : 'a positive integer';
    throw new ConfigValidationError(`${key} must be ${range}`, `${path}.${key}`, value);
  }
}

function validateNonEmptyString(c: Record<string, unknown>, key: string, path: string): void {
  const value = c[key];
  if (value === undefined) return;
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigValidationError(`${key} must be a non-empty string`, `${path}.${key}`, value);
  }
}

function validateRobotConfig(c: Record<string, unknown>, path = 'robot'): void {
  validatePositiveInteger(c, 'port', path, 65535);
  validateNonEmptyString(c, 'apiVersion', path);
  validatePositiveInteger(c, 'probeTimeoutMs', path);
  validatePositiveInteger(c, 'requestTimeoutMs', path);
}

function validateDiscoveryConfig(c: Record<string, unknown>, path = 'discovery'): void {
  validateNonEmptyString(c, 'wellKnownHost', path);
  validateNonEmptyString(c, 'linkLocalDomainSuffix', path);
  validateNonEmptyString(c, 'linkLocalSubnetPrefix', path);
  validatePositiveInteger(c, 'neighborCommandTimeoutMs', path);
}

function validatePollingConfig(c: Record<string, unknown>, path = 'polling'): void {
  validatePositiveInteger(c, 'intervalMs', path);
  const timeout = coerceInteger(c, 'timeoutSeconds');
  if (timeout !== undefined && (typeof timeout !== 'number' || !Number.isInteger(timeout) || timeout < 0)) {
    throw new ConfigValidationError('timeoutSeconds must be a non-negative integer', `${path}.timeoutSeconds`, timeout);
  }
}

function validateSmokeTestConfig(c: Record<string, unknown>, path = 'smokeTest'): void {
  validateNonEmptyString(c, 'script', path);
  validateNonEmptyString(c, 'pythonBin', path);
  validateNonEmptyString(c, 'requiredModule', path);
}

function validateLoggingConfig(c: Record<string, unknown>, path = 'logging'): void {
  const level = c['level'];
  if (level !== undefined && !LOG_LEVELS.some((candidate) => candidate === level)) {
    throw new ConfigValidationError(`level must be one of: ${LOG_LEVELS.join(', ')}`, `${path}.level`, level);
  }
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): asserts config is PartialAppConfig {
  if (!isPlainObject(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  const robot = asSection(config, 'robot');
  if (robot) validateRobotConfig(robot);

  const discovery = asSection(config, 'discovery');
  if (discovery) validateDiscoveryConfig(discovery);

  const polling = asSection(config, 'polling');
  if (polling) validatePollingConfig(polling);

  const smokeTest = asSection(config, 'smokeTest');
  if (smokeTest) validateSmokeTestConfig(smokeTest);

  const logging = asSection(config, 'logging');
  if (logging) validateLoggingConfig(logging);
}

export type PartialAppConfig = {
  robot?: Partial<RobotConfig>;
  discovery?: Partial<DiscoveryConfig>;
  polling?: Partial<PollingConfig>;
  smokeTest?: Partial<SmokeTestConfig>;
  logging?: Partial<LoggingConfig>;
};

/**
 * Merge a validated partial config over the defaults.
 */
export function mergeWithDefaults(partial: PartialAppConfig): AppConfig {
  return {
    robot: { ...DEFAULT_CONFIG.robot, ...partial.robot },
    discovery: { ...DEFAULT_CONFIG.discovery, ...partial.discovery },
    polling: { ...DEFAULT_CONFIG.polling, ...partial.polling },
    smokeTest: { ...DEFAULT_CONFIG.smokeTest, ...partial.smokeTest },
    logging: { ...DEFAULT_CONFIG.logging, ...partial.logging },
  };
}

/**
 * Load configuration from a YAML file.
 *
 * A missing file at the default path yields the defaults; a missing file that
 * was named explicitly is a ConfigError.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? {};
  // A blank path counts as not given
  const explicitPath = [options.configPath, env[CONFIG_PATH_ENV]]
    .map((candidate) => candidate?.trim())
    .find((candidate) => candidate !== undefined && candidate.length > 0);
  const absolutePath = resolve(explicitPath ?? DEFAULT_CONFIG_PATH);

  const stats = statSync(absolutePath, { throwIfNoEntry: false });
  if (!stats) {
    if (explicitPath !== undefined) {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    return { config: mergeWithDefaults({}) };
  }
  if (!stats.isFile()) {
    throw new ConfigError(`Config path is not a file: ${absolutePath}`);
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigError(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty file parses to null
  const substituted = substituteEnvVarsRecursive(parsed ?? {}, env);

  validateConfig(substituted);
  return { config: mergeWithDefaults(substituted), source: absolutePath };
}

/**
 * Pick the host hint: an explicit flag wins over the OT2_HOST environment
 * variable. Blank values count as absent.
 */
export function resolveHostHint(flag: string | undefined, env: Env): string | undefined {
  const fromFlag = flag?.trim();
  if (fromFlag) return fromFlag;
  const fromEnv = env[HOST_ENV]?.trim();
  return fromEnv ? fromEnv : undefined;
}
