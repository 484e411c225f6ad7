/**
 * Tests for the config loader.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { ConfigError } from '../execution/errors.js';
import {
  ConfigValidationError,
  loadConfig,
  mergeWithDefaults,
  resolveHostHint,
  validateConfig,
} from './loader.js';
import { DEFAULT_CONFIG } from './types.js';

describe('loadConfig', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = join(tmpdir(), `ot2-runner-config-${randomUUID()}`);
    await mkdir(workDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('merges file values over the defaults', async () => {
    const configPath = join(workDir, 'ot2-runner.yaml');
    await writeFile(
      configPath,
      ['robot:', '  port: 8080', 'polling:', '  timeoutSeconds: 30', 'logging:', '  level: debug', ''].join('\n'),
    );

    const { config, source } = await loadConfig({ configPath, env: {} });

    expect(source).toBe(configPath);
    expect(config.robot).toEqual({ port: 8080, apiVersion: '2', probeTimeoutMs: 2000, requestTimeoutMs: 30000 });
    expect(config.polling).toEqual({ intervalMs: 2000, timeoutSeconds: 30 });
    expect(config.logging.level).toBe('debug');
    expect(config.discovery).toEqual(DEFAULT_CONFIG.discovery);
  });

  it('finds the file through OT2_RUNNER_CONFIG', async () => {
    const configPath = join(workDir, 'runner.yaml');
    await writeFile(configPath, 'discovery:\n  wellKnownHost: ot2-lab.local\n');

    const { config } = await loadConfig({ env: { OT2_RUNNER_CONFIG: configPath } });

    expect(config.discovery.wellKnownHost).toBe('ot2-lab.local');
  });

  it('substitutes environment variables with defaults', async () => {
    const configPath = join(workDir, 'ot2-runner.yaml');
    await writeFile(
      configPath,
      [
        'smokeTest:',
        '  script: ${SMOKE_DIR}/ot2_pipette_smoke_test.py',
        '  requiredModule: ${SMOKE_MODULE:-opentrons}',
        '',
      ].join('\n'),
    );

    const { config } = await loadConfig({ configPath, env: { SMOKE_DIR: '/opt/ot2' } });

    expect(config.smokeTest).toEqual({ script: '/opt/ot2/ot2_pipette_smoke_test.py', requiredModule: 'opentrons' });
  });

  it('reads substituted integers as numbers', async () => {
    const configPath = join(workDir, 'ot2-runner.yaml');
    await writeFile(
      configPath,
      ['robot:', '  port: ${ROBOT_PORT:-31950}', 'polling:', '  timeoutSeconds: ${RUN_TIMEOUT}', ''].join('\n'),
    );

    const { config } = await loadConfig({ configPath, env: { RUN_TIMEOUT: '90' } });

    expect(config.robot.port).toBe(31950);
    expect(config.polling.timeoutSeconds).toBe(90);
  });

  it('rejects a substituted value that is not an integer', async () => {
    const configPath = join(workDir, 'ot2-runner.yaml');
    await writeFile(configPath, 'robot:\n  requestTimeoutMs: ${REQUEST_TIMEOUT:-soon}\n');

    await expect(loadConfig({ configPath, env: {} })).rejects.toThrow(
      "Config validation error at 'robot.requestTimeoutMs': requestTimeoutMs must be a positive integer",
    );
  });

  it('uses the defaults for an empty file', async () => {
    const configPath = join(workDir, 'ot2-runner.yaml');
    await writeFile(configPath, '');

    const { config } = await loadConfig({ configPath, env: {} });

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('fails when a named file does not exist', async () => {
    const configPath = join(workDir, 'missing.yaml');

    await expect(loadConfig({ configPath, env: {} })).rejects.toThrow(`Config file not found: ${configPath}`);
  });

  it('ignores a blank OT2_RUNNER_CONFIG', async () => {
    const { config, source } = await loadConfig({ env: { OT2_RUNNER_CONFIG: '  ' } });

    expect(source).toBeUndefined();
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('fails with ConfigError when the named path is a directory', async () => {
    const error = await loadConfig({ configPath: workDir, env: {} }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError ? [error.code, error.message] : []).toEqual([
      'CONFIG_ERROR',
      `Config path is not a file: ${workDir}`,
    ]);
  });

  it('fails on invalid YAML', async () => {
    const configPath = join(workDir, 'ot2-runner.yaml');
    await writeFile(configPath, 'robot: [unclosed\n');

    const error = await loadConfig({ configPath, env: {} }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError ? error.message : '').toMatch(/^Failed to parse config file: /);
  });

  it('reports the path of an invalid value', async () => {
    const configPath = join(workDir, 'ot2-runner.yaml');
    await writeFile(configPath, 'robot:\n  port: 70000\n');

    await expect(loadConfig({ configPath, env: {} })).rejects.toThrow(
      "Config validation error at 'robot.port': port must be between 1 and 65535",
    );
  });
});

describe('validateConfig', () => {
  it('accepts an empty object', () => {
    expect(() => validateConfig({})).not.toThrow();
  });

  it('rejects a section that is not an object', () => {
    expect(() => validateConfig({ polling: 5 })).toThrow(
      new ConfigValidationError('must be an object', 'polling', 5),
    );
  });

  it('rejects a negative timeout but allows zero', () => {
    expect(() => validateConfig({ polling: { timeoutSeconds: 0 } })).not.toThrow();
    expect(() => validateConfig({ polling: { timeoutSeconds: -1 } })).toThrow(
      "Config validation error at 'polling.timeoutSeconds': timeoutSeconds must be a non-negative integer",
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => validateConfig({ logging: { level: 'verbose' } })).toThrow(
      "Config validation error at 'logging.level': level must be one of: debug, info, warn, error, silent",
    );
  });

  it('rejects a blank smoke-test interpreter', () => {
    expect(() => validateConfig({ smokeTest: { pythonBin: '' } })).toThrow(ConfigValidationError);
  });

  it('rejects a blank discovery name', () => {
    expect(() => validateConfig({ discovery: { wellKnownHost: '  ' } })).toThrow(
      "Config validation error at 'discovery.wellKnownHost': wellKnownHost must be a non-empty string",
    );
  });
});

describe('mergeWithDefaults', () => {
  it('keeps defaults for the keys a section leaves out', () => {
    const config = mergeWithDefaults({ smokeTest: { pythonBin: '/opt/conda/bin/python' } });

    expect(config.smokeTest).toEqual({
      script: 'ot2_pipette_smoke_test.py',
      pythonBin: '/opt/conda/bin/python',
      requiredModule: 'opentrons',
    });
  });
});

describe('resolveHostHint', () => {
  it('prefers the flag over OT2_HOST', () => {
    expect(resolveHostHint('10.0.0.5', { OT2_HOST: '169.254.1.1' })).toBe('10.0.0.5');
  });

  it('falls back to OT2_HOST', () => {
    expect(resolveHostHint(undefined, { OT2_HOST: ' 169.254.1.1 ' })).toBe('169.254.1.1');
  });

  it('treats blank values as absent', () => {
    expect(resolveHostHint('  ', { OT2_HOST: '' })).toBeUndefined();
    expect(resolveHostHint('', { OT2_HOST: 'ot2.local' })).toBe('ot2.local');
  });
});
