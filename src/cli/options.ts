import { statSync } from 'node:fs';
import { InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../config/types.js';
import { ConfigError } from '../execution/errors.js';
import { MOUNT_SELECTIONS, type MountSelection } from '../smoke/SmokeTestLauncher.js';

const timeoutSchema = z
  .string()
  .trim()
  .regex(/^[0-9]+$/, 'must be an integer number of seconds')
  .transform((value) => Number.parseInt(value, 10));

const portSchema = z
  .string()
  .trim()
  .regex(/^[0-9]+$/, 'must be an integer')
  .transform((value) => Number.parseInt(value, 10))
  .refine((value) => value >= 1 && value <= 65535, 'must be between 1 and 65535');

const mountSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(MOUNT_SELECTIONS, { errorMap: () => ({ message: 'use left, right, or both' }) }));

const logLevelSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(LOG_LEVELS, { errorMap: () => ({ message: `use one of: ${LOG_LEVELS.join(', ')}` }) }));

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, string>, value: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const message = parsed.error.issues[0]?.message ?? 'invalid value';
    throw new InvalidArgumentError(`${message} (got '${value}')`);
  }
  return parsed.data;
}

// commander argument parsers; they throw InvalidArgumentError for usage errors.

export function parseTimeoutSeconds(value: string): number {
  return parseWith(timeoutSchema, value);
}

export function parsePort(value: string): number {
  return parseWith(portSchema, value);
}

export function parseMount(value: string): MountSelection {
  return parseWith(mountSchema, value);
}

export function parseLogLevel(value: string): LogLevel {
  return parseWith(logLevelSchema, value);
}

/** The protocol artifact must be an existing regular file. */
export function assertProtocolFile(path: string): string {
  let isFile = false;
  try {
    isFile = statSync(path).isFile();
  } catch (err) {
    throw new ConfigError(`Protocol file not found: ${path} (${err instanceof Error ? err.message : String(err)})`);
  }
  if (!isFile) {
    throw new ConfigError(`Protocol file not found: ${path}`);
  }
  return path;
}
