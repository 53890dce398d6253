/**
 * Tracker configuration file support.
 *
 * Reads `logtrack.config.json` from the working directory or the nearest
 * ancestor that has one, and merges it over the defaults.
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';

import {
  LogLevel,
  TrackerError,
  TrackerErrorCode,
  isHash32,
  isLogLevelName,
  isPlainObject,
  isPositiveInteger,
  parseLogLevel,
} from '@logtrack/types';
import type { LogLevelName } from '@logtrack/types';
import type { Hash32 } from '@logtrack/crypto';

import { DEFAULT_RESPONSE_TIMEOUT_MS } from './dispatcher';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Shape of a `logtrack.config.json` file. */
export interface TrackerConfigFile {
  /** Identifier of the rollup instance whose messages are tracked. */
  instanceId?: string;
  logLevel?: LogLevelName;
  /** Bound on waiting for the instance-creation hash. */
  responseTimeoutMs?: number;
}

/** Configuration after defaults and overrides are applied. */
export interface TrackerConfig {
  instanceId: Hash32;
  logLevel: LogLevel;
  responseTimeoutMs: number;
}

/** Name of the configuration file. */
export const CONFIG_FILE_NAME = 'logtrack.config.json';

/** Environment variable that overrides `logLevel`. */
export const LOG_LEVEL_ENV = 'LOGTRACK_LOG_LEVEL';

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Search for a `logtrack.config.json` starting from `cwd` and walking up to
 * the filesystem root. Returns the absolute path if found, or `undefined`.
 */
export function findConfigFile(cwd?: string): string | undefined {
  let dir = resolve(cwd ?? '.');

  for (;;) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = resolve(dir, '..');
    if (parent === dir) break; // filesystem root
    dir = parent;
  }

  return undefined;
}

/**
 * Load and validate the nearest `logtrack.config.json`.
 * Returns `undefined` if no config file is found.
 *
 * @throws {TrackerError} `CONFIG_PARSE_FAILED` when the file is not JSON.
 * @throws {TrackerError} `CONFIG_INVALID` when a field has the wrong shape.
 */
export function loadConfig(cwd?: string): TrackerConfigFile | undefined {
  const filePath = findConfigFile(cwd);
  if (!filePath) return undefined;

  const raw = readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new TrackerError(TrackerErrorCode.CONFIG_PARSE_FAILED, `${filePath} is not valid JSON`, {
      cause: err,
      context: { filePath },
    });
  }
  return validateConfigFile(parsed, filePath);
}

/**
 * Check that `value` has the shape of a {@link TrackerConfigFile}.
 *
 * @param source - Where the value came from, for error messages.
 */
export function validateConfigFile(value: unknown, source = 'config'): TrackerConfigFile {
  if (!isPlainObject(value)) {
    throw invalid(source, 'must be a JSON object');
  }
  const config: TrackerConfigFile = {};

  const { instanceId, logLevel, responseTimeoutMs } = value;
  if (instanceId !== undefined) {
    if (!isHash32(instanceId)) {
      throw invalid(source, 'instanceId must be 32 bytes of 0x-prefixed hex');
    }
    config.instanceId = instanceId;
  }
  if (logLevel !== undefined) {
    if (!isLogLevelName(logLevel)) {
      throw invalid(source, 'logLevel must be one of debug, info, warn, error, silent');
    }
    config.logLevel = logLevel;
  }
  if (responseTimeoutMs !== undefined) {
    if (!isPositiveInteger(responseTimeoutMs)) {
      throw invalid(source, 'responseTimeoutMs must be a positive integer');
    }
    config.responseTimeoutMs = responseTimeoutMs;
  }
  return config;
}

/**
 * Merge a config file over the defaults and apply the environment override
 * for the log level.
 *
 * @throws {TrackerError} `CONFIG_INVALID` when no instance id is configured.
 */
export function resolveConfig(
  file: TrackerConfigFile | undefined,
  env: Record<string, string | undefined> = process.env,
): TrackerConfig {
  if (file?.instanceId === undefined) {
    throw new TrackerError(TrackerErrorCode.CONFIG_INVALID, 'instanceId is required', {
      hint: `Add "instanceId" to ${CONFIG_FILE_NAME}.`,
    });
  }

  let logLevel = file.logLevel ?? 'info';
  const override = env[LOG_LEVEL_ENV];
  if (override !== undefined && override !== '') {
    const name = override.toLowerCase();
    if (!isLogLevelName(name)) {
      throw invalid(LOG_LEVEL_ENV, `unknown log level "${override}"`);
    }
    logLevel = name;
  }

  return {
    instanceId: file.instanceId.toLowerCase(),
    logLevel: parseLogLevel(logLevel),
    responseTimeoutMs: file.responseTimeoutMs ?? DEFAULT_RESPONSE_TIMEOUT_MS,
  };
}

function invalid(source: string, detail: string): TrackerError {
  return new TrackerError(TrackerErrorCode.CONFIG_INVALID, `${source}: ${detail}`);
}
