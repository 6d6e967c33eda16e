/**
 * Service configuration from environment variables.
 *
 * Usage:
 *   const config = loadConfig(process.env);
 *   const result = validateConfig(config);
 *   if (!result.valid) throw new Error(result.errors.join('; '));
 */

import { LogLevel, parseLogLevel } from './logger';

export type StoreKind = 'memory' | 'v3io';

/** Connection settings for the v3io web API. */
export interface V3ioConfig {
  /** Base URL; a bare host gets `http://` prepended. */
  endpoint?: string;
  container: string;
  accessKey?: string;
}

export interface ServiceConfig {
  port: number;
  store: StoreKind;
  v3io: V3ioConfig;
  logLevel: LogLevel;
}

/** Validation result for a configuration. */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** An environment variable that cannot be read at all. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const DEFAULT_PORT = 8080;
const DEFAULT_CONTAINER = 'users';

function firstSet(env: NodeJS.ProcessEnv, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name];
    if (value !== undefined && value !== '') return value;
  }
  return undefined;
}

function normalizeEndpoint(value: string | undefined): string | undefined {
  if (!value) return undefined;
  return /^https?:\/\//.test(value) ? value : `http://${value}`;
}

/**
 * Read the configuration. Unparseable values are kept as NaN or passed
 * through so that validateConfig can report them.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const rawPort = firstSet(env, 'RUNMETA_PORT', 'PORT');
  const rawStore = (firstSet(env, 'RUNMETA_STORE') ?? 'memory').toLowerCase();
  const rawLevel = firstSet(env, 'RUNMETA_LOG_LEVEL');

  return {
    port: rawPort === undefined ? DEFAULT_PORT : /^\d+$/.test(rawPort) ? Number(rawPort) : NaN,
    store: rawStore === 'v3io' ? 'v3io' : rawStore === 'memory' ? 'memory' : invalidStore(rawStore),
    v3io: {
      endpoint: normalizeEndpoint(firstSet(env, 'RUNMETA_V3IO_URL', 'V3IO_API')),
      container: firstSet(env, 'RUNMETA_V3IO_CONTAINER') ?? DEFAULT_CONTAINER,
      accessKey: firstSet(env, 'RUNMETA_V3IO_ACCESS_KEY', 'V3IO_ACCESS_KEY'),
    },
    logLevel: rawLevel === undefined ? LogLevel.Info : parseLogLevel(rawLevel) ?? invalidLevel(rawLevel),
  };
}

function invalidStore(value: string): never {
  throw new ConfigError(`RUNMETA_STORE must be "memory" or "v3io", got "${value}"`);
}

function invalidLevel(value: string): never {
  throw new ConfigError(`RUNMETA_LOG_LEVEL must be one of debug, info, warn, error, got "${value}"`);
}

export function validateConfig(config: ServiceConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push('Port must be an integer between 0 and 65535');
  }

  if (config.store === 'v3io') {
    if (!config.v3io.endpoint) {
      errors.push('The v3io store needs RUNMETA_V3IO_URL (or V3IO_API)');
    }
    if (!config.v3io.accessKey) {
      warnings.push('No v3io access key configured; requests are sent without a session key');
    }
  } else if (config.v3io.endpoint) {
    warnings.push('A v3io endpoint is configured but RUNMETA_STORE is "memory"; documents are not persisted');
  }

  return { valid: errors.length === 0, errors, warnings };
}
