/**
 * PMD Configuration
 * Environment-driven settings; a .env file in the working directory is honoured
 */

import { config as loadDotenv } from 'dotenv';
import { TIMING } from './PmdConstants';
import { LogLevel, isLogLevel, pmdLogger } from './PmdLogger';

export interface PmdConfig {
  requestTimeoutMs: number;
  logLevel: LogLevel;
  logDir: string | null;
}

export const DEFAULT_PMD_CONFIG: PmdConfig = {
  requestTimeoutMs: TIMING.REQUEST_TIMEOUT,
  logLevel: 'info',
  logDir: null,
};

export class PmdConfigError extends Error {
  constructor(public readonly variable: string, public readonly value: string) {
    super(`Invalid value for ${variable}: "${value}"`);
    this.name = 'PmdConfigError';
  }
}

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, variable: string, fallback: number): number {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new PmdConfigError(variable, raw);
  }
  return value;
}

function readLogLevel(env: Env, variable: string, fallback: LogLevel): LogLevel {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = raw.trim().toLowerCase();
  if (!isLogLevel(value)) {
    throw new PmdConfigError(variable, raw);
  }
  return value;
}

/**
 * Builds the configuration from an environment map (process.env by default).
 * @throws PmdConfigError when a variable is present but unusable
 */
export function loadPmdConfig(env: Env = process.env): PmdConfig {
  const logDir = env.PMD_LOG_DIR?.trim();

  return {
    requestTimeoutMs: readPositiveInt(env, 'PMD_REQUEST_TIMEOUT_MS', DEFAULT_PMD_CONFIG.requestTimeoutMs),
    logLevel: readLogLevel(env, 'PMD_LOG_LEVEL', DEFAULT_PMD_CONFIG.logLevel),
    logDir: logDir ? logDir : DEFAULT_PMD_CONFIG.logDir,
  };
}

/**
 * Loads .env into process.env, reads the configuration and applies the
 * log level and log directory to the shared logger.
 */
export function configureFromEnvironment(): PmdConfig {
  loadDotenv();
  const config = loadPmdConfig(process.env);
  pmdLogger.setLevel(config.logLevel);
  if (config.logDir) {
    pmdLogger.attachFile(config.logDir);
  }
  return config;
}
