/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root. Process environment variables take precedence.
 */

import { isEnvironment, isLogLevel, type Environment, type LogLevel } from '@ddl-pda/logger';
import * as fs from 'node:fs';
import * as path from 'node:path';

export interface CliConfig {
  environment: Environment;
  /** Console log level; console logging is off when unset */
  logLevel?: LogLevel;
  /** JSON lines file that receives buffered log entries */
  logFile?: string;
}

export const CONFIG_KEYS = {
  ENVIRONMENT: 'DDL_PDA_ENV',
  LOG_LEVEL: 'DDL_PDA_LOG_LEVEL',
  LOG_FILE: 'DDL_PDA_LOG_FILE',
} as const;

export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`${key}: ${message}`);
    this.name = 'ConfigError';
    this.key = key;
  }
}

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes if present
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find and load the nearest .env file, searching from startDir up to root
 */
export function findEnvFile(startDir: string): Record<string, string> | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath) && fs.statSync(envPath).isFile()) {
      return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Load CLI configuration
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 *
 * @throws {ConfigError} If a setting has a value outside its allowed set
 */
export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): CliConfig {
  const envFile = findEnvFile(cwd);

  const setting = (key: string): string | undefined => env[key] || envFile?.[key] || undefined;

  const config: CliConfig = { environment: 'production' };

  const environment = setting(CONFIG_KEYS.ENVIRONMENT);
  if (environment !== undefined) {
    if (!isEnvironment(environment)) {
      throw new ConfigError(
        CONFIG_KEYS.ENVIRONMENT,
        `expected test, development or production but got "${environment}"`,
      );
    }
    config.environment = environment;
  }

  const logLevel = setting(CONFIG_KEYS.LOG_LEVEL);
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigError(CONFIG_KEYS.LOG_LEVEL, `expected debug, info, warn, error or fatal but got "${logLevel}"`);
    }
    config.logLevel = logLevel;
  }

  const logFile = setting(CONFIG_KEYS.LOG_FILE);
  if (logFile !== undefined) {
    config.logFile = logFile;
  }

  return config;
}
