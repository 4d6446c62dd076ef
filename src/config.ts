import os from 'os';
import path from 'path';
import { ValidationResult } from './types';

export type TransportMode = 'http' | 'stdio';

export interface AppConfig {
  dbPath: string;
  categoriesPath: string;
  transport: TransportMode;
  host: string;
  port: number;
}

export class ConfigError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = '0.0.0.0';

export function defaultDbPath(): string {
  return path.join(os.tmpdir(), 'expenses.db');
}

function validateEnv(env: NodeJS.ProcessEnv): ValidationResult {
  const errors: string[] = [];

  const transport = env.MCP_TRANSPORT;
  if (transport && transport !== 'http' && transport !== 'stdio') {
    errors.push('MCP_TRANSPORT must be one of: http, stdio');
  }

  const port = env.PORT;
  if (port) {
    const parsed = Number(port);
    if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
      errors.push('PORT must be an integer between 1 and 65535');
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Reads the process environment (after dotenv has populated it) into a typed
 * config. Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const validation = validateEnv(env);
  if (!validation.valid) {
    throw new ConfigError(validation.errors);
  }

  return {
    dbPath: env.EXPENSE_DB_PATH || defaultDbPath(),
    categoriesPath: env.EXPENSE_CATEGORIES_PATH || path.join(cwd, 'categories.json'),
    transport: env.MCP_TRANSPORT === 'stdio' ? 'stdio' : 'http',
    host: env.HOST || DEFAULT_HOST,
    port: env.PORT ? Number(env.PORT) : DEFAULT_PORT
  };
}
