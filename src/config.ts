import dotenv from 'dotenv';
import { join, dirname, isAbsolute, resolve } from 'path';
import { fileURLToPath } from 'url';
import type { Config } from './types.js';
import type { RetryConfig } from './utils/retry.js';

dotenv.config();

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_FIELD_CONFIG_PATH = join(__dirname, '../config/field_config.json');

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, name: string, defaultValue?: string): string {
  const value = env[name] || defaultValue;
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function getEnvNumber(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Invalid number for environment variable: ${name}`);
  }
  return parsed;
}

function getEnvBoolean(env: Env, name: string, defaultValue: boolean): boolean {
  const value = env[name]?.trim().toLowerCase();
  if (!value) return defaultValue;
  if (['true', '1', 'yes', 'on'].includes(value)) return true;
  if (['false', '0', 'no', 'off'].includes(value)) return false;
  throw new Error(`Invalid boolean for environment variable: ${name}`);
}

/**
 * Builds the runtime configuration from the environment.
 * Components take the pieces they need through their constructors;
 * only the CLI host calls this.
 */
export function loadConfig(env: Env = process.env): Config {
  const controlDbUrl = env.CONTROL_DB_URL;
  const fieldConfigPath = env.FIELD_CONFIG_PATH;

  const retryConfig: RetryConfig = {
    maxRetries: getEnvNumber(env, 'MAX_RETRIES', 3),
    initialDelayMs: getEnvNumber(env, 'RETRY_INITIAL_DELAY_MS', 1000),
    maxDelayMs: getEnvNumber(env, 'RETRY_MAX_DELAY_MS', 10000),
    backoffMultiplier: 2,
  };

  return {
    geminiApiKey: getEnvVar(env, 'GEMINI_API_KEY'),
    geminiModel: env.GEMINI_MODEL || 'gemini-2.5-flash',
    databaseUrl: getEnvVar(env, 'DATABASE_URL'),
    controlDbUrl: controlDbUrl ? controlDbUrl : undefined,
    fieldConfigPath: fieldConfigPath
      ? (isAbsolute(fieldConfigPath) ? fieldConfigPath : resolve(fieldConfigPath))
      : DEFAULT_FIELD_CONFIG_PATH,
    statementTimeoutMs: getEnvNumber(env, 'STATEMENT_TIMEOUT_MS', 10000),
    llmTimeoutMs: getEnvNumber(env, 'LLM_TIMEOUT_MS', 30000),
    maxRows: getEnvNumber(env, 'MAX_ROWS', 200),
    historyCap: getEnvNumber(env, 'HISTORY_CAP', 50),
    recentQueriesCap: getEnvNumber(env, 'RECENT_QUERIES_CAP', 10),
    shortReplyMaxWords: getEnvNumber(env, 'SHORT_REPLY_MAX_WORDS', 3),
    duplicateCheck: getEnvBoolean(env, 'DUPLICATE_CHECK', false),
    retry: retryConfig,
  };
}
