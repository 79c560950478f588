import { describe, it, expect } from 'vitest';
import { resolve } from 'path';
import { DEFAULT_FIELD_CONFIG_PATH, loadConfig } from '../../config.js';

const required = { GEMINI_API_KEY: 'test-key', DATABASE_URL: 'postgres://localhost:5432/test' };

describe('loadConfig', () => {
  it('fills in defaults', () => {
    const config = loadConfig(required);
    expect(config.geminiModel).toBe('gemini-2.5-flash');
    expect(config.controlDbUrl).toBeUndefined();
    expect(config.fieldConfigPath).toBe(DEFAULT_FIELD_CONFIG_PATH);
    expect(config.maxRows).toBe(200);
    expect(config.shortReplyMaxWords).toBe(3);
    expect(config.duplicateCheck).toBe(false);
    expect(config.retry).toEqual({ maxRetries: 3, initialDelayMs: 1000, maxDelayMs: 10000, backoffMultiplier: 2 });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      ...required,
      CONTROL_DB_URL: 'postgres://localhost:5432/control',
      FIELD_CONFIG_PATH: 'custom/fields.json',
      MAX_ROWS: '50',
      DUPLICATE_CHECK: 'yes',
      MAX_RETRIES: '0',
    });
    expect(config.controlDbUrl).toBe('postgres://localhost:5432/control');
    expect(config.fieldConfigPath).toBe(resolve('custom/fields.json'));
    expect(config.maxRows).toBe(50);
    expect(config.duplicateCheck).toBe(true);
    expect(config.retry.maxRetries).toBe(0);
  });

  it('names a missing required variable', () => {
    expect(() => loadConfig({ DATABASE_URL: 'postgres://localhost/test' })).toThrow(
      'Missing required environment variable: GEMINI_API_KEY'
    );
  });

  it('rejects malformed numbers and booleans', () => {
    expect(() => loadConfig({ ...required, MAX_ROWS: 'many' })).toThrow(
      'Invalid number for environment variable: MAX_ROWS'
    );
    expect(() => loadConfig({ ...required, DUPLICATE_CHECK: 'sometimes' })).toThrow(
      'Invalid boolean for environment variable: DUPLICATE_CHECK'
    );
  });
});
