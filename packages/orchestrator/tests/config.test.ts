import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigurationError } from '@reindexer/contracts';

import { loadReindexerConfig } from '../src/config.js';

describe('loadReindexerConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('REINDEXER_')) delete process.env[key];
    }
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('applies defaults around the configured hosts', () => {
    process.env.REINDEXER_HOSTS = 'http://search-1:9200, http://search-2:9200';

    expect(loadReindexerConfig()).toEqual({
      hosts: ['http://search-1:9200', 'http://search-2:9200'],
      auth: { type: 'none' },
      requestTimeoutMs: 30_000,
      checkpointCollection: '.reindexer-checkpoints',
      pollIntervalMs: 10_000,
      settleDelayMs: 5_000,
      stallPolls: 0,
      staleAfterMs: 300_000,
      readOnlySource: false,
      readOnlyDestination: false,
      destination: { replicas: 1, refreshInterval: '1s' },
    });
  });

  it('lets command-line overrides win over the environment', () => {
    process.env.REINDEXER_HOSTS = 'http://search-1:9200';
    process.env.REINDEXER_POLL_INTERVAL_MS = '2000';
    process.env.REINDEXER_READ_ONLY_SOURCE = 'true';

    const config = loadReindexerConfig({
      hosts: ['http://override:9200'],
      pollIntervalMs: 500,
      checkpointCollection: '.custom-checkpoints',
    });

    expect(config.hosts).toEqual(['http://override:9200']);
    expect(config.pollIntervalMs).toBe(500);
    expect(config.checkpointCollection).toBe('.custom-checkpoints');
    expect(config.readOnlySource).toBe(true);
  });

  it('builds basic or api-key auth from the environment', () => {
    process.env.REINDEXER_HOSTS = 'http://search-1:9200';
    process.env.REINDEXER_USERNAME = 'migrator';
    process.env.REINDEXER_PASSWORD = 'test-secret';
    expect(loadReindexerConfig().auth).toEqual({
      type: 'basic',
      username: 'migrator',
      password: 'test-secret',
    });

    delete process.env.REINDEXER_USERNAME;
    delete process.env.REINDEXER_PASSWORD;
    process.env.REINDEXER_API_KEY = 'test-key';
    expect(loadReindexerConfig().auth).toEqual({ type: 'api-key', apiKey: 'test-key' });
  });

  it('requires at least one host', () => {
    expect(() => loadReindexerConfig()).toThrow(ConfigurationError);
    expect(() => loadReindexerConfig()).toThrow(
      'Invalid reindexer configuration: hosts: at least one store host is required (REINDEXER_HOSTS or --hosts)',
    );
  });

  it('rejects a username without a password', () => {
    process.env.REINDEXER_HOSTS = 'http://search-1:9200';
    process.env.REINDEXER_USERNAME = 'migrator';

    expect(() => loadReindexerConfig()).toThrow(
      'username: REINDEXER_USERNAME and REINDEXER_PASSWORD must be set together',
    );
  });

  it('rejects hosts that are not URLs', () => {
    expect(() => loadReindexerConfig({ hosts: ['search-1:9200'] })).toThrow(ConfigurationError);
  });
});
