/**
 * Tests for configuration
 */

import { describe, it, expect } from 'vitest';
import { VaultAgentConfigBuilder, configFromEnv, resolveConfig, validateRefreshSettings } from '../index.js';
import { ConfigurationError } from '../../errors/index.js';

const identity = {
  address: 'https://vault.test:8200',
  roleId: 'test-role',
  secretId: 'test-secret',
};

describe('resolveConfig', () => {
  it('should apply defaults', () => {
    expect(resolveConfig(identity)).toEqual({
      ...identity,
      cacheTTL: 300,
      maxCacheSize: 1000,
      listCacheTTL: 60,
      refreshBuffer: 0.8,
      checkInterval: 60,
      validationProbe: 'SELECT 1',
      requestTimeoutMs: 10000,
      kvMountPoint: 'secret',
      kvVersion: 2,
      databaseMountPoint: 'database',
      approleMountPoint: 'approle',
    });
  });

  it('should accept a zero cache TTL', () => {
    expect(resolveConfig({ ...identity, cacheTTL: 0 }).cacheTTL).toBe(0);
  });

  it('should accept a refresh buffer of exactly 1', () => {
    expect(resolveConfig({ ...identity, refreshBuffer: 1 }).refreshBuffer).toBe(1);
  });

  it('should reject a refresh buffer of 0', () => {
    expect(() => resolveConfig({ ...identity, refreshBuffer: 0 })).toThrow(
      new ConfigurationError('refreshBuffer: Number must be greater than 0')
    );
  });

  it('should reject a refresh buffer above 1', () => {
    expect(() => resolveConfig({ ...identity, refreshBuffer: 1.5 })).toThrow(
      'Configuration error: refreshBuffer: Number must be less than or equal to 1'
    );
  });

  it('should list every invalid field', () => {
    expect(() => resolveConfig({ ...identity, maxCacheSize: 0, cacheTTL: -1 })).toThrow(
      'Configuration error: cacheTTL: Number must be greater than or equal to 0, maxCacheSize: Number must be greater than 0'
    );
  });

  it('should reject an address that is not a URL', () => {
    expect(() => resolveConfig({ ...identity, address: 'vault' })).toThrow('address: Invalid url');
  });
});

describe('validateRefreshSettings', () => {
  it('should accept settings within range and leave unset fields alone', () => {
    expect(() => validateRefreshSettings({ refreshBuffer: 1, checkInterval: 0.5 })).not.toThrow();
    expect(() => validateRefreshSettings({})).not.toThrow();
  });

  it('should list every field out of range', () => {
    expect(() => validateRefreshSettings({ refreshBuffer: 7, checkInterval: -5, validationProbe: '' })).toThrow(
      new ConfigurationError(
        'refreshBuffer: Number must be less than or equal to 1, ' +
          'checkInterval: Number must be greater than 0, ' +
          'validationProbe: String must contain at least 1 character(s)'
      )
    );
  });
});

describe('configFromEnv', () => {
  const env = {
    VAULT_ADDR: 'https://vault.test:8200',
    VAULT_ROLE_ID: 'test-role',
    VAULT_SECRET_ID: 'test-secret',
  };

  it('should read identity and optional settings', () => {
    const config = configFromEnv({
      ...env,
      VAULT_NAMESPACE: 'team-a',
      VAULT_CACHE_TTL: '120',
      VAULT_MAX_CACHE_SIZE: '50',
    });

    expect(config).toMatchObject({ ...identity, namespace: 'team-a', cacheTTL: 120, maxCacheSize: 50 });
  });

  it('should let overrides win over the environment', () => {
    const config = configFromEnv({ ...env, VAULT_CACHE_TTL: '120' }, { cacheTTL: 30, kvVersion: 1 });

    expect(config.cacheTTL).toBe(30);
    expect(config.kvVersion).toBe(1);
  });

  it('should ignore empty numeric variables', () => {
    expect(configFromEnv({ ...env, VAULT_CACHE_TTL: '' }).cacheTTL).toBe(300);
  });

  it('should require the store address', () => {
    expect(() => configFromEnv({ VAULT_ROLE_ID: 'test-role', VAULT_SECRET_ID: 'test-secret' })).toThrow(
      new ConfigurationError('VAULT_ADDR environment variable is required')
    );
  });

  it('should reject a non-numeric cache TTL', () => {
    expect(() => configFromEnv({ ...env, VAULT_CACHE_TTL: 'five' })).toThrow(
      'Configuration error: VAULT_CACHE_TTL must be a number, got "five"'
    );
  });
});

describe('VaultAgentConfigBuilder', () => {
  it('should build a validated configuration', () => {
    const config = new VaultAgentConfigBuilder()
      .address('https://vault.test:8200')
      .appRole('test-role', 'test-secret')
      .namespace('team-a')
      .cacheTTL(120)
      .refreshBuffer(0.75)
      .checkInterval(30)
      .kv('kv', 1)
      .databaseMountPoint('postgres')
      .build();

    expect(config).toMatchObject({
      ...identity,
      namespace: 'team-a',
      cacheTTL: 120,
      refreshBuffer: 0.75,
      checkInterval: 30,
      kvMountPoint: 'kv',
      kvVersion: 1,
      databaseMountPoint: 'postgres',
    });
  });

  it('should require the identity fields', () => {
    expect(() => new VaultAgentConfigBuilder().address('https://vault.test:8200').build()).toThrow(
      'Configuration error: address, roleId and secretId are required'
    );
  });

  it('should validate values on build', () => {
    const builder = new VaultAgentConfigBuilder().address('https://vault.test:8200').appRole('test-role', 'test-secret');

    expect(() => builder.requestTimeout(0).build()).toThrow(ConfigurationError);
  });
});
