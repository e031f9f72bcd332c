/**
 * Tests for configuration and authentication.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  DEFAULT_API_VERSION,
  DEFAULT_CLUSTER_NAME,
  SlurmConfigBuilder,
  createConfigFromEnv,
  createDefaultConfig,
  isWireVersion,
  validateConfig,
} from '../config/index.js';
import { EnvTokenProvider, SecretString, StaticTokenProvider, buildAuthHeaders } from '../auth/index.js';
import { SlurmErrorKind } from '../errors/index.js';

describe('SlurmConfigBuilder', () => {
  it('should apply defaults', () => {
    const config = new SlurmConfigBuilder().baseUrl('http://slurm.test:6820').build();

    expect(config.apiVersion).toBe(DEFAULT_API_VERSION);
    expect(config.timeout).toBe(30000);
    expect(config.maxRetries).toBe(3);
    expect(config.defaultClusterName).toBe(DEFAULT_CLUSTER_NAME);
    expect(config.retry.enabled).toBe(true);
    expect(config.debug).toBe(false);
    expect(config.token).toBeUndefined();
  });

  it('should strip trailing slashes from the base URL', () => {
    const config = new SlurmConfigBuilder().baseUrl('http://slurm.test:6820//').build();
    expect(config.baseUrl).toBe('http://slurm.test:6820');
  });

  it('should freeze the built configuration', () => {
    const config = new SlurmConfigBuilder().baseUrl('http://slurm.test:6820').build();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.retry)).toBe(true);
  });

  it('should reject a missing base URL', () => {
    expect(() => new SlurmConfigBuilder().build()).toThrow('Base URL cannot be empty');
  });

  it('should reject a non-HTTP base URL', () => {
    expect(() => new SlurmConfigBuilder().baseUrl('ftp://slurm.test').build()).toThrow(
      'Base URL must start with http:// or https://'
    );
  });

  it('should reject a non-positive timeout', () => {
    expect(() =>
      new SlurmConfigBuilder().baseUrl('http://slurm.test:6820').timeout(0).build()
    ).toThrow('Timeout must be greater than 0');
  });

  it('should disable retries', () => {
    const config = new SlurmConfigBuilder().baseUrl('http://slurm.test:6820').noRetry().build();
    expect(config.retry.enabled).toBe(false);
  });

  it('should merge partial retry settings', () => {
    const config = new SlurmConfigBuilder()
      .baseUrl('http://slurm.test:6820')
      .retry({ initialBackoff: 100 })
      .build();
    expect(config.retry.initialBackoff).toBe(100);
    expect(config.retry.maxBackoff).toBe(30000);
  });

  it('should accept any version string', () => {
    const config = new SlurmConfigBuilder()
      .baseUrl('http://slurm.test:6820')
      .apiVersion('v0.0.39')
      .build();
    expect(config.apiVersion).toBe('v0.0.39');
  });
});

describe('validateConfig', () => {
  it('should throw a configuration error', () => {
    const config = { ...createDefaultConfig(), baseUrl: 'http://slurm.test:6820', defaultClusterName: '' };
    expect(() => validateConfig(config)).toThrowError(
      expect.objectContaining({
        kind: SlurmErrorKind.Configuration,
        message: 'Default cluster name cannot be empty',
      })
    );
  });
});

describe('isWireVersion', () => {
  it('should recognize supported versions', () => {
    expect(isWireVersion('v0.0.40')).toBe(true);
    expect(isWireVersion('v0.0.44')).toBe(true);
    expect(isWireVersion('v0.0.45')).toBe(false);
    expect(isWireVersion('')).toBe(false);
  });
});

describe('createConfigFromEnv', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should read settings from the environment', async () => {
    vi.stubEnv('SLURM_REST_URL', 'http://slurm.test:6820/');
    vi.stubEnv('SLURM_JWT', 'test-secret');
    vi.stubEnv('SLURM_USER_NAME', 'alice');
    vi.stubEnv('SLURM_API_VERSION', 'v0.0.41');
    vi.stubEnv('SLURM_TIMEOUT_SECS', '5');
    vi.stubEnv('SLURM_MAX_RETRIES', '1');
    vi.stubEnv('SLURM_DEBUG', 'true');
    vi.stubEnv('SLURM_DEFAULT_CLUSTER', 'gpu-cluster');

    const config = createConfigFromEnv().build();

    expect(config.baseUrl).toBe('http://slurm.test:6820');
    expect(config.userName).toBe('alice');
    expect(config.apiVersion).toBe('v0.0.41');
    expect(config.timeout).toBe(5000);
    expect(config.maxRetries).toBe(1);
    expect(config.debug).toBe(true);
    expect(config.defaultClusterName).toBe('gpu-cluster');
    expect((await config.token?.getToken())?.expose()).toBe('test-secret');
  });

  it('should ignore unparsable numbers', () => {
    vi.stubEnv('SLURM_REST_URL', 'http://slurm.test:6820');
    vi.stubEnv('SLURM_TIMEOUT_SECS', 'soon');

    const config = createConfigFromEnv().build();
    expect(config.timeout).toBe(30000);
  });
});

describe('Authentication', () => {
  it('should hide secrets from string and JSON output', () => {
    const secret = new SecretString('test-secret');
    expect(String(secret)).toBe('***');
    expect(JSON.stringify({ token: secret })).toBe('{"token":"***"}');
    expect(secret.expose()).toBe('test-secret');
  });

  it('should build bearer and slurm headers', async () => {
    const headers = await buildAuthHeaders(new StaticTokenProvider('test-secret'), 'alice');
    expect(headers).toEqual({
      Authorization: 'Bearer test-secret',
      'X-SLURM-USER-TOKEN': 'test-secret',
      'X-SLURM-USER-NAME': 'alice',
    });
  });

  it('should send no headers without a token or user', async () => {
    expect(await buildAuthHeaders(undefined)).toEqual({});
  });

  describe('EnvTokenProvider', () => {
    afterEach(() => {
      vi.unstubAllEnvs();
    });

    it('should read the token on every call', async () => {
      const provider = new EnvTokenProvider('TEST_SLURM_TOKEN');
      vi.stubEnv('TEST_SLURM_TOKEN', 'test-secret-1');
      expect((await provider.getToken()).expose()).toBe('test-secret-1');
      vi.stubEnv('TEST_SLURM_TOKEN', 'test-secret-2');
      expect((await provider.getToken()).expose()).toBe('test-secret-2');
    });

    it('should fail when the variable is not set', async () => {
      vi.stubEnv('TEST_SLURM_TOKEN', '');
      await expect(new EnvTokenProvider('TEST_SLURM_TOKEN').getToken()).rejects.toThrow(
        'Environment variable TEST_SLURM_TOKEN not set'
      );
    });
  });
});
