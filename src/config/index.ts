/**
 * Configuration types for the Slurm REST client.
 * @module config
 */

import { z } from 'zod';
import { SlurmError } from '../errors/index.js';
import { EnvTokenProvider, StaticTokenProvider } from '../auth/index.js';
import type { TokenProvider } from '../auth/index.js';

/** Wire versions this client can speak, oldest first. */
export const SUPPORTED_VERSIONS = [
  'v0.0.40',
  'v0.0.41',
  'v0.0.42',
  'v0.0.43',
  'v0.0.44',
] as const;

/** A supported wire version label. */
export type WireVersion = (typeof SUPPORTED_VERSIONS)[number];

/** Default wire version (the newest). */
export const DEFAULT_API_VERSION: WireVersion = 'v0.0.44';

/** Default request timeout in milliseconds (30 seconds). */
export const DEFAULT_TIMEOUT = 30000;

/** Default maximum retry attempts. */
export const DEFAULT_MAX_RETRIES = 3;

/** Default cluster assigned to associations and wckeys created without one. */
export const DEFAULT_CLUSTER_NAME = 'linux';

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'slurm-rest-client/0.1.0';

/**
 * Returns true if `version` is a supported wire version.
 */
export function isWireVersion(version: string): version is WireVersion {
  return SUPPORTED_VERSIONS.some((supported) => supported === version);
}

/**
 * Retry configuration.
 */
export interface RetryConfig {
  /** Initial backoff delay in milliseconds. */
  initialBackoff: number;
  /** Maximum backoff delay in milliseconds. */
  maxBackoff: number;
  /** Backoff multiplier. */
  multiplier: number;
  /** Jitter factor (0.0 to 1.0). */
  jitter: number;
  /** Enable retries. */
  enabled: boolean;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  initialBackoff: 500,
  maxBackoff: 30000,
  multiplier: 2.0,
  jitter: 0.1,
  enabled: true,
};

/**
 * Slurm client configuration.
 */
export interface SlurmConfig {
  /** slurmrestd base URL (e.g., "http://slurm.example.com:6820"). */
  baseUrl: string;
  /** Wire version to speak. */
  apiVersion: string;
  /** JWT source; requests are unauthenticated when absent. */
  token?: TokenProvider;
  /** Sent as X-SLURM-USER-NAME. */
  userName?: string;
  /** Request timeout in milliseconds. */
  timeout: number;
  /** Maximum retry attempts after the first request. */
  maxRetries: number;
  /** Retry configuration. */
  retry: RetryConfig;
  /** Enable debug logging. */
  debug: boolean;
  /** Cluster used when an association or wckey is created without one. */
  defaultClusterName: string;
  /** User-Agent header. */
  userAgent: string;
}

/**
 * Zod schema for the numeric and string settings.
 */
const configSchema = z.object({
  baseUrl: z
    .string()
    .min(1, 'Base URL cannot be empty')
    .url('Invalid base URL format')
    .refine((url) => url.startsWith('http://') || url.startsWith('https://'), {
      message: 'Base URL must start with http:// or https://',
    }),
  timeout: z.number().positive('Timeout must be greater than 0'),
  maxRetries: z.number().int().nonnegative('Max retries must be non-negative'),
  defaultClusterName: z.string().min(1, 'Default cluster name cannot be empty'),
  userAgent: z.string().trim().min(1, 'User-Agent cannot be empty'),
  retry: z.object({
    initialBackoff: z.number().positive('Retry initial backoff must be greater than 0'),
    maxBackoff: z.number().positive('Retry max backoff must be greater than 0'),
    multiplier: z.number().positive('Retry multiplier must be greater than 0'),
    jitter: z.number().min(0).max(1, 'Retry jitter must be between 0.0 and 1.0'),
    enabled: z.boolean(),
  }),
});

/**
 * Creates a default Slurm configuration.
 */
export function createDefaultConfig(): SlurmConfig {
  return {
    baseUrl: '',
    apiVersion: DEFAULT_API_VERSION,
    timeout: DEFAULT_TIMEOUT,
    maxRetries: DEFAULT_MAX_RETRIES,
    retry: { ...DEFAULT_RETRY_CONFIG },
    debug: false,
    defaultClusterName: DEFAULT_CLUSTER_NAME,
    userAgent: DEFAULT_USER_AGENT,
  };
}

/**
 * Validates a Slurm configuration.
 * @throws {SlurmError} Configuration-kind error if the configuration is invalid.
 */
export function validateConfig(config: SlurmConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    const message = issue ? issue.message : 'Invalid configuration';
    throw SlurmError.configuration(message);
  }
}

/**
 * Builder for SlurmConfig.
 */
export class SlurmConfigBuilder {
  private config: SlurmConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  /**
   * Sets the base URL.
   */
  baseUrl(url: string): this {
    this.config.baseUrl = url.replace(/\/+$/, '');
    return this;
  }

  /**
   * Sets the wire version. Unknown versions are accepted here and rejected by
   * the factory with an UnsupportedVersion error.
   */
  apiVersion(version: string): this {
    this.config.apiVersion = version;
    return this;
  }

  /**
   * Sets a fixed JWT.
   */
  token(token: string): this {
    this.config.token = new StaticTokenProvider(token);
    return this;
  }

  /**
   * Sets the token provider.
   */
  tokenProvider(provider: TokenProvider): this {
    this.config.token = provider;
    return this;
  }

  /**
   * Sets the user name sent with every request.
   */
  userName(userName: string): this {
    this.config.userName = userName;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(timeout: number): this {
    this.config.timeout = timeout;
    return this;
  }

  /**
   * Sets the maximum retry attempts.
   */
  maxRetries(maxRetries: number): this {
    this.config.maxRetries = maxRetries;
    return this;
  }

  /**
   * Sets the retry configuration.
   */
  retry(config: Partial<RetryConfig>): this {
    this.config.retry = {
      ...this.config.retry,
      ...config,
    };
    return this;
  }

  /**
   * Disables retries.
   */
  noRetry(): this {
    this.config.retry = {
      ...DEFAULT_RETRY_CONFIG,
      enabled: false,
    };
    return this;
  }

  /**
   * Enables or disables debug logging.
   */
  debug(enabled: boolean): this {
    this.config.debug = enabled;
    return this;
  }

  /**
   * Sets the default cluster for associations and wckeys.
   */
  defaultClusterName(name: string): this {
    this.config.defaultClusterName = name;
    return this;
  }

  /**
   * Sets the User-Agent header.
   */
  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {SlurmError} If the configuration is invalid.
   */
  build(): Readonly<SlurmConfig> {
    validateConfig(this.config);
    return Object.freeze({ ...this.config, retry: Object.freeze({ ...this.config.retry }) });
  }
}

function parseIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) {
    return undefined;
  }
  const value = parseInt(raw, 10);
  return isNaN(value) ? undefined : value;
}

/**
 * Creates a Slurm configuration builder from environment variables.
 *
 * Environment variables:
 * - SLURM_REST_URL: Base URL (required)
 * - SLURM_JWT: Token, read on every request
 * - SLURM_USER_NAME: User name header
 * - SLURM_API_VERSION: Wire version
 * - SLURM_TIMEOUT_SECS: Request timeout in seconds
 * - SLURM_MAX_RETRIES: Maximum retry attempts
 * - SLURM_DEBUG: Enable debug logging (true/false)
 * - SLURM_DEFAULT_CLUSTER: Default association cluster
 */
export function createConfigFromEnv(): SlurmConfigBuilder {
  const builder = new SlurmConfigBuilder();

  const baseUrl = process.env.SLURM_REST_URL;
  if (baseUrl) {
    builder.baseUrl(baseUrl);
  }

  if (process.env.SLURM_JWT) {
    builder.tokenProvider(new EnvTokenProvider('SLURM_JWT'));
  }

  const userName = process.env.SLURM_USER_NAME;
  if (userName) {
    builder.userName(userName);
  }

  const version = process.env.SLURM_API_VERSION;
  if (version) {
    builder.apiVersion(version);
  }

  const timeoutSecs = parseIntEnv('SLURM_TIMEOUT_SECS');
  if (timeoutSecs !== undefined) {
    builder.timeout(timeoutSecs * 1000);
  }

  const maxRetries = parseIntEnv('SLURM_MAX_RETRIES');
  if (maxRetries !== undefined) {
    builder.maxRetries(maxRetries);
  }

  const debug = process.env.SLURM_DEBUG;
  if (debug !== undefined) {
    builder.debug(debug.toLowerCase() === 'true' || debug === '1');
  }

  const cluster = process.env.SLURM_DEFAULT_CLUSTER;
  if (cluster) {
    builder.defaultClusterName(cluster);
  }

  return builder;
}
