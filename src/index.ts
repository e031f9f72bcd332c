/**
 * Slurm REST API client.
 *
 * @example
 * ```typescript
 * import { createClient, SlurmConfigBuilder } from 'slurm-rest-client';
 *
 * const config = new SlurmConfigBuilder()
 *   .baseUrl('http://slurmrestd:6820')
 *   .token(process.env.SLURM_JWT ?? '')
 *   .apiVersion('v0.0.42')
 *   .build();
 *
 * const client = createClient({ config });
 * const { items } = await client.jobs().list(AbortSignal.timeout(10000), { states: ['RUNNING'] });
 * ```
 *
 * @packageDocumentation
 */

// Client
export { SlurmClient, createClient, createClientFromEnv } from './client/index.js';
export type { ClientOptions } from './client/index.js';

// Config
export {
  SlurmConfigBuilder,
  createDefaultConfig,
  createConfigFromEnv,
  validateConfig,
  isWireVersion,
  SUPPORTED_VERSIONS,
  DEFAULT_API_VERSION,
  DEFAULT_TIMEOUT,
  DEFAULT_MAX_RETRIES,
  DEFAULT_CLUSTER_NAME,
  DEFAULT_USER_AGENT,
  DEFAULT_RETRY_CONFIG,
} from './config/index.js';
export type { SlurmConfig, RetryConfig, WireVersion } from './config/index.js';

// Auth
export { SecretString, StaticTokenProvider, EnvTokenProvider, buildAuthHeaders } from './auth/index.js';
export type { TokenProvider } from './auth/index.js';

// Errors
export * from './errors/index.js';

// Transport
export * from './transport/index.js';

// Observability
export { ConsoleLogger, NoopLogger, MemoryLogger, createLogger } from './observability/index.js';
export type { Logger, LogLevel } from './observability/index.js';

// Domain model
export * from './types/index.js';

// Managers
export * from './managers/index.js';

// Registry
export { createAdapterSet } from './versions/index.js';
export type { AdapterSet, AdapterSetFactory, AdapterSetOptions } from './versions/index.js';

// Wire
export { WireClient } from './wire/index.js';
export type { SlurmWireClient, WireRequest, WireResponse, ApiFamily } from './wire/index.js';
