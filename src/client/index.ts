/**
 * Slurm client facade.
 *
 * Callers hold one SlurmClient; it picks the adapter set for the configured
 * wire version and exposes one manager per entity. Only `version()` reveals
 * which wire version backs it.
 */

import type { SlurmConfig } from '../config/index.js';
import { createConfigFromEnv, validateConfig } from '../config/index.js';
import type { Logger } from '../observability/index.js';
import { createLogger } from '../observability/index.js';
import type { HttpTransport } from '../transport/index.js';
import { FetchTransport, RetryExecutor, RetryingTransport } from '../transport/index.js';
import { WireClient } from '../wire/client.js';
import { createAdapterSet } from '../versions/index.js';
import type { AdapterSet } from '../versions/index.js';
import type {
  AccountManager,
  AssociationManager,
  ClusterManager,
  InfoManager,
  JobManager,
  NodeManager,
  PartitionManager,
  QoSManager,
  ReservationManager,
  UserManager,
  WCKeyManager,
} from '../managers/interfaces.js';
import type { PingResult, TRES } from '../types/index.js';

/**
 * Client options
 */
export interface ClientOptions {
  config: SlurmConfig;
  /** Replaces the default undici transport (tests, proxies). */
  transport?: HttpTransport;
  logger?: Logger;
}

/**
 * Slurm REST API client
 */
export class SlurmClient {
  private readonly config: Readonly<SlurmConfig>;
  private readonly adapters: AdapterSet;
  private readonly logger: Logger;

  constructor(options: ClientOptions) {
    validateConfig(options.config);
    this.config = Object.freeze({ ...options.config, retry: { ...options.config.retry } });
    this.logger = options.logger ?? createLogger(this.config.debug);

    const wire = new WireClient({
      baseUrl: this.config.baseUrl,
      version: this.config.apiVersion,
      transport: this.buildTransport(options.transport),
      token: this.config.token,
      userName: this.config.userName,
      userAgent: this.config.userAgent,
      timeout: this.config.timeout,
      logger: this.logger,
    });

    this.adapters = createAdapterSet(this.config.apiVersion, wire, {
      defaultClusterName: this.config.defaultClusterName,
      logger: this.logger,
    });

    this.logger.info('slurm client created', {
      baseUrl: this.config.baseUrl,
      version: this.adapters.version,
    });
  }

  jobs(): JobManager {
    return this.adapters.jobs;
  }

  nodes(): NodeManager {
    return this.adapters.nodes;
  }

  partitions(): PartitionManager {
    return this.adapters.partitions;
  }

  reservations(): ReservationManager {
    return this.adapters.reservations;
  }

  qos(): QoSManager {
    return this.adapters.qos;
  }

  accounts(): AccountManager {
    return this.adapters.accounts;
  }

  users(): UserManager {
    return this.adapters.users;
  }

  associations(): AssociationManager {
    return this.adapters.associations;
  }

  clusters(): ClusterManager {
    return this.adapters.clusters;
  }

  wckeys(): WCKeyManager {
    return this.adapters.wckeys;
  }

  /**
   * Lists the trackable resources known to the accounting database.
   */
  getTRES(signal: AbortSignal): Promise<TRES[]> {
    return this.adapters.tres.list(signal);
  }

  /**
   * Server version, cluster identity and controller ping.
   */
  info(): InfoManager {
    return this.adapters.info;
  }

  /**
   * Pings the controllers.
   */
  ping(signal: AbortSignal): Promise<PingResult> {
    return this.adapters.info.ping(signal);
  }

  /**
   * Wire version backing this client.
   */
  version(): string {
    return this.adapters.version;
  }

  private buildTransport(transport: HttpTransport | undefined): HttpTransport {
    const base =
      transport ?? new FetchTransport({ defaultTimeout: this.config.timeout, logger: this.logger });
    if (!this.config.retry.enabled || this.config.maxRetries === 0) {
      return base;
    }
    const executor = new RetryExecutor({ ...this.config.retry, maxRetries: this.config.maxRetries });
    return new RetryingTransport(base, executor, this.logger);
  }
}

/**
 * Create a Slurm client
 */
export function createClient(options: ClientOptions): SlurmClient {
  return new SlurmClient(options);
}

/**
 * Create a Slurm client from SLURM_* environment variables
 */
export function createClientFromEnv(
  options: Omit<ClientOptions, 'config'> = {}
): SlurmClient {
  return new SlurmClient({ ...options, config: createConfigFromEnv().build() });
}
