/**
 * Version registry.
 *
 * Maps each supported wire version to the factory of its adapter set.
 * @module versions
 */

import { DEFAULT_CLUSTER_NAME, SUPPORTED_VERSIONS, isWireVersion } from '../config/index.js';
import type { WireVersion } from '../config/index.js';
import { SlurmError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import type { SlurmWireClient } from '../wire/client.js';
import type { AdapterSet, AdapterSetFactory } from './types.js';
import { createAdapters as createV40 } from './v0_0_40.js';
import { createAdapters as createV41 } from './v0_0_41.js';
import { createAdapters as createV42 } from './v0_0_42.js';
import { createAdapters as createV43 } from './v0_0_43.js';
import { createAdapters as createV44 } from './v0_0_44.js';

export type { AdapterSet, AdapterSetFactory } from './types.js';

const REGISTRY: Record<WireVersion, AdapterSetFactory> = {
  'v0.0.40': createV40,
  'v0.0.41': createV41,
  'v0.0.42': createV42,
  'v0.0.43': createV43,
  'v0.0.44': createV44,
};

/**
 * Options shared by every adapter of the set.
 */
export interface AdapterSetOptions {
  /** Cluster used for associations and wckeys created without one. */
  defaultClusterName?: string;
  logger?: Logger;
}

/**
 * Builds every entity adapter for `version`.
 *
 * @param client - Wire client bound to `version`; null builds adapters that
 *   fail every wire operation with ClientNotInitialized.
 * @throws {SlurmError} UnsupportedVersion for an unknown version.
 */
export function createAdapterSet(
  version: string,
  client: SlurmWireClient | null,
  options: AdapterSetOptions = {}
): AdapterSet {
  if (!isWireVersion(version)) {
    throw SlurmError.unsupportedVersion(version, SUPPORTED_VERSIONS);
  }
  return REGISTRY[version]({
    version,
    client,
    defaultClusterName: options.defaultClusterName ?? DEFAULT_CLUSTER_NAME,
    logger: options.logger,
  });
}
