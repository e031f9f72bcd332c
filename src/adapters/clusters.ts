/**
 * Cluster adapter. Clusters are never updated in place.
 * @module adapters/clusters
 */

import { BaseManager, createDecoder, matchesAny, paginate } from '../managers/base.js';
import type { AdapterContext, Operation } from '../managers/base.js';
import type { ClusterManager } from '../managers/interfaces.js';
import type { Cluster, ClusterCreate, ListClustersOptions, ListResult } from '../types/index.js';
import { clusterSchema } from '../wire/common.js';
import { convertCluster, encodeCluster } from './converters/accounting.js';

const decodeCluster = createDecoder(clusterSchema, convertCluster);

export class ClusterAdapter extends BaseManager implements ClusterManager {
  constructor(context: AdapterContext, operations: readonly Operation[]) {
    super('cluster', context, operations);
  }

  async list(signal: AbortSignal, options: ListClustersOptions = {}): Promise<ListResult<Cluster>> {
    const client = this.begin(signal, 'list');
    this.validateListOptions(options);

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurmdb',
      path: '/clusters',
    });
    const clusters = this.decodeEntries(data, 'clusters', decodeCluster);
    return paginate(
      clusters.filter((cluster) => matchesAny(cluster.name, options.names)),
      options
    );
  }

  async get(signal: AbortSignal, name: string): Promise<Cluster> {
    const client = this.begin(signal, 'get');
    this.validateResourceName(name, 'cluster name');

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurmdb',
      path: `/cluster/${encodeURIComponent(name)}`,
    });
    return this.first(this.decodeEntries(data, 'clusters', decodeCluster), name);
  }

  async create(signal: AbortSignal, cluster: ClusterCreate): Promise<void> {
    const client = this.begin(signal, 'create');
    this.validateResourceName(cluster.name, 'cluster name');

    await this.call(client, signal, {
      method: 'POST',
      api: 'slurmdb',
      path: '/clusters',
      body: { clusters: [encodeCluster(cluster)] },
    });
  }

  async delete(signal: AbortSignal, name: string): Promise<void> {
    const client = this.begin(signal, 'delete');
    this.validateResourceName(name, 'cluster name');

    await this.call(client, signal, {
      method: 'DELETE',
      api: 'slurmdb',
      path: `/cluster/${encodeURIComponent(name)}`,
    });
  }
}
