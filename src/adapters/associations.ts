/**
 * Association adapter.
 *
 * An association is identified by account, user, cluster and optional
 * partition. An empty cluster is replaced by the configured default cluster;
 * a non-empty one is always kept.
 * @module adapters/associations
 */

import { SlurmError } from '../errors/index.js';
import {
  ALL_OPERATIONS,
  BaseManager,
  createDecoder,
  joinFilter,
  matchesAny,
  paginate,
} from '../managers/base.js';
import type { AdapterContext, Operation } from '../managers/base.js';
import type { AssociationManager } from '../managers/interfaces.js';
import type {
  Association,
  AssociationCreate,
  AssociationKey,
  AssociationUpdate,
  ListAssociationsOptions,
  ListResult,
} from '../types/index.js';
import { associationSchema } from '../wire/common.js';
import type { QueryParams } from '../wire/client.js';
import {
  convertAssociation,
  encodeAssociationCreate,
  encodeAssociationUpdate,
} from './converters/accounting.js';

const decodeAssociation = createDecoder(associationSchema, convertAssociation);

interface ResolvedKey {
  account: string;
  user: string;
  cluster: string;
  partition?: string;
}

function keyQuery(key: ResolvedKey): QueryParams {
  return {
    account: key.account,
    user: key.user,
    cluster: key.cluster,
    partition: key.partition,
  };
}

function describeKey(key: ResolvedKey): string {
  const partition = key.partition ? `/${key.partition}` : '';
  return `${key.user}@${key.account}/${key.cluster}${partition}`;
}

export class AssociationAdapter extends BaseManager implements AssociationManager {
  constructor(context: AdapterContext, operations: readonly Operation[] = ALL_OPERATIONS) {
    super('association', context, operations);
  }

  /**
   * Returns `cluster` unless it is absent or empty, in which case the default
   * cluster. A blank cluster is returned as given and fails validation.
   */
  resolveCluster(cluster: string | undefined): string {
    return cluster === undefined || cluster === '' ? this.defaultClusterName : cluster;
  }

  async list(
    signal: AbortSignal,
    options: ListAssociationsOptions = {}
  ): Promise<ListResult<Association>> {
    const client = this.begin(signal, 'list');
    this.validateListOptions(options);

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurmdb',
      path: '/associations',
      query: {
        account: joinFilter(options.accounts),
        user: joinFilter(options.users),
        cluster: joinFilter(options.clusters),
        partition: joinFilter(options.partitions),
      },
    });
    const associations = this.decodeEntries(data, 'associations', decodeAssociation);
    return paginate(
      associations.filter(
        (association) =>
          matchesAny(association.account, options.accounts) &&
          matchesAny(association.user, options.users) &&
          matchesAny(association.cluster, options.clusters) &&
          matchesAny(association.partition, options.partitions)
      ),
      options
    );
  }

  async get(signal: AbortSignal, key: AssociationKey): Promise<Association> {
    const client = this.begin(signal, 'get');
    const resolved = this.resolveKey(key);

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurmdb',
      path: '/association',
      query: keyQuery(resolved),
    });
    return this.first(
      this.decodeEntries(data, 'associations', decodeAssociation),
      describeKey(resolved)
    );
  }

  async create(signal: AbortSignal, association: AssociationCreate): Promise<void> {
    const client = this.begin(signal, 'create');
    const cluster = this.resolveCluster(association.cluster);
    this.validateResourceName(association.account, 'association account');
    this.validateResourceName(association.user, 'association user');
    this.validateResourceName(cluster, 'association cluster');

    this.logger.debug('creating association', {
      account: association.account,
      user: association.user,
      cluster,
    });

    await this.call(client, signal, {
      method: 'POST',
      api: 'slurmdb',
      path: '/associations',
      body: { associations: [encodeAssociationCreate({ ...association, cluster })] },
    });
  }

  async update(signal: AbortSignal, key: AssociationKey, update: AssociationUpdate): Promise<void> {
    const client = this.begin(signal, 'update');
    const resolved = this.resolveKey(key);
    this.requireUpdateFields(update);

    await this.call(client, signal, {
      method: 'POST',
      api: 'slurmdb',
      path: '/associations',
      body: { associations: [encodeAssociationUpdate(resolved, update)] },
    });
  }

  async delete(signal: AbortSignal, key: AssociationKey): Promise<void> {
    const client = this.begin(signal, 'delete');
    const resolved = this.resolveKey(key);

    await this.call(client, signal, {
      method: 'DELETE',
      api: 'slurmdb',
      path: '/association',
      query: keyQuery(resolved),
    });
  }

  private resolveKey(key: AssociationKey | undefined): ResolvedKey {
    if (!key) {
      throw SlurmError.validation('association key is required');
    }
    this.validateResourceName(key.account, 'association account');
    this.validateResourceName(key.user, 'association user');
    const cluster = this.resolveCluster(key.cluster);
    this.validateResourceName(cluster, 'association cluster');
    return {
      account: key.account,
      user: key.user,
      cluster,
      partition: key.partition || undefined,
    };
  }
}
