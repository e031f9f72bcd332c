/**
 * WCKey adapter.
 * @module adapters/wckeys
 */

import { BaseManager, createDecoder, joinFilter, matchesAny, paginate } from '../managers/base.js';
import type { AdapterContext, Operation } from '../managers/base.js';
import type { WCKeyManager } from '../managers/interfaces.js';
import type { ListResult, ListWCKeysOptions, WCKey, WCKeyCreate } from '../types/index.js';
import { wckeySchema } from '../wire/common.js';
import { convertWCKey, encodeWCKey } from './converters/accounting.js';

const decodeWCKey = createDecoder(wckeySchema, convertWCKey);

export class WCKeyAdapter extends BaseManager implements WCKeyManager {
  constructor(context: AdapterContext, operations: readonly Operation[]) {
    super('wckey', context, operations);
  }

  async list(signal: AbortSignal, options: ListWCKeysOptions = {}): Promise<ListResult<WCKey>> {
    const client = this.begin(signal, 'list');
    this.validateListOptions(options);

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurmdb',
      path: '/wckeys',
      query: {
        name: joinFilter(options.names),
        user: joinFilter(options.users),
        cluster: joinFilter(options.clusters),
      },
    });
    const wckeys = this.decodeEntries(data, 'wckeys', decodeWCKey);
    return paginate(
      wckeys.filter(
        (wckey) =>
          matchesAny(wckey.name, options.names) &&
          matchesAny(wckey.user, options.users) &&
          matchesAny(wckey.cluster, options.clusters)
      ),
      options
    );
  }

  async get(signal: AbortSignal, id: string | number): Promise<WCKey> {
    const client = this.begin(signal, 'get');
    this.validateResourceName(id, 'wckey ID');

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurmdb',
      path: `/wckey/${encodeURIComponent(String(id))}`,
    });
    return this.first(this.decodeEntries(data, 'wckeys', decodeWCKey), id);
  }

  async create(signal: AbortSignal, wckey: WCKeyCreate): Promise<void> {
    const client = this.begin(signal, 'create');
    this.validateResourceName(wckey.name, 'wckey name');
    this.validateResourceName(wckey.user, 'wckey user');
    const cluster =
      wckey.cluster === undefined || wckey.cluster === '' ? this.defaultClusterName : wckey.cluster;
    this.validateResourceName(cluster, 'wckey cluster');

    await this.call(client, signal, {
      method: 'POST',
      api: 'slurmdb',
      path: '/wckeys',
      body: { wckeys: [encodeWCKey({ ...wckey, cluster })] },
    });
  }

  async delete(signal: AbortSignal, id: string | number): Promise<void> {
    const client = this.begin(signal, 'delete');
    this.validateResourceName(id, 'wckey ID');

    await this.call(client, signal, {
      method: 'DELETE',
      api: 'slurmdb',
      path: `/wckey/${encodeURIComponent(String(id))}`,
    });
  }
}
