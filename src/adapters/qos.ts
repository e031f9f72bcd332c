/**
 * QoS adapter.
 * @module adapters/qos
 */

import { ALL_OPERATIONS, BaseManager, joinFilter, matchesAny, paginate } from '../managers/base.js';
import type { AdapterContext, EntityDecoder, Operation } from '../managers/base.js';
import type { QoSManager } from '../managers/interfaces.js';
import type { ListQoSOptions, ListResult, QoS, QoSCreate, QoSUpdate } from '../types/index.js';

/**
 * Version-specific QoS wire handling.
 */
export interface QoSCodec {
  decode: EntityDecoder<QoS>;
  encode(name: string, fields: QoSCreate | QoSUpdate): unknown;
}

export class QoSAdapter extends BaseManager implements QoSManager {
  constructor(
    context: AdapterContext,
    private readonly codec: QoSCodec,
    operations: readonly Operation[] = ALL_OPERATIONS
  ) {
    super('qos', context, operations);
  }

  async list(signal: AbortSignal, options: ListQoSOptions = {}): Promise<ListResult<QoS>> {
    const client = this.begin(signal, 'list');
    this.validateListOptions(options);

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurmdb',
      path: '/qos',
      query: { name: joinFilter(options.names) },
    });
    const entries = this.decodeEntries(data, 'qos', this.codec.decode);
    return paginate(
      entries.filter((qos) => matchesAny(qos.name, options.names)),
      options
    );
  }

  async get(signal: AbortSignal, name: string): Promise<QoS> {
    const client = this.begin(signal, 'get');
    this.validateResourceName(name, 'QoS name');

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurmdb',
      path: `/qos/${encodeURIComponent(name)}`,
    });
    return this.first(this.decodeEntries(data, 'qos', this.codec.decode), name);
  }

  async create(signal: AbortSignal, qos: QoSCreate): Promise<void> {
    const client = this.begin(signal, 'create');
    this.validateResourceName(qos.name, 'QoS name');

    await this.call(client, signal, {
      method: 'POST',
      api: 'slurmdb',
      path: '/qos',
      body: { qos: [this.codec.encode(qos.name, qos)] },
    });
  }

  async update(signal: AbortSignal, name: string, update: QoSUpdate): Promise<void> {
    const client = this.begin(signal, 'update');
    this.validateResourceName(name, 'QoS name');
    this.requireUpdateFields(update);

    await this.call(client, signal, {
      method: 'POST',
      api: 'slurmdb',
      path: '/qos',
      body: { qos: [this.codec.encode(name, update)] },
    });
  }

  async delete(signal: AbortSignal, name: string): Promise<void> {
    const client = this.begin(signal, 'delete');
    this.validateResourceName(name, 'QoS name');

    await this.call(client, signal, {
      method: 'DELETE',
      api: 'slurmdb',
      path: `/qos/${encodeURIComponent(name)}`,
    });
  }
}
