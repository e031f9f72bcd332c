/**
 * Partition adapter. Partitions are defined in slurm.conf, so every version
 * only reads them.
 * @module adapters/partitions
 */

import { BaseManager, READ_ONLY, matchesAny, paginate } from '../managers/base.js';
import type { AdapterContext, EntityDecoder } from '../managers/base.js';
import type { PartitionManager } from '../managers/interfaces.js';
import { PollingWatch } from '../managers/watch.js';
import type {
  ListPartitionsOptions,
  ListResult,
  Partition,
  PartitionCreate,
  PartitionUpdate,
  WatchPartitionsOptions,
  WatchStream,
} from '../types/index.js';

export class PartitionAdapter extends BaseManager implements PartitionManager {
  constructor(
    context: AdapterContext,
    private readonly decode: EntityDecoder<Partition>
  ) {
    super('partition', context, READ_ONLY);
  }

  async list(signal: AbortSignal, options: ListPartitionsOptions = {}): Promise<ListResult<Partition>> {
    const client = this.begin(signal, 'list');
    this.validateListOptions(options);

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurm',
      path: '/partitions',
      query: { update_time: options.updatedSince },
    });
    const partitions = this.decodeEntries(data, 'partitions', this.decode);
    return paginate(
      partitions.filter(
        (partition) =>
          matchesAny(partition.name, options.names) && matchesAny(partition.state, options.states)
      ),
      options
    );
  }

  async get(signal: AbortSignal, name: string): Promise<Partition> {
    const client = this.begin(signal, 'get');
    this.validateResourceName(name, 'partition name');

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurm',
      path: `/partition/${encodeURIComponent(name)}`,
    });
    return this.first(this.decodeEntries(data, 'partitions', this.decode), name);
  }

  async create(signal: AbortSignal, _partition: PartitionCreate): Promise<void> {
    this.refuse(signal, 'create');
  }

  async update(signal: AbortSignal, _name: string, _update: PartitionUpdate): Promise<void> {
    this.refuse(signal, 'update');
  }

  async delete(signal: AbortSignal, _name: string): Promise<void> {
    this.refuse(signal, 'delete');
  }

  async watch(
    signal: AbortSignal,
    options: WatchPartitionsOptions = {}
  ): Promise<WatchStream<Partition>> {
    this.begin(signal, 'list');
    // Polls always diff the whole filtered list.
    const filter = { ...options.filter, limit: undefined, offset: undefined };
    return new PollingWatch(signal, {
      list: async (pollSignal) => (await this.list(pollSignal, filter)).items,
      key: (partition) => partition.name,
      resource: this.resource,
      logger: this.logger,
      pollInterval: options.pollInterval,
      bufferSize: options.bufferSize,
      emitInitial: options.emitInitial,
    });
  }
}
