/**
 * Node adapter.
 * @module adapters/nodes
 */

import { BaseManager, matchesAny, paginate } from '../managers/base.js';
import type { AdapterContext, EntityDecoder, Operation } from '../managers/base.js';
import type { NodeManager } from '../managers/interfaces.js';
import { PollingWatch } from '../managers/watch.js';
import type {
  ListNodesOptions,
  ListResult,
  Node,
  NodeUpdate,
  WatchNodesOptions,
  WatchStream,
} from '../types/index.js';
import { encodeNodeUpdate } from './converters/node.js';

function matchesNode(node: Node, options: ListNodesOptions): boolean {
  const features = options.features ?? [];
  return (
    matchesAny(node.name, options.names) &&
    matchesAny(node.state, options.states) &&
    (!options.partition || matchesAny(options.partition, node.partitions)) &&
    features.every((feature) => matchesAny(feature, node.features))
  );
}

export class NodeAdapter extends BaseManager implements NodeManager {
  /**
   * @param decode - Absent for versions with no node endpoints.
   */
  constructor(
    context: AdapterContext,
    private readonly decode: EntityDecoder<Node> | null,
    operations: readonly Operation[]
  ) {
    super('node', context, operations);
  }

  async list(signal: AbortSignal, options: ListNodesOptions = {}): Promise<ListResult<Node>> {
    const client = this.begin(signal, 'list');
    this.validateListOptions(options);

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurm',
      path: '/nodes',
      query: { update_time: options.updatedSince },
    });
    const nodes = this.decodeEntries(data, 'nodes', this.decoder(signal));
    return paginate(
      nodes.filter((node) => matchesNode(node, options)),
      options
    );
  }

  async get(signal: AbortSignal, name: string): Promise<Node> {
    const client = this.begin(signal, 'get');
    this.validateResourceName(name, 'node name');

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurm',
      path: `/node/${encodeURIComponent(name)}`,
    });
    return this.first(this.decodeEntries(data, 'nodes', this.decoder(signal)), name);
  }

  async update(signal: AbortSignal, name: string, update: NodeUpdate): Promise<void> {
    const client = this.begin(signal, 'update');
    this.validateResourceName(name, 'node name');
    this.requireUpdateFields(update);

    await this.call(client, signal, {
      method: 'POST',
      api: 'slurm',
      path: `/node/${encodeURIComponent(name)}`,
      body: encodeNodeUpdate(update),
    });
  }

  async delete(signal: AbortSignal, name: string): Promise<void> {
    const client = this.begin(signal, 'delete');
    this.validateResourceName(name, 'node name');

    await this.call(client, signal, {
      method: 'DELETE',
      api: 'slurm',
      path: `/node/${encodeURIComponent(name)}`,
    });
  }

  async watch(signal: AbortSignal, options: WatchNodesOptions = {}): Promise<WatchStream<Node>> {
    this.begin(signal, 'list');
    // Polls always diff the whole filtered list.
    const filter = { ...options.filter, limit: undefined, offset: undefined };
    return new PollingWatch(signal, {
      list: async (pollSignal) => (await this.list(pollSignal, filter)).items,
      key: (node) => node.name,
      resource: this.resource,
      logger: this.logger,
      pollInterval: options.pollInterval,
      bufferSize: options.bufferSize,
      emitInitial: options.emitInitial,
    });
  }

  private decoder(signal: AbortSignal): EntityDecoder<Node> {
    if (!this.decode) {
      this.refuse(signal, 'list');
    }
    return this.decode;
  }
}
