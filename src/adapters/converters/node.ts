/**
 * Node conversion.
 * @module adapters/converters/node
 */

import type { Node, NodeUpdate } from '../../types/index.js';
import { compact } from '../../managers/base.js';
import { splitList } from '../../wire/common.js';
import type * as V40 from '../../wire/v0_0_40.js';
import type * as V42 from '../../wire/v0_0_42.js';
import { splitState } from './job.js';

/**
 * A wire node tagged with the version that introduced its shape.
 */
export type NodeWire =
  | { version: 'v0.0.40'; node: V40.Node }
  | { version: 'v0.0.42'; node: V42.Node };

export function convertNode(input: NodeWire): Node {
  const { node } = input;
  const { state, flags } =
    input.version === 'v0.0.40'
      ? splitState(input.node.state ? [input.node.state] : [])
      : splitState(input.node.state ?? []);
  const features =
    input.version === 'v0.0.40' ? splitList(input.node.features) : [...(input.node.features ?? [])];

  return {
    name: node.name ?? '',
    hostname: node.hostname ?? '',
    state,
    stateFlags: flags,
    partitions: [...(node.partitions ?? [])],
    cpus: node.cpus ?? 0,
    allocatedCpus: node.alloc_cpus ?? 0,
    realMemory: node.real_memory ?? 0,
    features,
    reason: node.reason ?? '',
    architecture: node.architecture ?? '',
  };
}

/**
 * Node update body, as accepted from v0.0.42.
 */
export interface NodeUpdateBody {
  state?: string[];
  reason?: string;
  features?: string[];
  comment?: string;
}

export function encodeNodeUpdate(update: NodeUpdate): NodeUpdateBody {
  return compact<NodeUpdateBody>({
    state: update.state === undefined ? undefined : [update.state],
    reason: update.reason,
    features: update.features,
    comment: update.comment,
  });
}
