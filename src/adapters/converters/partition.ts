/**
 * Partition conversion.
 * @module adapters/converters/partition
 */

import type { Partition } from '../../types/index.js';
import { fromNoVal, fromPlainNumber, splitList } from '../../wire/common.js';
import type * as V40 from '../../wire/v0_0_40.js';
import type * as V41 from '../../wire/v0_0_41.js';

/**
 * A wire partition tagged with the version that introduced its shape.
 */
export type PartitionWire =
  | { version: 'v0.0.40'; partition: V40.Partition }
  | { version: 'v0.0.41'; partition: V41.Partition };

function limits(input: PartitionWire): { maxNodes: number; maxTime: number; defaultTime: number } {
  if (input.version === 'v0.0.40') {
    const { maximums, defaults } = input.partition;
    return {
      maxNodes: fromPlainNumber(maximums?.nodes),
      maxTime: fromPlainNumber(maximums?.time),
      defaultTime: fromPlainNumber(defaults?.time),
    };
  }
  const { maximums, defaults } = input.partition;
  return {
    maxNodes: fromNoVal(maximums?.nodes),
    maxTime: fromNoVal(maximums?.time),
    defaultTime: fromNoVal(defaults?.time),
  };
}

export function convertPartition(input: PartitionWire): Partition {
  const { partition } = input;
  return {
    name: partition.name ?? '',
    state: partition.partition?.state?.[0] ?? '',
    nodes: partition.nodes?.configured ?? '',
    totalNodes: partition.nodes?.total ?? 0,
    totalCpus: partition.cpus?.total ?? 0,
    minNodes: partition.minimums?.nodes ?? 0,
    ...limits(input),
    priority: partition.priority?.job_factor ?? 0,
    allowAccounts: splitList(partition.accounts?.allowed),
    denyAccounts: splitList(partition.accounts?.deny),
    allowQoS: splitList(partition.qos?.allowed),
    denyQoS: splitList(partition.qos?.deny),
    qos: partition.qos?.assigned ?? '',
  };
}
