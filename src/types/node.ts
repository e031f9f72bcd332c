/**
 * Node types.
 */

import type { EpochSeconds, ListOptions, WatchOptions } from './common.js';

/**
 * Compute node
 */
export interface Node {
  name: string;
  hostname: string;
  /** Base state, e.g. IDLE or ALLOCATED. */
  state: string;
  /** Extra flags, e.g. DRAIN. */
  stateFlags: string[];
  partitions: string[];
  cpus: number;
  allocatedCpus: number;
  /** Megabytes. */
  realMemory: number;
  features: string[];
  reason: string;
  architecture: string;
}

/**
 * Node update; absent fields are left untouched.
 */
export interface NodeUpdate {
  state?: string;
  reason?: string;
  features?: string[];
  comment?: string;
}

/**
 * Node list filters
 */
export interface ListNodesOptions extends ListOptions {
  names?: string[];
  states?: string[];
  partition?: string;
  features?: string[];
  updatedSince?: EpochSeconds;
}

/**
 * Node watch settings
 */
export interface WatchNodesOptions extends WatchOptions {
  filter?: Omit<ListNodesOptions, 'limit' | 'offset'>;
}
