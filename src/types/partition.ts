/**
 * Partition types.
 */

import type { EpochSeconds, ListOptions, WatchOptions } from './common.js';

/**
 * Partition
 */
export interface Partition {
  name: string;
  state: string;
  /** Node list expression, e.g. "node[01-10]". */
  nodes: string;
  totalNodes: number;
  totalCpus: number;
  minNodes: number;
  maxNodes: number;
  /** Minutes; UNLIMITED when infinite. */
  maxTime: number;
  /** Minutes. */
  defaultTime: number;
  priority: number;
  allowAccounts: string[];
  denyAccounts: string[];
  allowQoS: string[];
  denyQoS: string[];
  qos: string;
}

/**
 * Partition creation
 */
export interface PartitionCreate {
  name: string;
  nodes?: string;
  maxTime?: number;
  defaultTime?: number;
  priority?: number;
  allowAccounts?: string[];
  allowQoS?: string[];
}

/**
 * Partition update; absent fields are left untouched.
 */
export interface PartitionUpdate {
  state?: string;
  nodes?: string;
  maxTime?: number;
  defaultTime?: number;
  priority?: number;
  allowAccounts?: string[];
  allowQoS?: string[];
}

/**
 * Partition list filters
 */
export interface ListPartitionsOptions extends ListOptions {
  names?: string[];
  states?: string[];
  updatedSince?: EpochSeconds;
}

/**
 * Partition watch settings
 */
export interface WatchPartitionsOptions extends WatchOptions {
  filter?: Omit<ListPartitionsOptions, 'limit' | 'offset'>;
}
