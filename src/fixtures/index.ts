/**
 * Wire payload fixtures for testing slurmrestd responses.
 */

import type { NoVal } from '../wire/common.js';
import type * as V40 from '../wire/v0_0_40.js';
import type * as V41 from '../wire/v0_0_41.js';
import type * as V42 from '../wire/v0_0_42.js';
import type {
  WireAccount,
  WireAssociation,
  WireCluster,
  WireMeta,
  WirePing,
  WireTRES,
  WireUser,
  WireWCKey,
} from '../wire/common.js';

/**
 * Set no-val number
 */
export function noVal(value: number): NoVal {
  return { set: true, infinite: false, number: value };
}

/**
 * Infinite no-val number
 */
export const INFINITE: NoVal = { set: true, infinite: true, number: 0 };

/**
 * Job fixtures
 */
export const jobFixtures = {
  v40(overrides?: Partial<V40.Job>): V40.Job {
    return {
      job_id: 1001,
      name: 'train-model',
      account: 'research',
      partition: 'gpu',
      user_name: 'alice',
      job_state: 'RUNNING',
      qos: 'normal',
      time_limit: 60,
      node_count: 2,
      cpus: 16,
      priority: 4294,
      command: '/home/alice/train.sh',
      current_working_directory: '/home/alice',
      submit_time: 1700000000,
      start_time: 1700000100,
      end_time: 1700003700,
      ...overrides,
    };
  },

  v41(overrides?: Partial<V41.Job>): V41.Job {
    return {
      job_id: 1001,
      name: 'train-model',
      account: 'research',
      partition: 'gpu',
      user_name: 'alice',
      job_state: ['RUNNING'],
      qos: 'normal',
      time_limit: noVal(60),
      node_count: noVal(2),
      cpus: noVal(16),
      priority: noVal(4294),
      command: '/home/alice/train.sh',
      current_working_directory: '/home/alice',
      submit_time: noVal(1700000000),
      start_time: noVal(1700000100),
      end_time: noVal(1700003700),
      ...overrides,
    };
  },
};

/**
 * Node fixtures
 */
export const nodeFixtures = {
  v40(overrides?: Partial<V40.Node>): V40.Node {
    return {
      name: 'node001',
      hostname: 'node001.cluster',
      state: 'IDLE',
      partitions: ['batch'],
      cpus: 64,
      alloc_cpus: 0,
      real_memory: 256000,
      features: 'avx512,ib',
      architecture: 'x86_64',
      ...overrides,
    };
  },

  v42(overrides?: Partial<V42.Node>): V42.Node {
    return {
      name: 'node001',
      hostname: 'node001.cluster',
      state: ['IDLE'],
      partitions: ['batch'],
      cpus: 64,
      alloc_cpus: 0,
      real_memory: 256000,
      features: ['avx512', 'ib'],
      architecture: 'x86_64',
      ...overrides,
    };
  },
};

/**
 * Partition fixtures
 */
export const partitionFixtures = {
  v40(overrides?: Partial<V40.Partition>): V40.Partition {
    return {
      name: 'batch',
      partition: { state: ['UP'] },
      nodes: { configured: 'node[001-010]', total: 10 },
      cpus: { total: 640 },
      minimums: { nodes: 1 },
      maximums: { nodes: 10, time: 1440 },
      defaults: { time: 60 },
      priority: { job_factor: 1 },
      accounts: { allowed: 'research,ops' },
      qos: { allowed: 'normal', assigned: 'normal' },
      ...overrides,
    };
  },

  v41(overrides?: Partial<V41.Partition>): V41.Partition {
    return {
      name: 'batch',
      partition: { state: ['UP'] },
      nodes: { configured: 'node[001-010]', total: 10 },
      cpus: { total: 640 },
      minimums: { nodes: 1 },
      maximums: { nodes: noVal(10), time: noVal(1440) },
      defaults: { time: noVal(60) },
      priority: { job_factor: 1 },
      accounts: { allowed: 'research,ops' },
      qos: { allowed: 'normal', assigned: 'normal' },
      ...overrides,
    };
  },
};

/**
 * Reservation fixtures
 */
export const reservationFixtures = {
  v40(overrides?: Partial<V40.Reservation>): V40.Reservation {
    return {
      name: 'maint',
      start_time: 1700000000,
      end_time: 1700086400,
      node_count: 4,
      node_list: 'node[001-004]',
      users: 'root,ops',
      accounts: 'admin',
      partition: 'batch',
      flags: ['MAINT'],
      ...overrides,
    };
  },

  v42(overrides?: Partial<V42.Reservation>): V42.Reservation {
    return {
      name: 'maint',
      start_time: noVal(1700000000),
      end_time: noVal(1700086400),
      node_count: 4,
      node_list: 'node[001-004]',
      users: 'root,ops',
      accounts: 'admin',
      partition: 'batch',
      flags: ['MAINT'],
      ...overrides,
    };
  },
};

/**
 * QoS fixtures
 */
export const qosFixtures = {
  v40(overrides?: Partial<V40.QoS>): V40.QoS {
    return {
      name: 'normal',
      description: 'Normal QoS',
      priority: noVal(10),
      usage_factor: noVal(1),
      limits: {
        max: {
          jobs: { per: { user: noVal(50) } },
          tres: {
            per: {
              job: [
                { type: 'cpu', count: 128 },
                { type: 'node', count: 4 },
              ],
            },
          },
          wall_clock: { per: { job: noVal(2880) } },
        },
      },
      ...overrides,
    };
  },

  v42(overrides?: Partial<V42.QoS>): V42.QoS {
    return {
      name: 'normal',
      description: 'Normal QoS',
      priority: noVal(10),
      usage_factor: noVal(1),
      limits: {
        max: {
          jobs: { active_jobs: { per: { user: noVal(50) } } },
          tres: {
            per: {
              job: [
                { type: 'cpu', count: 128 },
                { type: 'node', count: 4 },
              ],
            },
          },
          wall_clock: { per: { job: noVal(2880) } },
        },
      },
      ...overrides,
    };
  },
};

/**
 * Accounting fixtures, shared by every version
 */
export const accountingFixtures = {
  account(overrides?: Partial<WireAccount>): WireAccount {
    return {
      name: 'research',
      description: 'Research group',
      organization: 'science',
      coordinators: [{ name: 'alice' }],
      ...overrides,
    };
  },

  user(overrides?: Partial<WireUser>): WireUser {
    return {
      name: 'alice',
      default: { account: 'research', wckey: 'ml' },
      administrator_level: ['None'],
      associations: [{ account: 'research', cluster: 'linux', partition: 'gpu', user: 'alice' }],
      ...overrides,
    };
  },

  association(overrides?: Partial<WireAssociation>): WireAssociation {
    return {
      id: 7,
      account: 'research',
      user: 'alice',
      cluster: 'linux',
      qos: ['normal'],
      default: { qos: 'normal' },
      parent_account: 'root',
      is_default: true,
      ...overrides,
    };
  },

  cluster(overrides?: Partial<WireCluster>): WireCluster {
    return {
      name: 'linux',
      controller: { host: 'ctl01', port: 6817 },
      nodes: 'node[001-010]',
      rpc_version: 10240,
      ...overrides,
    };
  },

  tres(overrides?: Partial<WireTRES>): WireTRES {
    return { id: 1, type: 'cpu', name: '', count: 640, ...overrides };
  },

  wckey(overrides?: Partial<WireWCKey>): WireWCKey {
    return { id: 3, name: 'ml', user: 'alice', cluster: 'linux', ...overrides };
  },

  ping(overrides?: Partial<WirePing>): WirePing {
    return { hostname: 'ctl01', pinged: 'UP', mode: 'primary', latency: 120, ...overrides };
  },

  meta(overrides?: Partial<WireMeta>): WireMeta {
    return {
      plugin: {
        type: 'openapi/slurmctld',
        name: 'Slurm OpenAPI slurmctld',
        data_parser: 'data_parser/v0.0.42',
        accounting_storage: 'accounting_storage/slurmdbd',
      },
      slurm: { version: { major: '24', minor: '05', micro: '3' }, release: '24.05.3', cluster: 'linux' },
      ...overrides,
    };
  },
};

/**
 * Response envelope with the given entity arrays
 */
export function envelope(body: Record<string, unknown> = {}): Record<string, unknown> {
  return { errors: [], warnings: [], ...body };
}

/**
 * Response envelope carrying one error entry
 */
export function errorEnvelope(description: string, errorNumber = 1): Record<string, unknown> {
  return {
    errors: [{ error: 'Unspecified error', error_number: errorNumber, description, source: 'slurmrestd' }],
    warnings: [],
  };
}
