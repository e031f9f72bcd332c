/**
 * Tests for the per-version entity decoders on sparse and null payloads.
 */

import { describe, it, expect } from 'vitest';
import {
  convertAccount,
  convertAssociation,
  convertCluster,
  convertTRES,
  convertUser,
  convertWCKey,
} from '../adapters/index.js';
import { createDecoder } from '../managers/base.js';
import type { EntityDecoder } from '../managers/base.js';
import {
  accountSchema,
  associationSchema,
  clusterSchema,
  dropNulls,
  tresSchema,
  userSchema,
  wckeySchema,
} from '../wire/common.js';
import * as v40 from '../versions/v0_0_40.js';
import * as v41 from '../versions/v0_0_41.js';
import * as v42 from '../versions/v0_0_42.js';

const ZERO_JOB = {
  id: 0,
  name: '',
  account: '',
  partition: '',
  userName: '',
  state: '',
  stateFlags: [],
  stateReason: '',
  qos: '',
  timeLimit: 0,
  nodeCount: 0,
  cpus: 0,
  priority: 0,
  command: '',
  workingDirectory: '',
  submitTime: 0,
  startTime: 0,
  endTime: 0,
};

const ZERO_NODE = {
  name: '',
  hostname: '',
  state: '',
  stateFlags: [],
  partitions: [],
  cpus: 0,
  allocatedCpus: 0,
  realMemory: 0,
  features: [],
  reason: '',
  architecture: '',
};

const ZERO_PARTITION = {
  name: '',
  state: '',
  nodes: '',
  totalNodes: 0,
  totalCpus: 0,
  minNodes: 0,
  maxNodes: 0,
  maxTime: 0,
  defaultTime: 0,
  priority: 0,
  allowAccounts: [],
  denyAccounts: [],
  allowQoS: [],
  denyQoS: [],
  qos: '',
};

const ZERO_RESERVATION = {
  name: '',
  startTime: 0,
  endTime: 0,
  nodeCount: 0,
  nodeList: '',
  users: [],
  accounts: [],
  partition: '',
  flags: [],
};

const ZERO_QOS = {
  name: '',
  description: '',
  priority: 0,
  usageFactor: 0,
  maxJobs: 0,
  maxCpus: 0,
  maxNodes: 0,
  maxWallTime: 0,
};

const accounting: Array<[string, EntityDecoder<unknown>, object]> = [
  [
    'account',
    createDecoder(accountSchema, convertAccount),
    { name: '', description: '', organization: '', coordinators: [] },
  ],
  [
    'user',
    createDecoder(userSchema, convertUser),
    { name: '', defaultAccount: '', defaultWCKey: '', adminLevel: '', associations: [] },
  ],
  [
    'association',
    createDecoder(associationSchema, convertAssociation),
    {
      id: 0,
      account: '',
      user: '',
      cluster: '',
      partition: '',
      qos: [],
      defaultQoS: '',
      parentAccount: '',
      isDefault: false,
    },
  ],
  [
    'cluster',
    createDecoder(clusterSchema, convertCluster),
    { name: '', controllerHost: '', controllerPort: 0, nodes: '', rpcVersion: 0 },
  ],
  ['tres', createDecoder(tresSchema, convertTRES), { id: 0, type: '', name: '', count: 0 }],
  ['wckey', createDecoder(wckeySchema, convertWCKey), { id: 0, name: '', user: '', cluster: '' }],
];

describe('dropNulls', () => {
  it('should drop null properties and array elements at any depth', () => {
    expect(dropNulls({ a: null, b: [1, null, { c: null, d: 2 }], e: 'x' })).toEqual({
      b: [1, { d: 2 }],
      e: 'x',
    });
  });

  it('should leave scalars alone', () => {
    expect(dropNulls('x')).toBe('x');
    expect(dropNulls(0)).toBe(0);
    expect(dropNulls(null)).toBe(null);
  });
});

describe('empty payloads', () => {
  it('should decode jobs to zero values on every job shape', () => {
    for (const codec of [v40.jobCodec, v41.jobCodec, v42.jobCodec]) {
      expect(codec.decode({})).toEqual({ ok: true, value: ZERO_JOB });
    }
  });

  it('should decode nodes to zero values on every node shape', () => {
    expect(v40.decodeNode({})).toEqual({ ok: true, value: ZERO_NODE });
    expect(v42.decodeNode({})).toEqual({ ok: true, value: ZERO_NODE });
  });

  it('should decode partitions to zero values on every partition shape', () => {
    expect(v40.decodePartition({})).toEqual({ ok: true, value: ZERO_PARTITION });
    expect(v41.decodePartition({})).toEqual({ ok: true, value: ZERO_PARTITION });
  });

  it('should decode reservations to zero values on every reservation shape', () => {
    expect(v40.decodeReservation({})).toEqual({ ok: true, value: ZERO_RESERVATION });
    expect(v42.decodeReservation({})).toEqual({ ok: true, value: ZERO_RESERVATION });
  });

  it('should decode QoS to zero values on every QoS shape', () => {
    expect(v40.qosCodec.decode({})).toEqual({ ok: true, value: ZERO_QOS });
    expect(v42.qosCodec.decode({})).toEqual({ ok: true, value: ZERO_QOS });
  });

  it('should decode accounting entities to zero values', () => {
    for (const [name, decode, zero] of accounting) {
      expect(decode({}), name).toEqual({ ok: true, value: zero });
    }
  });
});

describe('null fields', () => {
  it('should read null job fields as absent', () => {
    expect(v40.jobCodec.decode({ job_id: 7, job_state: null, time_limit: null })).toEqual({
      ok: true,
      value: { ...ZERO_JOB, id: 7 },
    });
    expect(v42.jobCodec.decode({ job_id: 7, job_state: [null, 'RUNNING'], cpus: null })).toEqual({
      ok: true,
      value: { ...ZERO_JOB, id: 7, state: 'RUNNING' },
    });
  });

  it('should read null node fields as absent', () => {
    const raw = { name: 'node001', state: null, features: null, partitions: null, cpus: null };
    expect(v40.decodeNode(raw)).toEqual({ ok: true, value: { ...ZERO_NODE, name: 'node001' } });
    expect(v42.decodeNode(raw)).toEqual({ ok: true, value: { ...ZERO_NODE, name: 'node001' } });
  });

  it('should read null partition fields as absent', () => {
    const raw = { name: 'batch', maximums: null, qos: { allowed: null }, partition: { state: null } };
    expect(v40.decodePartition(raw)).toEqual({ ok: true, value: { ...ZERO_PARTITION, name: 'batch' } });
    expect(v41.decodePartition(raw)).toEqual({ ok: true, value: { ...ZERO_PARTITION, name: 'batch' } });
  });

  it('should read null reservation fields as absent', () => {
    const raw = { name: 'maint', start_time: null, users: null, flags: null };
    expect(v40.decodeReservation(raw)).toEqual({
      ok: true,
      value: { ...ZERO_RESERVATION, name: 'maint' },
    });
    expect(v42.decodeReservation(raw)).toEqual({
      ok: true,
      value: { ...ZERO_RESERVATION, name: 'maint' },
    });
  });

  it('should read null QoS fields as absent', () => {
    expect(v42.qosCodec.decode({ name: 'normal', description: null, limits: null })).toEqual({
      ok: true,
      value: { ...ZERO_QOS, name: 'normal' },
    });
  });

  it('should read null accounting fields as absent', () => {
    const raw = {
      name: null,
      id: null,
      default: null,
      associations: null,
      coordinators: null,
      qos: null,
      controller: null,
      count: null,
      user: null,
    };
    for (const [name, decode, zero] of accounting) {
      expect(decode(raw), name).toEqual({ ok: true, value: zero });
    }
  });
});
