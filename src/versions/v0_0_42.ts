/**
 * v0.0.42 adapter set.
 *
 * Nodes can be updated and deleted, clusters created and deleted.
 * Reservations are still read-only here.
 * @module versions/v0_0_42
 */

import {
  AccountAdapter,
  AssociationAdapter,
  ClusterAdapter,
  InfoAdapter,
  JobAdapter,
  NodeAdapter,
  PartitionAdapter,
  QoSAdapter,
  ReservationAdapter,
  TRESAdapter,
  UserAdapter,
  WCKeyAdapter,
} from '../adapters/index.js';
import type { JobCodec, QoSCodec } from '../adapters/index.js';
import { convertJob, encodeJobSubmission, encodeJobUpdate } from '../adapters/converters/job.js';
import { convertNode } from '../adapters/converters/node.js';
import { convertQoS, encodeQoS } from '../adapters/converters/qos.js';
import { convertReservation } from '../adapters/converters/reservation.js';
import { READ_ONLY, createDecoder } from '../managers/base.js';
import type { AdapterContext, Operation } from '../managers/base.js';
import * as V41 from '../wire/v0_0_41.js';
import * as V42 from '../wire/v0_0_42.js';
import type { AdapterSet } from './types.js';
import { decodePartition } from './v0_0_41.js';

export const VERSION = 'v0.0.42';

/** Node operations from this version on. */
export const NODE_OPERATIONS: readonly Operation[] = ['list', 'get', 'update', 'delete'];

/** Cluster and wckey operations from this version on. */
export const REGISTRY_OPERATIONS: readonly Operation[] = ['list', 'get', 'create', 'delete'];

export const jobCodec: JobCodec = {
  decode: createDecoder(V41.jobSchema, (job) => convertJob({ version: 'v0.0.41', job })),
  encodeSubmit: (submission) => encodeJobSubmission(submission, 'v0.0.42'),
  encodeUpdate: (update) => encodeJobUpdate(update, 'v0.0.41'),
};

export const qosCodec: QoSCodec = {
  decode: createDecoder(V42.qosSchema, (qos) => convertQoS({ version: 'v0.0.42', qos })),
  encode: (name, fields) => encodeQoS(name, fields, 'v0.0.42'),
};

export const decodeNode = createDecoder(V42.nodeSchema, (node) =>
  convertNode({ version: 'v0.0.42', node })
);

export const decodeReservation = createDecoder(V42.reservationSchema, (reservation) =>
  convertReservation({ version: 'v0.0.42', reservation })
);

export function createAdapters(context: AdapterContext): AdapterSet {
  return {
    version: VERSION,
    jobs: new JobAdapter(context, jobCodec),
    nodes: new NodeAdapter(context, decodeNode, NODE_OPERATIONS),
    partitions: new PartitionAdapter(context, decodePartition),
    reservations: new ReservationAdapter(context, decodeReservation, READ_ONLY),
    qos: new QoSAdapter(context, qosCodec),
    accounts: new AccountAdapter(context),
    users: new UserAdapter(context),
    associations: new AssociationAdapter(context),
    clusters: new ClusterAdapter(context, REGISTRY_OPERATIONS),
    wckeys: new WCKeyAdapter(context, REGISTRY_OPERATIONS),
    tres: new TRESAdapter(context),
    info: new InfoAdapter(context),
  };
}
