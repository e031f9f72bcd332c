/**
 * v0.0.40 adapter set.
 *
 * Nodes, reservations, clusters and wckeys are read-only.
 * @module versions/v0_0_40
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
import { convertPartition } from '../adapters/converters/partition.js';
import { convertQoS, encodeQoS } from '../adapters/converters/qos.js';
import { convertReservation } from '../adapters/converters/reservation.js';
import { READ_ONLY, createDecoder } from '../managers/base.js';
import type { AdapterContext } from '../managers/base.js';
import * as V40 from '../wire/v0_0_40.js';
import type { AdapterSet } from './types.js';

export const VERSION = 'v0.0.40';

export const jobCodec: JobCodec = {
  decode: createDecoder(V40.jobSchema, (job) => convertJob({ version: 'v0.0.40', job })),
  encodeSubmit: (submission) => encodeJobSubmission(submission, 'v0.0.40'),
  encodeUpdate: (update) => encodeJobUpdate(update, 'v0.0.40'),
};

export const qosCodec: QoSCodec = {
  decode: createDecoder(V40.qosSchema, (qos) => convertQoS({ version: 'v0.0.40', qos })),
  encode: (name, fields) => encodeQoS(name, fields, 'v0.0.40'),
};

export const decodeNode = createDecoder(V40.nodeSchema, (node) =>
  convertNode({ version: 'v0.0.40', node })
);

export const decodePartition = createDecoder(V40.partitionSchema, (partition) =>
  convertPartition({ version: 'v0.0.40', partition })
);

export const decodeReservation = createDecoder(V40.reservationSchema, (reservation) =>
  convertReservation({ version: 'v0.0.40', reservation })
);

export function createAdapters(context: AdapterContext): AdapterSet {
  return {
    version: VERSION,
    jobs: new JobAdapter(context, jobCodec),
    nodes: new NodeAdapter(context, decodeNode, READ_ONLY),
    partitions: new PartitionAdapter(context, decodePartition),
    reservations: new ReservationAdapter(context, decodeReservation, READ_ONLY),
    qos: new QoSAdapter(context, qosCodec),
    accounts: new AccountAdapter(context),
    users: new UserAdapter(context),
    associations: new AssociationAdapter(context),
    clusters: new ClusterAdapter(context, READ_ONLY),
    wckeys: new WCKeyAdapter(context, READ_ONLY),
    tres: new TRESAdapter(context),
    info: new InfoAdapter(context),
  };
}
