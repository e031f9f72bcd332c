/**
 * v0.0.41 adapter set.
 *
 * This version exposes no node endpoints at all. WCKeys gain create and
 * delete. Reservations and QoS keep the v0.0.40 wire shape.
 * @module versions/v0_0_41
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
import type { JobCodec } from '../adapters/index.js';
import { convertJob, encodeJobSubmission, encodeJobUpdate } from '../adapters/converters/job.js';
import { convertPartition } from '../adapters/converters/partition.js';
import { NO_OPERATIONS, READ_ONLY, createDecoder } from '../managers/base.js';
import type { AdapterContext } from '../managers/base.js';
import * as V41 from '../wire/v0_0_41.js';
import type { AdapterSet } from './types.js';
import { decodeReservation, qosCodec } from './v0_0_40.js';

export const VERSION = 'v0.0.41';

export const jobCodec: JobCodec = {
  decode: createDecoder(V41.jobSchema, (job) => convertJob({ version: 'v0.0.41', job })),
  encodeSubmit: (submission) => encodeJobSubmission(submission, 'v0.0.41'),
  encodeUpdate: (update) => encodeJobUpdate(update, 'v0.0.41'),
};

export const decodePartition = createDecoder(V41.partitionSchema, (partition) =>
  convertPartition({ version: 'v0.0.41', partition })
);

export function createAdapters(context: AdapterContext): AdapterSet {
  return {
    version: VERSION,
    jobs: new JobAdapter(context, jobCodec),
    nodes: new NodeAdapter(context, null, NO_OPERATIONS),
    partitions: new PartitionAdapter(context, decodePartition),
    reservations: new ReservationAdapter(context, decodeReservation, READ_ONLY),
    qos: new QoSAdapter(context, qosCodec),
    accounts: new AccountAdapter(context),
    users: new UserAdapter(context),
    associations: new AssociationAdapter(context),
    clusters: new ClusterAdapter(context, READ_ONLY),
    wckeys: new WCKeyAdapter(context, ['list', 'get', 'create', 'delete']),
    tres: new TRESAdapter(context),
    info: new InfoAdapter(context),
  };
}
