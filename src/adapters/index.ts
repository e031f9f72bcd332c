/**
 * Entity adapters and converters.
 */

export { JobAdapter } from './jobs.js';
export type { JobCodec } from './jobs.js';
export { NodeAdapter } from './nodes.js';
export { PartitionAdapter } from './partitions.js';
export { ReservationAdapter } from './reservations.js';
export { QoSAdapter } from './qos.js';
export type { QoSCodec } from './qos.js';
export { AccountAdapter, buildAccountHierarchy } from './accounts.js';
export { UserAdapter } from './users.js';
export { AssociationAdapter } from './associations.js';
export { ClusterAdapter } from './clusters.js';
export { WCKeyAdapter } from './wckeys.js';
export { TRESAdapter } from './tres.js';
export { InfoAdapter, formatSlurmVersion } from './info.js';

export {
  convertJob,
  encodeJobSubmission,
  encodeJobUpdate,
  buildScript,
  splitState,
  DEFAULT_ENVIRONMENT,
} from './converters/job.js';
export type { JobWire, JobEncoding } from './converters/job.js';
export { convertNode, encodeNodeUpdate } from './converters/node.js';
export type { NodeWire, NodeUpdateBody } from './converters/node.js';
export { convertPartition } from './converters/partition.js';
export type { PartitionWire } from './converters/partition.js';
export { convertReservation, encodeReservation } from './converters/reservation.js';
export type { ReservationWire } from './converters/reservation.js';
export { convertQoS, encodeQoS } from './converters/qos.js';
export type { QoSWire, QoSEncoding } from './converters/qos.js';
export {
  convertAccount,
  convertUser,
  convertAssociation,
  convertCluster,
  convertTRES,
  convertWCKey,
} from './converters/accounting.js';
