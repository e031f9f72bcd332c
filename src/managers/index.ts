/**
 * Manager contracts and shared adapter machinery.
 * @module managers
 */

export type {
  Capabilities,
  JobManager,
  NodeManager,
  PartitionManager,
  ReservationManager,
  QoSManager,
  AccountManager,
  UserManager,
  AssociationManager,
  ClusterManager,
  WCKeyManager,
  TRESManager,
  InfoManager,
} from './interfaces.js';

export {
  BaseManager,
  ALL_OPERATIONS,
  READ_ONLY,
  NO_OPERATIONS,
  createDecoder,
  paginate,
  matchesAny,
  matchesOne,
  intersects,
  joinFilter,
  compact,
  isRecord,
} from './base.js';
export type { Operation, AdapterContext, DecodeResult, EntityDecoder } from './base.js';

export { EventQueue, PollingWatch, DEFAULT_POLL_INTERVAL, DEFAULT_BUFFER_SIZE } from './watch.js';
export type { PollingWatchOptions } from './watch.js';
