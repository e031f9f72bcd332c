/**
 * Adapter set contract shared by every version module.
 * @module versions/types
 */

import type { AdapterContext } from '../managers/base.js';
import type {
  AccountManager,
  AssociationManager,
  ClusterManager,
  InfoManager,
  JobManager,
  NodeManager,
  PartitionManager,
  QoSManager,
  ReservationManager,
  TRESManager,
  UserManager,
  WCKeyManager,
} from '../managers/interfaces.js';

/**
 * Every entity manager for one wire version.
 */
export interface AdapterSet {
  version: string;
  jobs: JobManager;
  nodes: NodeManager;
  partitions: PartitionManager;
  reservations: ReservationManager;
  qos: QoSManager;
  accounts: AccountManager;
  users: UserManager;
  associations: AssociationManager;
  clusters: ClusterManager;
  wckeys: WCKeyManager;
  tres: TRESManager;
  info: InfoManager;
}

/**
 * Builds the adapter set of one version.
 */
export type AdapterSetFactory = (context: AdapterContext) => AdapterSet;
