/**
 * Entity manager contracts exposed by the client facade.
 *
 * Every method takes the caller's AbortSignal first. Operations a wire
 * version does not offer fail with UnsupportedOperation without a wire call.
 * @module managers/interfaces
 */

import type {
  Account,
  AccountCreate,
  AccountHierarchy,
  AccountHierarchyOptions,
  AccountUpdate,
  Association,
  AssociationCreate,
  AssociationKey,
  AssociationUpdate,
  Cluster,
  ClusterCreate,
  ClusterInfo,
  Job,
  JobSubmission,
  JobSubmitResult,
  JobUpdate,
  ListAccountsOptions,
  ListAssociationsOptions,
  ListClustersOptions,
  ListJobsOptions,
  ListNodesOptions,
  ListPartitionsOptions,
  ListQoSOptions,
  ListReservationsOptions,
  ListResult,
  ListUsersOptions,
  ListWCKeysOptions,
  Node,
  NodeUpdate,
  Partition,
  PartitionCreate,
  PartitionUpdate,
  PingResult,
  QoS,
  QoSCreate,
  QoSUpdate,
  Reservation,
  ReservationCreate,
  ReservationUpdate,
  TRES,
  User,
  UserCreate,
  UserUpdate,
  VersionInfo,
  WCKey,
  WCKeyCreate,
  WatchJobsOptions,
  WatchNodesOptions,
  WatchPartitionsOptions,
  WatchStream,
} from '../types/index.js';
import type { Operation } from './base.js';

/**
 * Capability query shared by every manager.
 */
export interface Capabilities {
  /** True if the bound wire version offers `operation` for this entity. */
  supports(operation: Operation): boolean;
}

export interface JobManager extends Capabilities {
  list(signal: AbortSignal, options?: ListJobsOptions): Promise<ListResult<Job>>;
  get(signal: AbortSignal, jobId: string | number): Promise<Job>;
  submit(signal: AbortSignal, job: JobSubmission): Promise<JobSubmitResult>;
  update(signal: AbortSignal, jobId: string | number, update: JobUpdate): Promise<void>;
  /** Cancels the job. */
  delete(signal: AbortSignal, jobId: string | number): Promise<void>;
  watch(signal: AbortSignal, options?: WatchJobsOptions): Promise<WatchStream<Job>>;
}

export interface NodeManager extends Capabilities {
  list(signal: AbortSignal, options?: ListNodesOptions): Promise<ListResult<Node>>;
  get(signal: AbortSignal, name: string): Promise<Node>;
  update(signal: AbortSignal, name: string, update: NodeUpdate): Promise<void>;
  delete(signal: AbortSignal, name: string): Promise<void>;
  watch(signal: AbortSignal, options?: WatchNodesOptions): Promise<WatchStream<Node>>;
}

export interface PartitionManager extends Capabilities {
  list(signal: AbortSignal, options?: ListPartitionsOptions): Promise<ListResult<Partition>>;
  get(signal: AbortSignal, name: string): Promise<Partition>;
  create(signal: AbortSignal, partition: PartitionCreate): Promise<void>;
  update(signal: AbortSignal, name: string, update: PartitionUpdate): Promise<void>;
  delete(signal: AbortSignal, name: string): Promise<void>;
  watch(signal: AbortSignal, options?: WatchPartitionsOptions): Promise<WatchStream<Partition>>;
}

export interface ReservationManager extends Capabilities {
  list(signal: AbortSignal, options?: ListReservationsOptions): Promise<ListResult<Reservation>>;
  get(signal: AbortSignal, name: string): Promise<Reservation>;
  create(signal: AbortSignal, reservation: ReservationCreate): Promise<void>;
  update(signal: AbortSignal, name: string, update: ReservationUpdate): Promise<void>;
  delete(signal: AbortSignal, name: string): Promise<void>;
}

export interface QoSManager extends Capabilities {
  list(signal: AbortSignal, options?: ListQoSOptions): Promise<ListResult<QoS>>;
  get(signal: AbortSignal, name: string): Promise<QoS>;
  create(signal: AbortSignal, qos: QoSCreate): Promise<void>;
  update(signal: AbortSignal, name: string, update: QoSUpdate): Promise<void>;
  delete(signal: AbortSignal, name: string): Promise<void>;
}

export interface AccountManager extends Capabilities {
  list(signal: AbortSignal, options?: ListAccountsOptions): Promise<ListResult<Account>>;
  get(signal: AbortSignal, name: string): Promise<Account>;
  create(signal: AbortSignal, account: AccountCreate): Promise<void>;
  update(signal: AbortSignal, name: string, update: AccountUpdate): Promise<void>;
  delete(signal: AbortSignal, name: string): Promise<void>;
  /** Arranges accounts by the parents their account-level associations name. */
  hierarchy(signal: AbortSignal, options?: AccountHierarchyOptions): Promise<AccountHierarchy[]>;
}

export interface UserManager extends Capabilities {
  list(signal: AbortSignal, options?: ListUsersOptions): Promise<ListResult<User>>;
  get(signal: AbortSignal, name: string): Promise<User>;
  create(signal: AbortSignal, user: UserCreate): Promise<void>;
  update(signal: AbortSignal, name: string, update: UserUpdate): Promise<void>;
  delete(signal: AbortSignal, name: string): Promise<void>;
}

export interface AssociationManager extends Capabilities {
  list(signal: AbortSignal, options?: ListAssociationsOptions): Promise<ListResult<Association>>;
  get(signal: AbortSignal, key: AssociationKey): Promise<Association>;
  create(signal: AbortSignal, association: AssociationCreate): Promise<void>;
  update(signal: AbortSignal, key: AssociationKey, update: AssociationUpdate): Promise<void>;
  delete(signal: AbortSignal, key: AssociationKey): Promise<void>;
}

export interface ClusterManager extends Capabilities {
  list(signal: AbortSignal, options?: ListClustersOptions): Promise<ListResult<Cluster>>;
  get(signal: AbortSignal, name: string): Promise<Cluster>;
  create(signal: AbortSignal, cluster: ClusterCreate): Promise<void>;
  delete(signal: AbortSignal, name: string): Promise<void>;
}

export interface WCKeyManager extends Capabilities {
  list(signal: AbortSignal, options?: ListWCKeysOptions): Promise<ListResult<WCKey>>;
  get(signal: AbortSignal, id: string | number): Promise<WCKey>;
  create(signal: AbortSignal, wckey: WCKeyCreate): Promise<void>;
  delete(signal: AbortSignal, id: string | number): Promise<void>;
}

export interface TRESManager extends Capabilities {
  list(signal: AbortSignal): Promise<TRES[]>;
}

export interface InfoManager extends Capabilities {
  ping(signal: AbortSignal): Promise<PingResult>;
  /** Slurm build and parser plugin reported by the server. */
  version(signal: AbortSignal): Promise<VersionInfo>;
  /** Cluster name and controller reachability. */
  get(signal: AbortSignal): Promise<ClusterInfo>;
}
