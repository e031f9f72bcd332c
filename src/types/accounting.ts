/**
 * Accounting database (slurmdbd) types.
 */

import type { ListOptions } from './common.js';

/**
 * Quality of service
 */
export interface QoS {
  name: string;
  description: string;
  priority: number;
  usageFactor: number;
  /** Max running jobs per user; UNLIMITED when infinite. */
  maxJobs: number;
  /** Max CPUs per job. */
  maxCpus: number;
  /** Max nodes per job. */
  maxNodes: number;
  /** Max wall time per job in minutes. */
  maxWallTime: number;
}

export interface QoSCreate {
  name: string;
  description?: string;
  priority?: number;
  usageFactor?: number;
  maxJobs?: number;
  maxCpus?: number;
  maxNodes?: number;
  maxWallTime?: number;
}

export type QoSUpdate = Partial<Omit<QoSCreate, 'name'>>;

export interface ListQoSOptions extends ListOptions {
  names?: string[];
}

/**
 * Bank account
 */
export interface Account {
  name: string;
  description: string;
  organization: string;
  coordinators: string[];
}

/**
 * Account creation. Description and organization default to the name.
 */
export interface AccountCreate {
  name: string;
  description?: string;
  organization?: string;
  coordinators?: string[];
}

export type AccountUpdate = Partial<Omit<AccountCreate, 'name'>>;

/**
 * Account placed under its parent by the account-level associations of one
 * cluster.
 */
export interface AccountHierarchy {
  account: Account;
  /** Parent named by the association; empty for "root". */
  parentAccount: string;
  /** Ordered by name. */
  children: AccountHierarchy[];
}

export interface AccountHierarchyOptions {
  /** Defaults to the configured cluster. */
  cluster?: string;
  /** Returns only the subtree under this account. */
  root?: string;
}

export interface ListAccountsOptions extends ListOptions {
  names?: string[];
  organizations?: string[];
}

/**
 * Association summary carried on a user
 */
export interface UserAssociation {
  account: string;
  cluster: string;
  partition: string;
}

/**
 * User
 */
export interface User {
  name: string;
  defaultAccount: string;
  defaultWCKey: string;
  /** None, Operator or Administrator. */
  adminLevel: string;
  associations: UserAssociation[];
}

export interface UserCreate {
  name: string;
  defaultAccount?: string;
  defaultWCKey?: string;
  adminLevel?: string;
}

export type UserUpdate = Partial<Omit<UserCreate, 'name'>>;

export interface ListUsersOptions extends ListOptions {
  names?: string[];
  defaultAccount?: string;
}

/**
 * Binding of a user, account and cluster
 */
export interface Association {
  id: number;
  account: string;
  user: string;
  cluster: string;
  partition: string;
  qos: string[];
  defaultQoS: string;
  parentAccount: string;
  isDefault: boolean;
}

/**
 * Identifies one association. An empty cluster is replaced by the
 * configured default cluster.
 */
export interface AssociationKey {
  account: string;
  user: string;
  cluster?: string;
  partition?: string;
}

/**
 * Association creation. An empty cluster is replaced by the configured
 * default cluster; a non-empty one is kept.
 */
export interface AssociationCreate {
  account: string;
  user: string;
  cluster?: string;
  partition?: string;
  qos?: string[];
  defaultQoS?: string;
  parentAccount?: string;
  isDefault?: boolean;
}

export interface AssociationUpdate {
  qos?: string[];
  defaultQoS?: string;
  isDefault?: boolean;
}

export interface ListAssociationsOptions extends ListOptions {
  accounts?: string[];
  users?: string[];
  clusters?: string[];
  partitions?: string[];
}

/**
 * Cluster registered in the accounting database
 */
export interface Cluster {
  name: string;
  controllerHost: string;
  controllerPort: number;
  nodes: string;
  rpcVersion: number;
}

export interface ClusterCreate {
  name: string;
  controllerHost?: string;
  controllerPort?: number;
}

export interface ListClustersOptions extends ListOptions {
  names?: string[];
}

/**
 * Trackable resource
 */
export interface TRES {
  id: number;
  /** cpu, mem, node, gres, ... */
  type: string;
  name: string;
  count: number;
}

/**
 * Workload characterization key
 */
export interface WCKey {
  id: number;
  name: string;
  user: string;
  cluster: string;
}

/**
 * WCKey creation. An empty cluster is replaced by the configured default.
 */
export interface WCKeyCreate {
  name: string;
  user: string;
  cluster?: string;
}

export interface ListWCKeysOptions extends ListOptions {
  names?: string[];
  users?: string[];
  clusters?: string[];
}
