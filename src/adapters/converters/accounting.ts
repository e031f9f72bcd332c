/**
 * Conversion of accounting database entities, whose wire shape is the same
 * in every supported version.
 * @module adapters/converters/accounting
 */

import type {
  Account,
  AccountCreate,
  AccountUpdate,
  Association,
  AssociationCreate,
  AssociationUpdate,
  Cluster,
  ClusterCreate,
  TRES,
  User,
  UserCreate,
  UserUpdate,
  WCKey,
  WCKeyCreate,
} from '../../types/index.js';
import { compact } from '../../managers/base.js';
import type {
  WireAccount,
  WireAssociation,
  WireCluster,
  WireTRES,
  WireUser,
  WireWCKey,
} from '../../wire/common.js';

export function convertAccount(account: WireAccount): Account {
  return {
    name: account.name ?? '',
    description: account.description ?? '',
    organization: account.organization ?? '',
    coordinators: (account.coordinators ?? [])
      .map((coordinator) => coordinator.name ?? '')
      .filter((name) => name !== ''),
  };
}

/**
 * Encodes a new account; description and organization default to the name.
 */
export function encodeAccountCreate(account: AccountCreate): WireAccount {
  return {
    name: account.name,
    description: account.description || account.name,
    organization: account.organization || account.name,
    ...compact({
      coordinators: account.coordinators?.map((name) => ({ name })),
    }),
  };
}

export function encodeAccountUpdate(name: string, update: AccountUpdate): WireAccount {
  return {
    name,
    ...compact({
      description: update.description,
      organization: update.organization,
      coordinators: update.coordinators?.map((coordinator) => ({ name: coordinator })),
    }),
  };
}

export function convertUser(user: WireUser): User {
  return {
    name: user.name ?? '',
    defaultAccount: user.default?.account ?? '',
    defaultWCKey: user.default?.wckey ?? '',
    adminLevel: user.administrator_level?.[0] ?? '',
    associations: (user.associations ?? []).map((association) => ({
      account: association.account ?? '',
      cluster: association.cluster ?? '',
      partition: association.partition ?? '',
    })),
  };
}

export function encodeUser(name: string, fields: UserCreate | UserUpdate): WireUser {
  const defaults = compact({ account: fields.defaultAccount, wckey: fields.defaultWCKey });
  return {
    name,
    ...compact({
      default: Object.keys(defaults).length > 0 ? defaults : undefined,
      administrator_level: fields.adminLevel === undefined ? undefined : [fields.adminLevel],
    }),
  };
}

export function convertAssociation(association: WireAssociation): Association {
  return {
    id: association.id ?? 0,
    account: association.account ?? '',
    user: association.user ?? '',
    cluster: association.cluster ?? '',
    partition: association.partition ?? '',
    qos: [...(association.qos ?? [])],
    defaultQoS: association.default?.qos ?? '',
    parentAccount: association.parent_account ?? '',
    isDefault: association.is_default ?? false,
  };
}

/**
 * Encodes a new association. The cluster must already be resolved.
 */
export function encodeAssociationCreate(
  association: AssociationCreate & { cluster: string }
): WireAssociation {
  return {
    account: association.account,
    user: association.user,
    cluster: association.cluster,
    ...compact({
      partition: association.partition || undefined,
      qos: association.qos,
      default: association.defaultQoS === undefined ? undefined : { qos: association.defaultQoS },
      parent_account: association.parentAccount,
      is_default: association.isDefault,
    }),
  };
}

export function encodeAssociationUpdate(
  key: { account: string; user: string; cluster: string; partition?: string },
  update: AssociationUpdate
): WireAssociation {
  return {
    account: key.account,
    user: key.user,
    cluster: key.cluster,
    ...compact({
      partition: key.partition || undefined,
      qos: update.qos,
      default: update.defaultQoS === undefined ? undefined : { qos: update.defaultQoS },
      is_default: update.isDefault,
    }),
  };
}

export function convertCluster(cluster: WireCluster): Cluster {
  return {
    name: cluster.name ?? '',
    controllerHost: cluster.controller?.host ?? '',
    controllerPort: cluster.controller?.port ?? 0,
    nodes: cluster.nodes ?? '',
    rpcVersion: cluster.rpc_version ?? 0,
  };
}

export function encodeCluster(cluster: ClusterCreate): WireCluster {
  const controller = compact({ host: cluster.controllerHost, port: cluster.controllerPort });
  return {
    name: cluster.name,
    ...compact({ controller: Object.keys(controller).length > 0 ? controller : undefined }),
  };
}

export function convertTRES(tres: WireTRES): TRES {
  return {
    id: tres.id ?? 0,
    type: tres.type ?? '',
    name: tres.name ?? '',
    count: tres.count ?? 0,
  };
}

export function convertWCKey(wckey: WireWCKey): WCKey {
  return {
    id: wckey.id ?? 0,
    name: wckey.name ?? '',
    user: wckey.user ?? '',
    cluster: wckey.cluster ?? '',
  };
}

/**
 * Encodes a new wckey. The cluster must already be resolved.
 */
export function encodeWCKey(wckey: WCKeyCreate & { cluster: string }): WireWCKey {
  return { name: wckey.name, user: wckey.user, cluster: wckey.cluster };
}
