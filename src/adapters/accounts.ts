/**
 * Account adapter.
 * @module adapters/accounts
 */

import { ALL_OPERATIONS, BaseManager, createDecoder, matchesAny, paginate } from '../managers/base.js';
import type { AdapterContext, Operation } from '../managers/base.js';
import type { AccountManager } from '../managers/interfaces.js';
import type {
  Account,
  AccountCreate,
  AccountHierarchy,
  AccountHierarchyOptions,
  AccountUpdate,
  ListAccountsOptions,
  ListResult,
} from '../types/index.js';
import { accountSchema, associationSchema } from '../wire/common.js';
import {
  convertAccount,
  convertAssociation,
  encodeAccountCreate,
  encodeAccountUpdate,
} from './converters/accounting.js';

const decodeAccount = createDecoder(accountSchema, convertAccount);
const decodeAssociation = createDecoder(associationSchema, convertAssociation);

function byName(a: Account, b: Account): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * True when following parents from `node` leads back to it.
 */
function onCycle(node: AccountHierarchy, nodes: ReadonlyMap<string, AccountHierarchy>): boolean {
  const seen = new Set<string>();
  let current = nodes.get(node.parentAccount);
  while (current !== undefined && !seen.has(current.account.name)) {
    if (current === node) {
      return true;
    }
    seen.add(current.account.name);
    current = nodes.get(current.parentAccount);
  }
  return false;
}

/**
 * Places each account under its parent. Accounts whose parent is unknown,
 * or that sit on a parent cycle, are roots.
 */
export function buildAccountHierarchy(
  accounts: readonly Account[],
  parents: ReadonlyMap<string, string>
): AccountHierarchy[] {
  const nodes = new Map<string, AccountHierarchy>();
  for (const account of [...accounts].sort(byName)) {
    if (!nodes.has(account.name)) {
      nodes.set(account.name, {
        account,
        parentAccount: parents.get(account.name) ?? '',
        children: [],
      });
    }
  }

  const roots: AccountHierarchy[] = [];
  for (const node of nodes.values()) {
    const parent = nodes.get(node.parentAccount);
    if (parent !== undefined && !onCycle(node, nodes)) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
  }
  return roots;
}

function findAccount(nodes: readonly AccountHierarchy[], name: string): AccountHierarchy | undefined {
  for (const node of nodes) {
    if (node.account.name === name) {
      return node;
    }
    const found = findAccount(node.children, name);
    if (found) {
      return found;
    }
  }
  return undefined;
}

export class AccountAdapter extends BaseManager implements AccountManager {
  constructor(context: AdapterContext, operations: readonly Operation[] = ALL_OPERATIONS) {
    super('account', context, operations);
  }

  async list(signal: AbortSignal, options: ListAccountsOptions = {}): Promise<ListResult<Account>> {
    const client = this.begin(signal, 'list');
    this.validateListOptions(options);

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurmdb',
      path: '/accounts',
    });
    const accounts = this.decodeEntries(data, 'accounts', decodeAccount);
    return paginate(
      accounts.filter(
        (account) =>
          matchesAny(account.name, options.names) &&
          matchesAny(account.organization, options.organizations)
      ),
      options
    );
  }

  async get(signal: AbortSignal, name: string): Promise<Account> {
    const client = this.begin(signal, 'get');
    this.validateResourceName(name, 'account name');

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurmdb',
      path: `/account/${encodeURIComponent(name)}`,
    });
    return this.first(this.decodeEntries(data, 'accounts', decodeAccount), name);
  }

  async create(signal: AbortSignal, account: AccountCreate): Promise<void> {
    const client = this.begin(signal, 'create');
    this.validateResourceName(account.name, 'account name');

    await this.call(client, signal, {
      method: 'POST',
      api: 'slurmdb',
      path: '/accounts',
      body: { accounts: [encodeAccountCreate(account)] },
    });
  }

  async update(signal: AbortSignal, name: string, update: AccountUpdate): Promise<void> {
    const client = this.begin(signal, 'update');
    this.validateResourceName(name, 'account name');
    this.requireUpdateFields(update);

    await this.call(client, signal, {
      method: 'POST',
      api: 'slurmdb',
      path: '/accounts',
      body: { accounts: [encodeAccountUpdate(name, update)] },
    });
  }

  async delete(signal: AbortSignal, name: string): Promise<void> {
    const client = this.begin(signal, 'delete');
    this.validateResourceName(name, 'account name');

    await this.call(client, signal, {
      method: 'DELETE',
      api: 'slurmdb',
      path: `/account/${encodeURIComponent(name)}`,
    });
  }

  async hierarchy(
    signal: AbortSignal,
    options: AccountHierarchyOptions = {}
  ): Promise<AccountHierarchy[]> {
    const client = this.begin(signal, 'list');
    const cluster =
      options.cluster === undefined || options.cluster === '' ? this.defaultClusterName : options.cluster;
    this.validateResourceName(cluster, 'account cluster');
    if (options.root !== undefined) {
      this.validateResourceName(options.root, 'account name');
    }

    const accountData = await this.call(client, signal, {
      method: 'GET',
      api: 'slurmdb',
      path: '/accounts',
    });
    const accounts = this.decodeEntries(accountData, 'accounts', decodeAccount);
    const associationData = await this.call(client, signal, {
      method: 'GET',
      api: 'slurmdb',
      path: '/associations',
      query: { cluster },
    });
    const associations = this.decodeEntries(associationData, 'associations', decodeAssociation);

    // Account-level associations have no user; the first one per account wins.
    const parents = new Map<string, string>();
    for (const association of associations) {
      if (association.user === '' && association.cluster === cluster && !parents.has(association.account)) {
        parents.set(association.account, association.parentAccount);
      }
    }

    const roots = buildAccountHierarchy(accounts, parents);
    if (options.root === undefined) {
      return roots;
    }
    const subtree = findAccount(roots, options.root);
    return [this.first(subtree ? [subtree] : [], options.root)];
  }
}
