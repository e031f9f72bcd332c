/**
 * User adapter.
 * @module adapters/users
 */

import {
  ALL_OPERATIONS,
  BaseManager,
  createDecoder,
  matchesAny,
  matchesOne,
  paginate,
} from '../managers/base.js';
import type { AdapterContext, Operation } from '../managers/base.js';
import type { UserManager } from '../managers/interfaces.js';
import type { ListResult, ListUsersOptions, User, UserCreate, UserUpdate } from '../types/index.js';
import { userSchema } from '../wire/common.js';
import { convertUser, encodeUser } from './converters/accounting.js';

const decodeUser = createDecoder(userSchema, convertUser);

export class UserAdapter extends BaseManager implements UserManager {
  constructor(context: AdapterContext, operations: readonly Operation[] = ALL_OPERATIONS) {
    super('user', context, operations);
  }

  async list(signal: AbortSignal, options: ListUsersOptions = {}): Promise<ListResult<User>> {
    const client = this.begin(signal, 'list');
    this.validateListOptions(options);

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurmdb',
      path: '/users',
    });
    const users = this.decodeEntries(data, 'users', decodeUser);
    return paginate(
      users.filter(
        (user) =>
          matchesAny(user.name, options.names) &&
          matchesOne(user.defaultAccount, options.defaultAccount)
      ),
      options
    );
  }

  async get(signal: AbortSignal, name: string): Promise<User> {
    const client = this.begin(signal, 'get');
    this.validateResourceName(name, 'user name');

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurmdb',
      path: `/user/${encodeURIComponent(name)}`,
    });
    return this.first(this.decodeEntries(data, 'users', decodeUser), name);
  }

  async create(signal: AbortSignal, user: UserCreate): Promise<void> {
    const client = this.begin(signal, 'create');
    this.validateResourceName(user.name, 'user name');

    await this.call(client, signal, {
      method: 'POST',
      api: 'slurmdb',
      path: '/users',
      body: { users: [encodeUser(user.name, user)] },
    });
  }

  async update(signal: AbortSignal, name: string, update: UserUpdate): Promise<void> {
    const client = this.begin(signal, 'update');
    this.validateResourceName(name, 'user name');
    this.requireUpdateFields(update);

    await this.call(client, signal, {
      method: 'POST',
      api: 'slurmdb',
      path: '/users',
      body: { users: [encodeUser(name, update)] },
    });
  }

  async delete(signal: AbortSignal, name: string): Promise<void> {
    const client = this.begin(signal, 'delete');
    this.validateResourceName(name, 'user name');

    await this.call(client, signal, {
      method: 'DELETE',
      api: 'slurmdb',
      path: `/user/${encodeURIComponent(name)}`,
    });
  }
}
