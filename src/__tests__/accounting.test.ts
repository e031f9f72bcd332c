/**
 * Tests for the accounting database managers.
 */

import { describe, it, expect } from 'vitest';
import { createAdapterSet } from '../versions/index.js';
import { SlurmErrorKind } from '../errors/index.js';
import { MemoryLogger } from '../observability/index.js';
import { AssociationAdapter } from '../adapters/index.js';
import { ForbiddenWireClient, createMockWireClient } from '../mocks/index.js';
import { accountingFixtures, envelope } from '../fixtures/index.js';
import type { AccountHierarchy } from '../types/index.js';

const DB = 'http://slurm.test:6820/slurmdb';
const missing = undefined as unknown as AbortSignal;

function live(): AbortSignal {
  return new AbortController().signal;
}

interface Branch {
  name: string;
  parent: string;
  children: Branch[];
}

function branches(nodes: AccountHierarchy[]): Branch[] {
  return nodes.map((node) => ({
    name: node.account.name,
    parent: node.parentAccount,
    children: branches(node.children),
  }));
}

function setup(version: string, options: { defaultClusterName?: string; logger?: MemoryLogger } = {}) {
  const { client, transport } = createMockWireClient(version);
  return { adapters: createAdapterSet(version, client, options), transport };
}

describe('AccountManager', () => {
  it('should list accounts filtered by organization', async () => {
    const { adapters, transport } = setup('v0.0.42');
    transport.mock('/accounts', {
      data: envelope({
        accounts: [
          accountingFixtures.account(),
          accountingFixtures.account({ name: 'ops', organization: 'it' }),
        ],
      }),
    });

    const result = await adapters.accounts.list(live(), { organizations: ['IT'] });

    expect(result).toEqual({
      items: [{ name: 'ops', description: 'Research group', organization: 'it', coordinators: ['alice'] }],
      total: 1,
    });
    expect(transport.getCalls()[0].url).toBe(`${DB}/v0.0.42/accounts`);
  });

  it('should default description and organization to the name', async () => {
    const { adapters, transport } = setup('v0.0.40');

    await adapters.accounts.create(live(), { name: 'physics' });

    const [call] = transport.getCalls();
    expect(call.url).toBe(`${DB}/v0.0.40/accounts`);
    expect(call.options.method).toBe('POST');
    expect(call.options.body).toEqual({
      accounts: [{ name: 'physics', description: 'physics', organization: 'physics' }],
    });
  });

  it('should require an account name', async () => {
    const { adapters, transport } = setup('v0.0.40');
    await expect(adapters.accounts.get(live(), '')).rejects.toMatchObject({
      kind: SlurmErrorKind.ValidationError,
      message: 'account name is required',
    });
    expect(transport.getCalls()).toHaveLength(0);
  });

  it('should update and delete an account', async () => {
    const { adapters, transport } = setup('v0.0.44');

    await adapters.accounts.update(live(), 'physics', { description: 'Physics dept' });
    await adapters.accounts.delete(live(), 'physics');

    const [update, remove] = transport.getCalls();
    expect(update.options.body).toEqual({
      accounts: [{ name: 'physics', description: 'Physics dept' }],
    });
    expect(remove.url).toBe(`${DB}/v0.0.44/account/physics`);
    expect(remove.options.method).toBe('DELETE');
  });

  it('should reject an empty account update', async () => {
    const { adapters } = setup('v0.0.44');
    await expect(adapters.accounts.update(live(), 'physics', {})).rejects.toThrow(
      'account update must contain at least one field'
    );
  });

  it('should read null account fields as empty', async () => {
    const { adapters, transport } = setup('v0.0.42');
    transport.mock('/accounts', {
      data: envelope({
        accounts: [{ name: 'physics', description: null, organization: 'science', coordinators: null }],
      }),
    });

    expect((await adapters.accounts.list(live())).items).toEqual([
      { name: 'physics', description: '', organization: 'science', coordinators: [] },
    ]);
  });

  describe('hierarchy', () => {
    function mockTree(transport: ReturnType<typeof setup>['transport']): void {
      transport.mock('/accounts', {
        data: envelope({
          accounts: ['root', 'science', 'physics', 'chem', 'ops', 'loop-a', 'loop-b'].map((name) =>
            accountingFixtures.account({ name })
          ),
        }),
      });
      transport.mock('/associations', {
        data: envelope({
          associations: [
            accountingFixtures.association({ account: 'root', user: '', parent_account: '' }),
            accountingFixtures.association({ account: 'science', user: '', parent_account: 'root' }),
            accountingFixtures.association({ account: 'physics', user: '', parent_account: 'science' }),
            accountingFixtures.association({ account: 'physics', user: 'alice', parent_account: 'root' }),
            accountingFixtures.association({ account: 'chem', user: '', parent_account: 'science' }),
            accountingFixtures.association({ account: 'ops', user: '', parent_account: 'gone' }),
            accountingFixtures.association({ account: 'loop-a', user: '', parent_account: 'loop-b' }),
            accountingFixtures.association({ account: 'loop-b', user: '', parent_account: 'loop-a' }),
            accountingFixtures.association({
              account: 'chem',
              user: '',
              cluster: 'other',
              parent_account: 'ops',
            }),
          ],
        }),
      });
    }

    it('should arrange accounts under their parents', async () => {
      const { adapters, transport } = setup('v0.0.42');
      mockTree(transport);

      const roots = await adapters.accounts.hierarchy(live());

      expect(branches(roots)).toEqual([
        { name: 'loop-a', parent: 'loop-b', children: [] },
        { name: 'loop-b', parent: 'loop-a', children: [] },
        { name: 'ops', parent: 'gone', children: [] },
        {
          name: 'root',
          parent: '',
          children: [
            {
              name: 'science',
              parent: 'root',
              children: [
                { name: 'chem', parent: 'science', children: [] },
                { name: 'physics', parent: 'science', children: [] },
              ],
            },
          ],
        },
      ]);
      expect(roots[3].account.description).toBe('Research group');
      expect(transport.getCalls().map((call) => call.url)).toEqual([
        `${DB}/v0.0.42/accounts`,
        `${DB}/v0.0.42/associations?cluster=linux`,
      ]);
    });

    it('should return the subtree of a named account', async () => {
      const { adapters, transport } = setup('v0.0.44', { defaultClusterName: 'hpc' });
      mockTree(transport);

      const roots = await adapters.accounts.hierarchy(live(), { cluster: 'linux', root: 'science' });

      expect(branches(roots)).toEqual([
        {
          name: 'science',
          parent: 'root',
          children: [
            { name: 'chem', parent: 'science', children: [] },
            { name: 'physics', parent: 'science', children: [] },
          ],
        },
      ]);
      expect(transport.getCalls()[1].url).toBe(`${DB}/v0.0.44/associations?cluster=linux`);
    });

    it('should use the configured cluster', async () => {
      const { adapters, transport } = setup('v0.0.44', { defaultClusterName: 'other' });
      mockTree(transport);

      const roots = await adapters.accounts.hierarchy(live(), { root: 'chem' });

      expect(branches(roots)).toEqual([{ name: 'chem', parent: 'ops', children: [] }]);
      expect(transport.getCalls()[1].url).toBe(`${DB}/v0.0.44/associations?cluster=other`);
    });

    it('should report an unknown subtree root', async () => {
      const { adapters, transport } = setup('v0.0.42');
      mockTree(transport);

      await expect(adapters.accounts.hierarchy(live(), { root: 'nope' })).rejects.toMatchObject({
        kind: SlurmErrorKind.NotFound,
        message: 'account "nope" not found',
      });
    });

    it('should reject a blank cluster without a wire call', async () => {
      const client = new ForbiddenWireClient();
      const accounts = createAdapterSet('v0.0.42', client).accounts;

      await expect(accounts.hierarchy(live(), { cluster: ' ' })).rejects.toMatchObject({
        kind: SlurmErrorKind.ValidationError,
        message: 'account cluster is required',
      });
      expect(client.requests).toHaveLength(0);
    });
  });
});

describe('UserManager', () => {
  it('should get a user', async () => {
    const { adapters, transport } = setup('v0.0.41');
    transport.mock('/user/alice', { data: envelope({ users: [accountingFixtures.user()] }) });

    expect(await adapters.users.get(live(), 'alice')).toEqual({
      name: 'alice',
      defaultAccount: 'research',
      defaultWCKey: 'ml',
      adminLevel: 'None',
      associations: [{ account: 'research', cluster: 'linux', partition: 'gpu' }],
    });
  });

  it('should filter users by default account', async () => {
    const { adapters, transport } = setup('v0.0.42');
    transport.mock('/users', {
      data: envelope({
        users: [
          accountingFixtures.user(),
          accountingFixtures.user({ name: 'bob', default: { account: 'ops' } }),
        ],
      }),
    });

    const result = await adapters.users.list(live(), { defaultAccount: 'ops' });

    expect(result.items.map((user) => user.name)).toEqual(['bob']);
  });

  it('should create a user', async () => {
    const { adapters, transport } = setup('v0.0.42');

    await adapters.users.create(live(), { name: 'carol', defaultAccount: 'research' });

    expect(transport.getCalls()[0].options.body).toEqual({
      users: [{ name: 'carol', default: { account: 'research' } }],
    });
  });

  it('should fail without a client', async () => {
    const users = createAdapterSet('v0.0.42', null).users;
    await expect(users.delete(live(), 'carol')).rejects.toMatchObject({
      kind: SlurmErrorKind.ClientNotInitialized,
      message: 'user adapter: client not initialized',
    });
  });
});

describe('AssociationManager', () => {
  it('should use the default cluster when none is given', async () => {
    const { adapters, transport } = setup('v0.0.42');

    await adapters.associations.create(live(), { account: 'research', user: 'alice' });

    expect(transport.getCalls()[0].url).toBe(`${DB}/v0.0.42/associations`);
    expect(transport.getCalls()[0].options.body).toEqual({
      associations: [{ account: 'research', user: 'alice', cluster: 'linux' }],
    });
  });

  it('should keep an explicit cluster', async () => {
    const { adapters, transport } = setup('v0.0.42');

    await adapters.associations.create(live(), {
      account: 'research',
      user: 'alice',
      cluster: 'gpu-cluster',
    });

    expect(transport.getCalls()[0].options.body).toEqual({
      associations: [{ account: 'research', user: 'alice', cluster: 'gpu-cluster' }],
    });
  });

  it('should use a configured default cluster', async () => {
    const logger = new MemoryLogger();
    const { adapters, transport } = setup('v0.0.40', { defaultClusterName: 'hpc', logger });

    await adapters.associations.create(live(), { account: 'research', user: 'alice', cluster: '' });

    expect(transport.getCalls()[0].options.body).toEqual({
      associations: [{ account: 'research', user: 'alice', cluster: 'hpc' }],
    });
    expect(logger.entries).toContainEqual({
      level: 'debug',
      message: 'creating association',
      context: { account: 'research', user: 'alice', cluster: 'hpc' },
    });
  });

  it('should not replace a blank explicit cluster', async () => {
    const { adapters, transport } = setup('v0.0.42');

    await expect(
      adapters.associations.create(live(), { account: 'research', user: 'alice', cluster: '  ' })
    ).rejects.toMatchObject({
      kind: SlurmErrorKind.ValidationError,
      message: 'association cluster is required',
    });
    await expect(
      adapters.associations.get(live(), { account: 'research', user: 'alice', cluster: ' ' })
    ).rejects.toThrow('association cluster is required');
    expect(transport.getCalls()).toHaveLength(0);
  });

  it('should resolve clusters', () => {
    const adapter = new AssociationAdapter({
      version: 'v0.0.42',
      client: null,
      defaultClusterName: 'linux',
    });
    expect(adapter.resolveCluster(undefined)).toBe('linux');
    expect(adapter.resolveCluster('')).toBe('linux');
    expect(adapter.resolveCluster('gpu-cluster')).toBe('gpu-cluster');
    expect(adapter.resolveCluster('  ')).toBe('  ');
  });

  it('should validate the account and user', async () => {
    const { adapters, transport } = setup('v0.0.42');

    await expect(
      adapters.associations.create(live(), { account: '', user: 'alice' })
    ).rejects.toThrow('association account is required');
    await expect(
      adapters.associations.create(live(), { account: 'research', user: '' })
    ).rejects.toThrow('association user is required');
    expect(transport.getCalls()).toHaveLength(0);
  });

  it('should get an association by key', async () => {
    const { adapters, transport } = setup('v0.0.42');
    transport.mock('/association?', {
      data: envelope({ associations: [accountingFixtures.association()] }),
    });

    const association = await adapters.associations.get(live(), {
      account: 'research',
      user: 'alice',
    });

    expect(association.id).toBe(7);
    expect(association.qos).toEqual(['normal']);
    expect(transport.getCalls()[0].url).toBe(
      `${DB}/v0.0.42/association?account=research&user=alice&cluster=linux`
    );
  });

  it('should name the key of a missing association', async () => {
    const { adapters, transport } = setup('v0.0.42');
    transport.mock('/association?', { data: envelope({ associations: [] }) });

    await expect(
      adapters.associations.get(live(), { account: 'research', user: 'alice', partition: 'gpu' })
    ).rejects.toMatchObject({
      kind: SlurmErrorKind.NotFound,
      message: 'association "alice@research/linux/gpu" not found',
    });
  });

  it('should update and delete an association', async () => {
    const { adapters, transport } = setup('v0.0.43');
    const key = { account: 'research', user: 'alice', cluster: 'gpu-cluster' };

    await adapters.associations.update(live(), key, { defaultQoS: 'high' });
    await adapters.associations.delete(live(), key);

    const [update, remove] = transport.getCalls();
    expect(update.options.body).toEqual({
      associations: [
        { account: 'research', user: 'alice', cluster: 'gpu-cluster', default: { qos: 'high' } },
      ],
    });
    expect(remove.options.method).toBe('DELETE');
    expect(remove.url).toBe(
      `${DB}/v0.0.43/association?account=research&user=alice&cluster=gpu-cluster`
    );
  });

  it('should list associations with server-side filters', async () => {
    const { adapters, transport } = setup('v0.0.44');
    transport.mock('/associations', {
      data: envelope({
        associations: [
          accountingFixtures.association(),
          accountingFixtures.association({ id: 8, user: 'bob' }),
        ],
      }),
    });

    const result = await adapters.associations.list(live(), { users: ['bob'], limit: 5 });

    expect(result.items.map((association) => association.id)).toEqual([8]);
    expect(transport.getCalls()[0].url).toBe(`${DB}/v0.0.44/associations?user=bob`);
  });
});

describe('ClusterManager', () => {
  it('should refuse cluster creation before v0.0.42', async () => {
    const client = new ForbiddenWireClient();
    const clusters = createAdapterSet('v0.0.41', client).clusters;

    await expect(clusters.create(live(), { name: 'gpu' })).rejects.toMatchObject({
      kind: SlurmErrorKind.UnsupportedOperation,
      message: 'cluster create not supported in v0.0.41',
    });
    expect(client.requests).toHaveLength(0);
  });

  it('should create a cluster from v0.0.42', async () => {
    const { adapters, transport } = setup('v0.0.42');

    await adapters.clusters.create(live(), {
      name: 'gpu',
      controllerHost: 'ctl02',
      controllerPort: 6817,
    });

    expect(transport.getCalls()[0].url).toBe(`${DB}/v0.0.42/clusters`);
    expect(transport.getCalls()[0].options.body).toEqual({
      clusters: [{ name: 'gpu', controller: { host: 'ctl02', port: 6817 } }],
    });
  });

  it('should get a cluster', async () => {
    const { adapters, transport } = setup('v0.0.40');
    transport.mock('/cluster/linux', { data: envelope({ clusters: [accountingFixtures.cluster()] }) });

    expect(await adapters.clusters.get(live(), 'linux')).toEqual({
      name: 'linux',
      controllerHost: 'ctl01',
      controllerPort: 6817,
      nodes: 'node[001-010]',
      rpcVersion: 10240,
    });
  });
});

describe('WCKeyManager', () => {
  it('should refuse wckey creation on v0.0.40', async () => {
    const client = new ForbiddenWireClient();
    const wckeys = createAdapterSet('v0.0.40', client).wckeys;

    await expect(wckeys.create(live(), { name: 'ml', user: 'alice' })).rejects.toMatchObject({
      kind: SlurmErrorKind.UnsupportedOperation,
      message: 'wckey create not supported in v0.0.40',
    });
    expect(client.requests).toHaveLength(0);
  });

  it('should default the cluster of a new wckey', async () => {
    const { adapters, transport } = setup('v0.0.41');

    await adapters.wckeys.create(live(), { name: 'ml', user: 'alice' });

    expect(transport.getCalls()[0].options.body).toEqual({
      wckeys: [{ name: 'ml', user: 'alice', cluster: 'linux' }],
    });
  });

  it('should get and delete a wckey by ID', async () => {
    const { adapters, transport } = setup('v0.0.42');
    transport.mock({ url: '/wckey/3', method: 'GET' }, {
      data: envelope({ wckeys: [accountingFixtures.wckey()] }),
    });

    expect(await adapters.wckeys.get(live(), 3)).toEqual({
      id: 3,
      name: 'ml',
      user: 'alice',
      cluster: 'linux',
    });
    await adapters.wckeys.delete(live(), '3');

    expect(transport.getCalls()[1].url).toBe(`${DB}/v0.0.42/wckey/3`);
    expect(transport.getCalls()[1].options.method).toBe('DELETE');
  });

  it('should require a wckey user', async () => {
    const { adapters } = setup('v0.0.42');
    await expect(adapters.wckeys.create(live(), { name: 'ml', user: '' })).rejects.toThrow(
      'wckey user is required'
    );
  });
});

describe('TRES and info', () => {
  it('should list TRES', async () => {
    const { adapters, transport } = setup('v0.0.42');
    transport.mock('/tres', {
      data: envelope({ TRES: [accountingFixtures.tres(), accountingFixtures.tres({ id: 2, type: 'mem', count: 1024 })] }),
    });

    expect(await adapters.tres.list(live())).toEqual([
      { id: 1, type: 'cpu', name: '', count: 640 },
      { id: 2, type: 'mem', name: '', count: 1024 },
    ]);
    expect(transport.getCalls()[0].url).toBe(`${DB}/v0.0.42/tres`);
  });

  it('should require a context for TRES', async () => {
    const { adapters } = setup('v0.0.42');
    await expect(adapters.tres.list(missing)).rejects.toMatchObject({
      kind: SlurmErrorKind.ContextRequired,
    });
  });

  it('should ping the controllers', async () => {
    const { adapters, transport } = setup('v0.0.40');
    transport.mock('/ping', { data: envelope({ pings: [accountingFixtures.ping()] }) });

    expect(await adapters.info.ping(live())).toEqual({
      controllers: [{ hostname: 'ctl01', status: 'UP', mode: 'primary', latency: 120 }],
    });
    expect(transport.getCalls()[0].url).toBe('http://slurm.test:6820/slurm/v0.0.40/ping');
  });

  it('should report the server version from the ping metadata', async () => {
    const { adapters, transport } = setup('v0.0.42');
    transport.mock('/ping', { data: envelope({ meta: accountingFixtures.meta(), pings: [] }) });

    expect(await adapters.info.version(live())).toEqual({
      apiVersion: 'v0.0.42',
      slurmVersion: '24.05.3',
      release: '24.05.3',
      plugin: 'Slurm OpenAPI slurmctld',
      dataParser: 'data_parser/v0.0.42',
    });
    expect(transport.getCalls()[0].url).toBe('http://slurm.test:6820/slurm/v0.0.42/ping');
  });

  it('should read numeric version parts', async () => {
    const { adapters, transport } = setup('v0.0.40');
    transport.mock('/ping', {
      data: envelope({ meta: { slurm: { version: { major: 23, minor: 11, micro: 1 } } } }),
    });

    expect(await adapters.info.version(live())).toEqual({
      apiVersion: 'v0.0.40',
      slurmVersion: '23.11.1',
      release: '',
      plugin: '',
      dataParser: '',
    });
  });

  it('should describe the cluster', async () => {
    const { adapters, transport } = setup('v0.0.44');
    transport.mock('/ping', {
      data: envelope({ meta: accountingFixtures.meta(), pings: [accountingFixtures.ping()] }),
    });

    expect(await adapters.info.get(live())).toEqual({
      clusterName: 'linux',
      release: '24.05.3',
      apiVersion: 'v0.0.44',
      controllers: [{ hostname: 'ctl01', status: 'UP', mode: 'primary', latency: 120 }],
    });
  });

  it('should leave cluster fields empty without metadata', async () => {
    const { adapters, transport } = setup('v0.0.41');
    transport.mock('/ping', { data: envelope({ meta: null, pings: [] }) });

    expect(await adapters.info.get(live())).toEqual({
      clusterName: '',
      release: '',
      apiVersion: 'v0.0.41',
      controllers: [],
    });
  });

  it('should reject malformed metadata', async () => {
    const { adapters, transport } = setup('v0.0.42');
    transport.mock('/ping', { data: envelope({ meta: { slurm: { release: 5 } } }) });

    await expect(adapters.info.version(live())).rejects.toMatchObject({
      kind: SlurmErrorKind.InvalidResponse,
      message: 'info metadata is invalid: meta.slurm.release: Expected string, received number',
    });
  });

  it('should check the context before any info call', async () => {
    const client = new ForbiddenWireClient();
    const info = createAdapterSet('v0.0.43', client).info;

    await expect(info.version(missing)).rejects.toMatchObject({ kind: SlurmErrorKind.ContextRequired });
    await expect(info.get(missing)).rejects.toMatchObject({ kind: SlurmErrorKind.ContextRequired });
    expect(client.requests).toHaveLength(0);
  });
});
