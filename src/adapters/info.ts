/**
 * Controller ping, server version and cluster identity.
 *
 * All three read the ping endpoint: its body lists the controllers and its
 * `meta` block names the Slurm build and cluster that answered.
 * @module adapters/info
 */

import { SlurmError } from '../errors/index.js';
import { BaseManager, createDecoder } from '../managers/base.js';
import type { AdapterContext } from '../managers/base.js';
import type { InfoManager } from '../managers/interfaces.js';
import type { ClusterInfo, PingResult, VersionInfo } from '../types/index.js';
import { metaBodySchema, pingSchema } from '../wire/common.js';
import type { WireMeta, WirePing } from '../wire/common.js';

const decodePing = createDecoder(pingSchema, (ping: WirePing) => ({
  hostname: ping.hostname ?? '',
  status: ping.pinged ?? '',
  mode: ping.mode ?? '',
  latency: ping.latency ?? 0,
}));

const decodeMeta = createDecoder(metaBodySchema, (body): WireMeta => body.meta ?? {});

type VersionParts = NonNullable<NonNullable<WireMeta['slurm']>['version']>;

/**
 * Joins the reported version parts with dots, skipping absent ones.
 */
export function formatSlurmVersion(parts: VersionParts | undefined): string {
  if (!parts) {
    return '';
  }
  return [parts.major, parts.minor, parts.micro]
    .filter((part) => part !== undefined)
    .map(String)
    .join('.');
}

export class InfoAdapter extends BaseManager implements InfoManager {
  constructor(context: AdapterContext) {
    super('info', context, ['get']);
  }

  async ping(signal: AbortSignal): Promise<PingResult> {
    const data = await this.fetchPing(signal);
    return { controllers: this.decodeEntries(data, 'pings', decodePing) };
  }

  async version(signal: AbortSignal): Promise<VersionInfo> {
    const meta = this.readMeta(await this.fetchPing(signal));
    return {
      apiVersion: this.apiVersion,
      slurmVersion: formatSlurmVersion(meta.slurm?.version),
      release: meta.slurm?.release ?? '',
      plugin: meta.plugin?.name ?? '',
      dataParser: meta.plugin?.data_parser ?? '',
    };
  }

  async get(signal: AbortSignal): Promise<ClusterInfo> {
    const data = await this.fetchPing(signal);
    const meta = this.readMeta(data);
    return {
      clusterName: meta.slurm?.cluster ?? '',
      release: meta.slurm?.release ?? '',
      apiVersion: this.apiVersion,
      controllers: this.decodeEntries(data, 'pings', decodePing),
    };
  }

  private async fetchPing(signal: AbortSignal): Promise<unknown> {
    const client = this.begin(signal, 'get');
    return this.call(client, signal, {
      method: 'GET',
      api: 'slurm',
      path: '/ping',
    });
  }

  private readMeta(data: unknown): WireMeta {
    const result = decodeMeta(data);
    if (!result.ok) {
      throw SlurmError.invalidResponse(`info metadata is invalid: ${result.error}`, this.apiVersion);
    }
    return result.value;
  }
}
