/**
 * TRES adapter (read-only).
 * @module adapters/tres
 */

import { BaseManager, createDecoder } from '../managers/base.js';
import type { AdapterContext } from '../managers/base.js';
import type { TRESManager } from '../managers/interfaces.js';
import type { TRES } from '../types/index.js';
import { tresSchema } from '../wire/common.js';
import { convertTRES } from './converters/accounting.js';

const decodeTRES = createDecoder(tresSchema, convertTRES);

export class TRESAdapter extends BaseManager implements TRESManager {
  constructor(context: AdapterContext) {
    super('tres', context, ['list']);
  }

  async list(signal: AbortSignal): Promise<TRES[]> {
    const client = this.begin(signal, 'list');

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurmdb',
      path: '/tres',
    });
    return this.decodeEntries(data, 'TRES', decodeTRES);
  }
}
