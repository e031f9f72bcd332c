/**
 * v0.0.43 adapter set: the v0.0.42 wire shapes, with reservations fully
 * manageable.
 * @module versions/v0_0_43
 */

import { ReservationAdapter } from '../adapters/index.js';
import { ALL_OPERATIONS } from '../managers/base.js';
import type { AdapterContext } from '../managers/base.js';
import type { AdapterSet } from './types.js';
import { createAdapters as createV42Adapters, decodeReservation } from './v0_0_42.js';

export const VERSION = 'v0.0.43';

export function createAdapters(context: AdapterContext): AdapterSet {
  return {
    ...createV42Adapters(context),
    version: VERSION,
    reservations: new ReservationAdapter(context, decodeReservation, ALL_OPERATIONS),
  };
}
