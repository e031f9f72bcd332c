/**
 * v0.0.44 adapter set. Same wire shapes and capabilities as v0.0.43.
 * @module versions/v0_0_44
 */

import type { AdapterContext } from '../managers/base.js';
import type { AdapterSet } from './types.js';
import { createAdapters as createV43Adapters } from './v0_0_43.js';

export const VERSION = 'v0.0.44';

export function createAdapters(context: AdapterContext): AdapterSet {
  return { ...createV43Adapters(context), version: VERSION };
}
