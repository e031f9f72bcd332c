/**
 * Wire layer: versioned client and slurmrestd payload schemas.
 * @module wire
 */

export { WireClient } from './client.js';
export type {
  ApiFamily,
  QueryParams,
  SlurmWireClient,
  WireClientOptions,
  WireRequest,
  WireResponse,
} from './client.js';

export {
  noValSchema,
  fromNoVal,
  toNoVal,
  toPlainNumber,
  fromPlainNumber,
  INFINITE_32,
  splitList,
  dropNulls,
  envelopeSchema,
  readEnvelope,
  metaSchema,
} from './common.js';
export type { NoVal, Envelope, WireMeta } from './common.js';

export * as v0_0_40 from './v0_0_40.js';
export * as v0_0_41 from './v0_0_41.js';
export * as v0_0_42 from './v0_0_42.js';
