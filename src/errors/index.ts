/**
 * Error handling for the Slurm REST client.
 * @module errors
 */

export {
  SlurmErrorKind,
  SlurmError,
  isSlurmError,
  hasErrorKind,
} from './error.js';
export type { WireErrorEntry } from './error.js';

export { handleApiResponse, kindFromStatus, defaultReason } from './response.js';
export type { ApiResponseView } from './response.js';
