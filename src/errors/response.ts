/**
 * Normalizes wire responses (HTTP status + embedded error entries) into
 * {@link SlurmError}s.
 * @module errors/response
 */

import { SlurmError, SlurmErrorKind } from './error.js';
import type { WireErrorEntry } from './error.js';

/**
 * The parts of a wire response the error adapter looks at.
 */
export interface ApiResponseView {
  /** HTTP status code. */
  status: number;
  /** Error entries from the response body, if any. */
  errors?: readonly WireErrorEntry[] | null;
}

/**
 * Maps an HTTP status code to an error kind.
 */
export function kindFromStatus(status: number): SlurmErrorKind {
  if (status === 404) {
    return SlurmErrorKind.NotFound;
  }
  if (status === 409) {
    return SlurmErrorKind.Conflict;
  }
  if (status === 401 || status === 403) {
    return SlurmErrorKind.Unauthorized;
  }
  if (status >= 500) {
    return SlurmErrorKind.ServerError;
  }
  return SlurmErrorKind.ValidationError;
}

/**
 * Default human-readable reason for a status code.
 */
export function defaultReason(status: number): string {
  switch (status) {
    case 400:
      return 'bad request';
    case 401:
      return 'unauthorized';
    case 403:
      return 'forbidden';
    case 404:
      return 'not found';
    case 405:
      return 'method not allowed';
    case 409:
      return 'conflict';
    case 500:
      return 'internal server error';
    case 502:
      return 'bad gateway';
    case 503:
      return 'service unavailable';
    case 504:
      return 'gateway timeout';
    default:
      return status >= 500 ? 'server error' : 'request failed';
  }
}

function describeEntry(entry: WireErrorEntry): string {
  if (entry.description) {
    return entry.description;
  }
  if (entry.error) {
    return entry.error;
  }
  if (entry.error_number !== undefined) {
    return `error ${entry.error_number}`;
  }
  return '';
}

/**
 * Checks a wire response and throws the normalized error when it failed.
 *
 * A non-2xx status always fails, with or without error entries. A 2xx status
 * that still carries error entries fails as a server error.
 */
export function handleApiResponse(response: ApiResponseView, version: string): void {
  const entries = response.errors ?? [];
  const ok = response.status >= 200 && response.status < 300;

  if (ok && entries.length === 0) {
    return;
  }

  const kind = ok ? SlurmErrorKind.ServerError : kindFromStatus(response.status);
  const details = entries.map(describeEntry).filter((text) => text !== '');
  const reason = details.length > 0 ? details.join('; ') : defaultReason(response.status);

  throw new SlurmError(
    kind,
    `slurm API ${version} returned HTTP ${response.status}: ${reason}`,
    {
      statusCode: response.status,
      version,
      details: [...entries],
    }
  );
}
