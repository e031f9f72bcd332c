/**
 * Shared preconditions and helpers for every entity adapter.
 *
 * Every operation runs, in order: context check, static capability check,
 * client check, identity check, then its own structural validation. The wire
 * is only reached once all of them pass.
 * @module managers/base
 */

import type { z } from 'zod';
import { SlurmError, handleApiResponse } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import type { SlurmWireClient, WireRequest } from '../wire/client.js';
import { dropNulls, readEnvelope } from '../wire/common.js';
import type { ListOptions, ListResult } from '../types/index.js';

/**
 * Operations an entity adapter may support.
 */
export type Operation = 'list' | 'get' | 'create' | 'update' | 'delete';

/** Every operation. */
export const ALL_OPERATIONS: readonly Operation[] = ['list', 'get', 'create', 'update', 'delete'];

/** Read-only access. */
export const READ_ONLY: readonly Operation[] = ['list', 'get'];

/** No operation at all. */
export const NO_OPERATIONS: readonly Operation[] = [];

/**
 * Settings shared by every adapter of one version.
 */
export interface AdapterContext {
  version: string;
  /** Null when the adapter was built without a wire client. */
  client: SlurmWireClient | null;
  defaultClusterName: string;
  logger?: Logger;
}

/**
 * Result of decoding one wire entry.
 */
export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Validates one wire entry and converts it to the domain model.
 */
export type EntityDecoder<T> = (raw: unknown) => DecodeResult<T>;

/**
 * Builds a decoder from a wire schema and a converter. JSON nulls are read
 * as absent fields.
 */
export function createDecoder<S extends z.ZodTypeAny, T>(
  schema: S,
  convert: (wire: z.infer<S>) => T
): EntityDecoder<T> {
  return (raw) => {
    const result = schema.safeParse(dropNulls(raw));
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return { ok: false, error: `${where}${issue ? issue.message : 'invalid entry'}` };
    }
    return { ok: true, value: convert(result.data) };
  };
}

/**
 * Base class for entity adapters.
 */
export abstract class BaseManager {
  protected readonly apiVersion: string;
  protected readonly client: SlurmWireClient | null;
  protected readonly defaultClusterName: string;
  protected readonly logger: Logger;
  private readonly supported: ReadonlySet<Operation>;

  /**
   * @param resource - Singular entity name used in messages, e.g. "job".
   */
  constructor(
    protected readonly resource: string,
    context: AdapterContext,
    operations: readonly Operation[]
  ) {
    this.apiVersion = context.version;
    this.client = context.client;
    this.defaultClusterName = context.defaultClusterName;
    this.logger = context.logger ?? new NoopLogger();
    this.supported = new Set(operations);
  }

  /**
   * Returns true if this version supports `operation` for the entity.
   */
  supports(operation: Operation): boolean {
    return this.supported.has(operation);
  }

  /**
   * Fails with ContextRequired for a missing signal and Cancelled for an
   * aborted one.
   */
  protected validateContext(signal: AbortSignal | undefined): void {
    if (!signal) {
      throw SlurmError.contextRequired();
    }
    if (signal.aborted) {
      throw SlurmError.cancelled();
    }
  }

  /**
   * Returns the wire client, failing if the adapter has none.
   */
  protected checkClientInitialized(): SlurmWireClient {
    if (!this.client) {
      throw SlurmError.clientNotInitialized(this.resource);
    }
    return this.client;
  }

  /**
   * Fails with ValidationError naming `field` when `value` is empty.
   */
  protected validateResourceName(value: string | number | undefined, field: string): void {
    if (value === undefined || String(value).trim() === '') {
      throw SlurmError.validation(`${field} is required`);
    }
  }

  /**
   * Rejects an update with no defined field.
   */
  protected requireUpdateFields(update: object | undefined): void {
    const hasField =
      update !== undefined && Object.values(update).some((value) => value !== undefined);
    if (!hasField) {
      throw SlurmError.validation(`${this.resource} update must contain at least one field`);
    }
  }

  /**
   * Rejects negative pagination values.
   */
  protected validateListOptions(options: ListOptions | undefined): void {
    if (options?.limit !== undefined && options.limit < 0) {
      throw SlurmError.validation('limit must not be negative');
    }
    if (options?.offset !== undefined && options.offset < 0) {
      throw SlurmError.validation('offset must not be negative');
    }
  }

  /**
   * Runs the context, capability and client checks, in that order.
   */
  protected begin(signal: AbortSignal | undefined, operation: Operation): SlurmWireClient {
    this.validateContext(signal);
    if (!this.supported.has(operation)) {
      throw SlurmError.unsupportedOperation(`${this.resource} ${operation}`, this.apiVersion);
    }
    return this.checkClientInitialized();
  }

  /**
   * Fails an operation no version offers, after the context check.
   */
  protected refuse(signal: AbortSignal | undefined, operation: Operation): never {
    this.validateContext(signal);
    throw SlurmError.unsupportedOperation(`${this.resource} ${operation}`, this.apiVersion);
  }

  /**
   * Issues a wire call and returns its body once the response adapter has
   * accepted it.
   */
  protected async call(
    client: SlurmWireClient,
    signal: AbortSignal,
    request: WireRequest
  ): Promise<unknown> {
    const response = await client.request(signal, request);
    handleApiResponse(
      { status: response.status, errors: readEnvelope(response.data).errors },
      this.apiVersion
    );
    return response.data;
  }

  /**
   * Decodes the array under `key`. A missing array is empty; any invalid
   * entry fails the whole call.
   */
  protected decodeEntries<T>(data: unknown, key: string, decode: EntityDecoder<T>): T[] {
    const raw = isRecord(data) ? data[key] : undefined;
    if (raw === undefined || raw === null) {
      return [];
    }
    if (!Array.isArray(raw)) {
      throw SlurmError.invalidResponse(`${key}: expected an array`, this.apiVersion);
    }
    return raw.map((entry, index) => {
      const result = decode(entry);
      if (!result.ok) {
        throw SlurmError.invalidResponse(
          `${this.resource} entry ${index} is invalid: ${result.error}`,
          this.apiVersion
        );
      }
      return result.value;
    });
  }

  /**
   * Returns the single entity of a get response, or fails with NotFound.
   */
  protected first<T>(items: T[], id: string | number): T {
    const [item] = items;
    if (item === undefined) {
      throw SlurmError.notFound(this.resource, String(id), this.apiVersion);
    }
    return item;
  }
}

/**
 * Narrows to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Applies offset and limit to an already filtered list. `total` is the
 * filtered size; an offset past the end yields an empty page.
 */
export function paginate<T>(items: T[], options: ListOptions = {}): ListResult<T> {
  const total = items.length;
  const offset = options.offset ?? 0;
  const limit = options.limit ?? 0;

  if (offset >= total) {
    return { items: [], total };
  }
  const end = limit > 0 ? offset + limit : total;
  return { items: items.slice(offset, end), total };
}

/**
 * Case-insensitive membership; an empty or absent filter matches everything.
 */
export function matchesAny(value: string, filter: readonly string[] | undefined): boolean {
  if (!filter || filter.length === 0) {
    return true;
  }
  const lower = value.toLowerCase();
  return filter.some((candidate) => candidate.toLowerCase() === lower);
}

/**
 * Case-insensitive equality; an empty or absent filter matches everything.
 */
export function matchesOne(value: string, filter: string | undefined): boolean {
  return !filter || value.toLowerCase() === filter.toLowerCase();
}

/**
 * True if any of `values` passes the filter.
 */
export function intersects(values: readonly string[], filter: readonly string[] | undefined): boolean {
  if (!filter || filter.length === 0) {
    return true;
  }
  return values.some((value) => matchesAny(value, filter));
}

/**
 * Joins a list filter for a server-side query parameter.
 */
export function joinFilter(filter: readonly string[] | undefined): string | undefined {
  return filter && filter.length > 0 ? filter.join(',') : undefined;
}

/**
 * Drops undefined properties so absent fields are never sent.
 */
export function compact<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (isKeyOf(value, key) && value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}
