/**
 * Common types shared by every Slurm entity.
 */

/**
 * Value used for numeric limits the server reports as infinite.
 */
export const UNLIMITED = Number.POSITIVE_INFINITY;

/**
 * Epoch seconds; 0 means unset.
 */
export type EpochSeconds = number;

/**
 * Pagination applied after filtering
 */
export interface ListOptions {
  /** Maximum items to return; 0 or absent returns all. */
  limit?: number;
  /** Zero-based offset into the filtered result. */
  offset?: number;
}

/**
 * Result of a list call
 */
export interface ListResult<T> {
  items: T[];
  /** Size of the filtered result before pagination. */
  total: number;
}

/**
 * Kind of change reported by a watch
 */
export type WatchEventType = 'added' | 'modified' | 'deleted';

/**
 * Change event emitted by a watch
 */
export interface WatchEvent<T> {
  type: WatchEventType;
  object: T;
  /** Milliseconds since epoch when the change was observed. */
  timestamp: number;
}

/**
 * Polling watch settings
 */
export interface WatchOptions {
  /** Poll interval in milliseconds (default 5000). */
  pollInterval?: number;
  /** Maximum buffered events before the poller waits for the consumer (default 100). */
  bufferSize?: number;
  /** Emit `added` for everything seen by the first poll. */
  emitInitial?: boolean;
}

/**
 * Closable stream of watch events
 */
export interface WatchStream<T> extends AsyncIterable<WatchEvent<T>> {
  /** Stops polling and ends the stream; buffered events are discarded. */
  close(): void;
}

/**
 * Controller reachability reported by ping
 */
export interface ControllerPing {
  hostname: string;
  /** "UP" or "DOWN". */
  status: string;
  /** Primary or backup. */
  mode: string;
  /** Round trip in microseconds. */
  latency: number;
}

/**
 * Ping result
 */
export interface PingResult {
  controllers: ControllerPing[];
}

/**
 * Server build and parser answering for this client
 */
export interface VersionInfo {
  /** Wire version the client speaks, e.g. "v0.0.42". */
  apiVersion: string;
  /** Slurm version as "major.minor.micro"; empty when not reported. */
  slurmVersion: string;
  /** Release string, e.g. "24.05.3". */
  release: string;
  /** OpenAPI plugin name. */
  plugin: string;
  /** Data parser plugin, e.g. "data_parser/v0.0.42". */
  dataParser: string;
}

/**
 * Cluster answering the controller API
 */
export interface ClusterInfo {
  clusterName: string;
  release: string;
  apiVersion: string;
  controllers: ControllerPing[];
}
