/**
 * Job types.
 */

import type { EpochSeconds, ListOptions, WatchOptions } from './common.js';

/**
 * Job states reported by the controller
 */
export type JobState =
  | 'PENDING'
  | 'RUNNING'
  | 'SUSPENDED'
  | 'COMPLETED'
  | 'CANCELLED'
  | 'FAILED'
  | 'TIMEOUT'
  | 'NODE_FAIL'
  | 'PREEMPTED'
  | 'BOOT_FAIL'
  | 'DEADLINE'
  | 'OUT_OF_MEMORY'
  | (string & {});

/**
 * Job
 */
export interface Job {
  /** Server-assigned ID; 0 when absent. */
  id: number;
  name: string;
  account: string;
  partition: string;
  userName: string;
  state: JobState;
  /** Extra state flags such as COMPLETING or REQUEUED. */
  stateFlags: string[];
  stateReason: string;
  qos: string;
  /** Minutes; UNLIMITED when infinite. */
  timeLimit: number;
  nodeCount: number;
  cpus: number;
  priority: number;
  command: string;
  workingDirectory: string;
  submitTime: EpochSeconds;
  startTime: EpochSeconds;
  endTime: EpochSeconds;
}

/**
 * Job submission. Either `script` or `command` is required; a bare command
 * is wrapped into a shell script.
 */
export interface JobSubmission {
  script?: string;
  command?: string;
  name?: string;
  account?: string;
  partition?: string;
  qos?: string;
  /** Minutes. */
  timeLimit?: number;
  nodes?: number;
  cpus?: number;
  workingDirectory?: string;
  /** KEY=VALUE entries; defaults to a minimal PATH. */
  environment?: string[];
}

/** Alias kept for symmetry with the other `*Create` requests. */
export type JobCreate = JobSubmission;

/**
 * Result of a job submission
 */
export interface JobSubmitResult {
  jobId: number;
}

/**
 * Job update; absent fields are left untouched.
 */
export interface JobUpdate {
  name?: string;
  account?: string;
  partition?: string;
  qos?: string;
  /** Minutes. */
  timeLimit?: number;
  priority?: number;
  comment?: string;
}

/**
 * Job list filters
 */
export interface ListJobsOptions extends ListOptions {
  names?: string[];
  states?: string[];
  userName?: string;
  account?: string;
  partition?: string;
  /** Only jobs changed since this time (server-side). */
  updatedSince?: EpochSeconds;
}

/**
 * Job watch settings
 */
export interface WatchJobsOptions extends WatchOptions {
  filter?: Omit<ListJobsOptions, 'limit' | 'offset'>;
}
