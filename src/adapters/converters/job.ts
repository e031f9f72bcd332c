/**
 * Job conversion between wire shapes and the domain model.
 * @module adapters/converters/job
 */

import type { Job, JobSubmission, JobUpdate } from '../../types/index.js';
import { compact } from '../../managers/base.js';
import { fromNoVal, fromPlainNumber, toNoVal, toPlainNumber } from '../../wire/common.js';
import type * as V40 from '../../wire/v0_0_40.js';
import type * as V41 from '../../wire/v0_0_41.js';
import type * as V42 from '../../wire/v0_0_42.js';

/**
 * A wire job tagged with the version that introduced its shape.
 */
export type JobWire =
  | { version: 'v0.0.40'; job: V40.Job }
  | { version: 'v0.0.41'; job: V41.Job };

/**
 * Submission encodings: script beside the job (v0.0.40, v0.0.41) or inside
 * it (v0.0.42 onwards), with plain or no-val limits.
 */
export type JobEncoding = 'v0.0.40' | 'v0.0.41' | 'v0.0.42';

/** Environment sent when the submission has none. */
export const DEFAULT_ENVIRONMENT: readonly string[] = ['PATH=/bin:/usr/bin'];

/**
 * Splits "RUNNING+COMPLETING" or "RUNNING,COMPLETING" into state and flags.
 */
export function splitState(values: readonly string[]): { state: string; flags: string[] } {
  const parts = values
    .flatMap((value) => value.split(/[+,]/))
    .map((part) => part.trim())
    .filter((part) => part !== '');
  const [state = '', ...flags] = parts;
  return { state, flags };
}

export function convertJob(input: JobWire): Job {
  const { job } = input;
  const common = {
    id: job.job_id ?? 0,
    name: job.name ?? '',
    account: job.account ?? '',
    partition: job.partition ?? '',
    userName: job.user_name ?? '',
    stateReason: job.state_reason ?? '',
    qos: job.qos ?? '',
    command: job.command ?? '',
    workingDirectory: job.current_working_directory ?? '',
  };

  if (input.version === 'v0.0.40') {
    const { state, flags } = splitState(input.job.job_state ? [input.job.job_state] : []);
    return {
      ...common,
      state,
      stateFlags: flags,
      timeLimit: fromPlainNumber(input.job.time_limit),
      nodeCount: input.job.node_count ?? 0,
      cpus: input.job.cpus ?? 0,
      priority: input.job.priority ?? 0,
      submitTime: input.job.submit_time ?? 0,
      startTime: input.job.start_time ?? 0,
      endTime: input.job.end_time ?? 0,
    };
  }

  const { state, flags } = splitState(input.job.job_state ?? []);
  return {
    ...common,
    state,
    stateFlags: flags,
    timeLimit: fromNoVal(input.job.time_limit),
    nodeCount: fromNoVal(input.job.node_count),
    cpus: fromNoVal(input.job.cpus),
    priority: fromNoVal(input.job.priority),
    submitTime: fromNoVal(input.job.submit_time),
    startTime: fromNoVal(input.job.start_time),
    endTime: fromNoVal(input.job.end_time),
  };
}

/**
 * Returns the batch script of a submission, wrapping a bare command.
 */
export function buildScript(submission: JobSubmission): string {
  if (submission.script && submission.script.trim() !== '') {
    return submission.script;
  }
  return `#!/bin/bash\n${submission.command ?? ''}\n`;
}

type SharedDescription = Omit<V40.JobDescription, 'time_limit' | 'priority'>;

function describeSubmission(submission: JobSubmission): SharedDescription {
  return compact<SharedDescription>({
    name: submission.name,
    account: submission.account,
    partition: submission.partition,
    qos: submission.qos,
    minimum_nodes: submission.nodes,
    minimum_cpus: submission.cpus,
    current_working_directory: submission.workingDirectory,
    environment:
      submission.environment && submission.environment.length > 0
        ? submission.environment
        : [...DEFAULT_ENVIRONMENT],
  });
}

export function encodeJobSubmission(
  submission: JobSubmission,
  encoding: JobEncoding
): V40.JobSubmitBody | V41.JobSubmitBody | V42.JobSubmitBody {
  const script = buildScript(submission);
  const description = describeSubmission(submission);
  const limit = submission.timeLimit;

  switch (encoding) {
    case 'v0.0.40':
      return {
        script,
        job: { ...description, ...compact({ time_limit: limit === undefined ? undefined : toPlainNumber(limit) }) },
      };
    case 'v0.0.41':
      return {
        script,
        job: { ...description, ...compact({ time_limit: limit === undefined ? undefined : toNoVal(limit) }) },
      };
    case 'v0.0.42':
      return {
        job: {
          ...description,
          ...compact({ time_limit: limit === undefined ? undefined : toNoVal(limit) }),
          script,
        },
      };
  }
}

/**
 * Encodes only the fields present on the update.
 */
export function encodeJobUpdate(
  update: JobUpdate,
  encoding: JobEncoding
): V40.JobDescription | V41.JobDescription {
  const base = compact({
    name: update.name,
    account: update.account,
    partition: update.partition,
    qos: update.qos,
    comment: update.comment,
  });

  if (encoding === 'v0.0.40') {
    return {
      ...base,
      ...compact({
        time_limit: update.timeLimit === undefined ? undefined : toPlainNumber(update.timeLimit),
        priority: update.priority,
      }),
    };
  }
  return {
    ...base,
    ...compact({
      time_limit: update.timeLimit === undefined ? undefined : toNoVal(update.timeLimit),
      priority: update.priority === undefined ? undefined : toNoVal(update.priority),
    }),
  };
}
