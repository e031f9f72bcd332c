/**
 * Job adapter.
 * @module adapters/jobs
 */

import { SlurmError } from '../errors/index.js';
import {
  ALL_OPERATIONS,
  BaseManager,
  matchesAny,
  matchesOne,
  paginate,
} from '../managers/base.js';
import type { AdapterContext, EntityDecoder, Operation } from '../managers/base.js';
import type { JobManager } from '../managers/interfaces.js';
import { PollingWatch } from '../managers/watch.js';
import type {
  Job,
  JobSubmission,
  JobSubmitResult,
  JobUpdate,
  ListJobsOptions,
  ListResult,
  WatchJobsOptions,
  WatchStream,
} from '../types/index.js';
import { dropNulls, submitResponseSchema } from '../wire/common.js';

/**
 * Version-specific job wire handling.
 */
export interface JobCodec {
  decode: EntityDecoder<Job>;
  encodeSubmit(submission: JobSubmission): unknown;
  encodeUpdate(update: JobUpdate): unknown;
}

function matchesJob(job: Job, options: ListJobsOptions): boolean {
  return (
    matchesAny(job.name, options.names) &&
    matchesAny(job.state, options.states) &&
    matchesOne(job.userName, options.userName) &&
    matchesOne(job.account, options.account) &&
    matchesOne(job.partition, options.partition)
  );
}

export class JobAdapter extends BaseManager implements JobManager {
  constructor(
    context: AdapterContext,
    private readonly codec: JobCodec,
    operations: readonly Operation[] = ALL_OPERATIONS
  ) {
    super('job', context, operations);
  }

  async list(signal: AbortSignal, options: ListJobsOptions = {}): Promise<ListResult<Job>> {
    const client = this.begin(signal, 'list');
    this.validateListOptions(options);

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurm',
      path: '/jobs',
      query: { update_time: options.updatedSince },
    });
    const jobs = this.decodeEntries(data, 'jobs', this.codec.decode);
    return paginate(
      jobs.filter((job) => matchesJob(job, options)),
      options
    );
  }

  async get(signal: AbortSignal, jobId: string | number): Promise<Job> {
    const client = this.begin(signal, 'get');
    const id = this.validateJobId(jobId);

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurm',
      path: `/job/${id}`,
    });
    return this.first(this.decodeEntries(data, 'jobs', this.codec.decode), id);
  }

  async submit(signal: AbortSignal, job: JobSubmission): Promise<JobSubmitResult> {
    const client = this.begin(signal, 'create');
    const hasScript = job.script !== undefined && job.script.trim() !== '';
    const hasCommand = job.command !== undefined && job.command.trim() !== '';
    if (!hasScript && !hasCommand) {
      throw SlurmError.validation('job script or command is required');
    }

    const data = await this.call(client, signal, {
      method: 'POST',
      api: 'slurm',
      path: '/job/submit',
      body: this.codec.encodeSubmit(job),
    });
    const parsed = submitResponseSchema.safeParse(dropNulls(data));
    if (!parsed.success || parsed.data.job_id === undefined) {
      throw SlurmError.invalidResponse('job submit response has no job_id', this.apiVersion);
    }
    this.logger.debug('job submitted', { jobId: parsed.data.job_id, version: this.apiVersion });
    return { jobId: parsed.data.job_id };
  }

  async update(signal: AbortSignal, jobId: string | number, update: JobUpdate): Promise<void> {
    const client = this.begin(signal, 'update');
    const id = this.validateJobId(jobId);
    this.requireUpdateFields(update);

    await this.call(client, signal, {
      method: 'POST',
      api: 'slurm',
      path: `/job/${id}`,
      body: this.codec.encodeUpdate(update),
    });
  }

  async delete(signal: AbortSignal, jobId: string | number): Promise<void> {
    const client = this.begin(signal, 'delete');
    const id = this.validateJobId(jobId);

    await this.call(client, signal, {
      method: 'DELETE',
      api: 'slurm',
      path: `/job/${id}`,
    });
  }

  async watch(signal: AbortSignal, options: WatchJobsOptions = {}): Promise<WatchStream<Job>> {
    this.begin(signal, 'list');
    // Polls always diff the whole filtered list.
    const filter = { ...options.filter, limit: undefined, offset: undefined };
    return new PollingWatch(signal, {
      list: async (pollSignal) => (await this.list(pollSignal, filter)).items,
      key: (job) => String(job.id),
      resource: this.resource,
      logger: this.logger,
      pollInterval: options.pollInterval,
      bufferSize: options.bufferSize,
      emitInitial: options.emitInitial,
    });
  }

  private validateJobId(jobId: string | number | undefined): string {
    this.validateResourceName(jobId, 'job ID');
    const id = String(jobId).trim();
    if (!/^\d+$/.test(id)) {
      throw SlurmError.validation(`job ID must be numeric, got "${id}"`);
    }
    return id;
  }
}
