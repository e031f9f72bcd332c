/**
 * Wire shapes introduced by v0.0.41.
 *
 * Jobs report their state as a list (base state then flags) and their
 * limits and times as no-val structs; partition limits become no-val structs.
 * Reservations and QoS are unchanged from v0.0.40.
 * @module wire/v0_0_41
 */

import { z } from 'zod';
import { noValSchema, partitionBaseShape } from './common.js';
import type { NoVal } from './common.js';

export const jobSchema = z.object({
  job_id: z.number().optional(),
  name: z.string().optional(),
  account: z.string().optional(),
  partition: z.string().optional(),
  user_name: z.string().optional(),
  job_state: z.array(z.string()).optional(),
  state_reason: z.string().optional(),
  qos: z.string().optional(),
  time_limit: noValSchema.optional(),
  node_count: noValSchema.optional(),
  cpus: noValSchema.optional(),
  priority: noValSchema.optional(),
  command: z.string().optional(),
  current_working_directory: z.string().optional(),
  submit_time: noValSchema.optional(),
  start_time: noValSchema.optional(),
  end_time: noValSchema.optional(),
});

export type Job = z.infer<typeof jobSchema>;

export const partitionSchema = z.object({
  ...partitionBaseShape,
  maximums: z
    .object({
      nodes: noValSchema.optional(),
      time: noValSchema.optional(),
    })
    .optional(),
  defaults: z.object({ time: noValSchema.optional() }).optional(),
});

export type Partition = z.infer<typeof partitionSchema>;

/**
 * Job description sent on submit and update.
 */
export interface JobDescription {
  name?: string;
  account?: string;
  partition?: string;
  qos?: string;
  time_limit?: NoVal;
  priority?: NoVal;
  comment?: string;
  minimum_nodes?: number;
  minimum_cpus?: number;
  current_working_directory?: string;
  environment?: string[];
}

/**
 * Submit body: the script still travels beside the description.
 */
export interface JobSubmitBody {
  script: string;
  job: JobDescription;
}
