/**
 * Wire shapes introduced by v0.0.40.
 *
 * This version reports job and partition limits and times as plain numbers,
 * job state as a single string and node state and features as strings.
 * @module wire/v0_0_40
 */

import { z } from 'zod';
import { noValSchema, partitionBaseShape, tresLimitSchema } from './common.js';

export const jobSchema = z.object({
  job_id: z.number().optional(),
  name: z.string().optional(),
  account: z.string().optional(),
  partition: z.string().optional(),
  user_name: z.string().optional(),
  job_state: z.string().optional(),
  state_reason: z.string().optional(),
  qos: z.string().optional(),
  time_limit: z.number().optional(),
  node_count: z.number().optional(),
  cpus: z.number().optional(),
  priority: z.number().optional(),
  command: z.string().optional(),
  current_working_directory: z.string().optional(),
  submit_time: z.number().optional(),
  start_time: z.number().optional(),
  end_time: z.number().optional(),
});

export type Job = z.infer<typeof jobSchema>;

export const nodeSchema = z.object({
  name: z.string().optional(),
  hostname: z.string().optional(),
  /** "IDLE", or base state and flags joined by "+", e.g. "IDLE+DRAIN". */
  state: z.string().optional(),
  partitions: z.array(z.string()).optional(),
  cpus: z.number().optional(),
  alloc_cpus: z.number().optional(),
  real_memory: z.number().optional(),
  /** Comma-separated. */
  features: z.string().optional(),
  reason: z.string().optional(),
  architecture: z.string().optional(),
});

export type Node = z.infer<typeof nodeSchema>;

export const partitionSchema = z.object({
  ...partitionBaseShape,
  maximums: z
    .object({
      nodes: z.number().optional(),
      time: z.number().optional(),
    })
    .optional(),
  defaults: z.object({ time: z.number().optional() }).optional(),
});

export type Partition = z.infer<typeof partitionSchema>;

export const reservationSchema = z.object({
  name: z.string().optional(),
  start_time: z.number().optional(),
  end_time: z.number().optional(),
  node_count: z.number().optional(),
  node_list: z.string().optional(),
  /** Comma-separated. */
  users: z.string().optional(),
  /** Comma-separated. */
  accounts: z.string().optional(),
  partition: z.string().optional(),
  flags: z.array(z.string()).optional(),
});

export type Reservation = z.infer<typeof reservationSchema>;

export const qosSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  priority: noValSchema.optional(),
  usage_factor: noValSchema.optional(),
  limits: z
    .object({
      max: z
        .object({
          jobs: z
            .object({
              per: z.object({ user: noValSchema.optional() }).optional(),
            })
            .optional(),
          tres: z
            .object({
              per: z.object({ job: z.array(tresLimitSchema).optional() }).optional(),
            })
            .optional(),
          wall_clock: z
            .object({
              per: z.object({ job: noValSchema.optional() }).optional(),
            })
            .optional(),
        })
        .optional(),
    })
    .optional(),
});

export type QoS = z.infer<typeof qosSchema>;

/**
 * Job description sent on submit and update.
 */
export interface JobDescription {
  name?: string;
  account?: string;
  partition?: string;
  qos?: string;
  time_limit?: number;
  priority?: number;
  comment?: string;
  minimum_nodes?: number;
  minimum_cpus?: number;
  current_working_directory?: string;
  environment?: string[];
}

/**
 * Submit body: the script travels beside the description.
 */
export interface JobSubmitBody {
  script: string;
  job: JobDescription;
}

