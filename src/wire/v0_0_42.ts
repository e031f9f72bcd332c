/**
 * Wire shapes introduced by v0.0.42 and kept by v0.0.43 and v0.0.44.
 *
 * The submit script moves into the job description, node state and features
 * become lists, reservation times become no-val structs and the QoS
 * per-user job limit moves under `active_jobs`.
 * @module wire/v0_0_42
 */

import { z } from 'zod';
import { noValSchema, tresLimitSchema } from './common.js';
import type { NoVal } from './common.js';
import type { JobDescription as JobDescriptionV41 } from './v0_0_41.js';

export const nodeSchema = z.object({
  name: z.string().optional(),
  hostname: z.string().optional(),
  /** Base state followed by flags. */
  state: z.array(z.string()).optional(),
  partitions: z.array(z.string()).optional(),
  cpus: z.number().optional(),
  alloc_cpus: z.number().optional(),
  real_memory: z.number().optional(),
  features: z.array(z.string()).optional(),
  reason: z.string().optional(),
  architecture: z.string().optional(),
});

export type Node = z.infer<typeof nodeSchema>;

export const reservationSchema = z.object({
  name: z.string().optional(),
  start_time: noValSchema.optional(),
  end_time: noValSchema.optional(),
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
              active_jobs: z
                .object({
                  per: z.object({ user: noValSchema.optional() }).optional(),
                })
                .optional(),
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
 * Job description sent on submit and update; carries the script itself.
 */
export interface JobDescription extends JobDescriptionV41 {
  script?: string;
}

/**
 * Submit body.
 */
export interface JobSubmitBody {
  job: JobDescription;
}

/**
 * Reservation description sent on create and update.
 */
export interface ReservationDescription {
  name: string;
  start_time?: NoVal;
  end_time?: NoVal;
  node_count?: number;
  node_list?: string;
  users?: string;
  accounts?: string;
  partition?: string;
  flags?: string[];
}
