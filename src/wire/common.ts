/**
 * Wire shapes shared by every API version.
 * @module wire/common
 */

import { z } from 'zod';
import { UNLIMITED } from '../types/index.js';

/**
 * Optional number with an explicit "set" and "infinite" marker.
 */
export const noValSchema = z.object({
  set: z.boolean().optional(),
  infinite: z.boolean().optional(),
  number: z.number().optional(),
});

export type NoVal = z.infer<typeof noValSchema>;

/**
 * Reads a no-val number: absent or unset is 0, infinite is UNLIMITED.
 */
export function fromNoVal(value: NoVal | undefined): number {
  if (!value) {
    return 0;
  }
  if (value.infinite) {
    return UNLIMITED;
  }
  if (value.set === false) {
    return 0;
  }
  return value.number ?? 0;
}

/**
 * Encodes a number as a no-val struct.
 */
export function toNoVal(value: number): NoVal {
  if (value === UNLIMITED) {
    return { set: true, infinite: true, number: 0 };
  }
  return { set: true, infinite: false, number: value };
}

/**
 * Encodes a plain number; UNLIMITED becomes the 32-bit infinite marker.
 */
export function toPlainNumber(value: number): number {
  return value === UNLIMITED ? INFINITE_32 : value;
}

/** Infinite marker used by versions that send plain numbers. */
export const INFINITE_32 = 0xffffffff;

/**
 * Reads a plain number where the 32-bit infinite marker means UNLIMITED.
 */
export function fromPlainNumber(value: number | undefined): number {
  if (value === undefined) {
    return 0;
  }
  return value === INFINITE_32 ? UNLIMITED : value;
}

/**
 * Removes JSON nulls from a decoded body: null properties are dropped and
 * null array elements are skipped, so schemas only see absent fields.
 */
export function dropNulls(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.filter((item) => item !== null).map(dropNulls);
  }
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      if (item !== null) {
        result[key] = dropNulls(item);
      }
    }
    return result;
  }
  return value;
}

/**
 * Splits a comma-separated list, dropping empty items.
 */
export function splitList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

export const errorEntrySchema = z.object({
  error: z.string().optional(),
  error_number: z.number().optional(),
  description: z.string().optional(),
  source: z.string().optional(),
});

export const warningEntrySchema = z.object({
  description: z.string().optional(),
  source: z.string().optional(),
});

/**
 * Error and warning arrays carried by every response body.
 */
export const envelopeSchema = z.object({
  errors: z.array(errorEntrySchema).optional(),
  warnings: z.array(warningEntrySchema).optional(),
});

export type Envelope = z.infer<typeof envelopeSchema>;

/**
 * Reads the envelope of a response body. Bodies that are not objects, or
 * whose envelope is malformed, are treated as carrying no entries.
 */
export function readEnvelope(data: unknown): Envelope {
  const result = envelopeSchema.safeParse(dropNulls(data));
  return result.success ? result.data : {};
}

// Entities whose wire shape does not change between versions.

export const accountSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  organization: z.string().optional(),
  coordinators: z.array(z.object({ name: z.string().optional() })).optional(),
  flags: z.array(z.string()).optional(),
});

export type WireAccount = z.infer<typeof accountSchema>;

export const userSchema = z.object({
  name: z.string().optional(),
  default: z
    .object({
      account: z.string().optional(),
      wckey: z.string().optional(),
    })
    .optional(),
  administrator_level: z.array(z.string()).optional(),
  associations: z
    .array(
      z.object({
        account: z.string().optional(),
        cluster: z.string().optional(),
        partition: z.string().optional(),
        user: z.string().optional(),
      })
    )
    .optional(),
});

export type WireUser = z.infer<typeof userSchema>;

export const associationSchema = z.object({
  id: z.number().optional(),
  account: z.string().optional(),
  user: z.string().optional(),
  cluster: z.string().optional(),
  partition: z.string().optional(),
  qos: z.array(z.string()).optional(),
  default: z.object({ qos: z.string().optional() }).optional(),
  parent_account: z.string().optional(),
  is_default: z.boolean().optional(),
});

export type WireAssociation = z.infer<typeof associationSchema>;

export const clusterSchema = z.object({
  name: z.string().optional(),
  controller: z
    .object({
      host: z.string().optional(),
      port: z.number().optional(),
    })
    .optional(),
  nodes: z.string().optional(),
  rpc_version: z.number().optional(),
});

export type WireCluster = z.infer<typeof clusterSchema>;

export const tresSchema = z.object({
  id: z.number().optional(),
  type: z.string().optional(),
  name: z.string().optional(),
  count: z.number().optional(),
});

export type WireTRES = z.infer<typeof tresSchema>;

export const wckeySchema = z.object({
  id: z.number().optional(),
  name: z.string().optional(),
  user: z.string().optional(),
  cluster: z.string().optional(),
});

export type WireWCKey = z.infer<typeof wckeySchema>;

export const pingSchema = z.object({
  hostname: z.string().optional(),
  pinged: z.string().optional(),
  mode: z.string().optional(),
  latency: z.number().optional(),
});

export type WirePing = z.infer<typeof pingSchema>;

const versionPartSchema = z.union([z.string(), z.number()]);

/**
 * Response metadata naming the answering plugin and Slurm build.
 */
export const metaSchema = z.object({
  plugin: z
    .object({
      type: z.string().optional(),
      name: z.string().optional(),
      data_parser: z.string().optional(),
      accounting_storage: z.string().optional(),
    })
    .optional(),
  slurm: z
    .object({
      version: z
        .object({
          major: versionPartSchema.optional(),
          minor: versionPartSchema.optional(),
          micro: versionPartSchema.optional(),
        })
        .optional(),
      release: z.string().optional(),
      cluster: z.string().optional(),
    })
    .optional(),
});

export type WireMeta = z.infer<typeof metaSchema>;

export const metaBodySchema = z.object({ meta: metaSchema.optional() });

export const submitResponseSchema = z.object({
  job_id: z.number().optional(),
  step_id: z.string().optional(),
  job_submit_user_msg: z.string().optional(),
});

/**
 * Partition fields that are stable across versions.
 */
export const partitionBaseShape = {
  name: z.string().optional(),
  partition: z.object({ state: z.array(z.string()).optional() }).optional(),
  nodes: z
    .object({
      configured: z.string().optional(),
      total: z.number().optional(),
    })
    .optional(),
  cpus: z.object({ total: z.number().optional() }).optional(),
  minimums: z.object({ nodes: z.number().optional() }).optional(),
  priority: z.object({ job_factor: z.number().optional() }).optional(),
  accounts: z
    .object({
      allowed: z.string().optional(),
      deny: z.string().optional(),
    })
    .optional(),
  qos: z
    .object({
      allowed: z.string().optional(),
      deny: z.string().optional(),
      assigned: z.string().optional(),
    })
    .optional(),
};

/**
 * Per-job TRES limit entry, as used by QoS limits.
 */
export const tresLimitSchema = z.object({
  type: z.string().optional(),
  name: z.string().optional(),
  count: z.number().optional(),
});
