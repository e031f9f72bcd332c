/**
 * QoS conversion.
 * @module adapters/converters/qos
 */

import type { QoS, QoSCreate, QoSUpdate } from '../../types/index.js';
import { compact } from '../../managers/base.js';
import { fromNoVal, toNoVal } from '../../wire/common.js';
import type { NoVal } from '../../wire/common.js';
import type * as V40 from '../../wire/v0_0_40.js';
import type * as V42 from '../../wire/v0_0_42.js';

/**
 * A wire QoS tagged with the version that introduced its shape.
 */
export type QoSWire =
  | { version: 'v0.0.40'; qos: V40.QoS }
  | { version: 'v0.0.42'; qos: V42.QoS };

/**
 * QoS encodings: per-user job limit under `jobs.per` (v0.0.40, v0.0.41) or
 * `jobs.active_jobs.per` (v0.0.42 onwards).
 */
export type QoSEncoding = 'v0.0.40' | 'v0.0.42';

type TresLimits = Array<{ type?: string; name?: string; count?: number }>;

function tresCount(limits: TresLimits | undefined, type: string): number {
  const entry = limits?.find((limit) => limit.type === type);
  return entry?.count ?? 0;
}

export function convertQoS(input: QoSWire): QoS {
  const { qos } = input;
  const max = qos.limits?.max;
  const maxJobs =
    input.version === 'v0.0.40'
      ? fromNoVal(input.qos.limits?.max?.jobs?.per?.user)
      : fromNoVal(input.qos.limits?.max?.jobs?.active_jobs?.per?.user);

  return {
    name: qos.name ?? '',
    description: qos.description ?? '',
    priority: fromNoVal(qos.priority),
    usageFactor: fromNoVal(qos.usage_factor),
    maxJobs,
    maxCpus: tresCount(max?.tres?.per?.job, 'cpu'),
    maxNodes: tresCount(max?.tres?.per?.job, 'node'),
    maxWallTime: fromNoVal(max?.wall_clock?.per?.job),
  };
}

function optionalNoVal(value: number | undefined): NoVal | undefined {
  return value === undefined ? undefined : toNoVal(value);
}

function withLimits<H extends object, M extends object>(
  head: H,
  max: M
): H | (H & { limits: { max: M } }) {
  return Object.keys(max).length > 0 ? { ...head, limits: { max } } : head;
}

/**
 * Encodes a create, or the present fields of an update, for `name`.
 */
export function encodeQoS(
  name: string,
  fields: QoSCreate | QoSUpdate,
  encoding: QoSEncoding
): V40.QoS | V42.QoS {
  const tres: TresLimits = [];
  if (fields.maxCpus !== undefined) {
    tres.push({ type: 'cpu', count: fields.maxCpus });
  }
  if (fields.maxNodes !== undefined) {
    tres.push({ type: 'node', count: fields.maxNodes });
  }

  const head = {
    name,
    ...compact({
      description: fields.description,
      priority: optionalNoVal(fields.priority),
      usage_factor: optionalNoVal(fields.usageFactor),
    }),
  };
  const perUser = optionalNoVal(fields.maxJobs);
  const wallClock = optionalNoVal(fields.maxWallTime);
  const shared = {
    tres: tres.length > 0 ? { per: { job: tres } } : undefined,
    wall_clock: wallClock === undefined ? undefined : { per: { job: wallClock } },
  };

  if (encoding === 'v0.0.40') {
    const qos: V40.QoS = withLimits(
      head,
      compact({ ...shared, jobs: perUser === undefined ? undefined : { per: { user: perUser } } })
    );
    return qos;
  }
  const qos: V42.QoS = withLimits(
    head,
    compact({
      ...shared,
      jobs: perUser === undefined ? undefined : { active_jobs: { per: { user: perUser } } },
    })
  );
  return qos;
}
