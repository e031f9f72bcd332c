/**
 * Reservation conversion.
 * @module adapters/converters/reservation
 */

import type { Reservation, ReservationCreate, ReservationUpdate } from '../../types/index.js';
import { compact } from '../../managers/base.js';
import { fromNoVal, splitList, toNoVal } from '../../wire/common.js';
import type * as V40 from '../../wire/v0_0_40.js';
import type * as V42 from '../../wire/v0_0_42.js';

/**
 * A wire reservation tagged with the version that introduced its shape.
 */
export type ReservationWire =
  | { version: 'v0.0.40'; reservation: V40.Reservation }
  | { version: 'v0.0.42'; reservation: V42.Reservation };

export function convertReservation(input: ReservationWire): Reservation {
  const { reservation } = input;
  const times =
    input.version === 'v0.0.40'
      ? { startTime: input.reservation.start_time ?? 0, endTime: input.reservation.end_time ?? 0 }
      : {
          startTime: fromNoVal(input.reservation.start_time),
          endTime: fromNoVal(input.reservation.end_time),
        };

  return {
    name: reservation.name ?? '',
    ...times,
    nodeCount: reservation.node_count ?? 0,
    nodeList: reservation.node_list ?? '',
    users: splitList(reservation.users),
    accounts: splitList(reservation.accounts),
    partition: reservation.partition ?? '',
    flags: [...(reservation.flags ?? [])],
  };
}

function joinList(values: string[] | undefined): string | undefined {
  return values === undefined ? undefined : values.join(',');
}

/**
 * Encodes a create, or the present fields of an update, for `name`.
 */
export function encodeReservation(
  name: string,
  fields: ReservationCreate | ReservationUpdate
): V42.ReservationDescription {
  return {
    name,
    ...compact({
      start_time: fields.startTime === undefined ? undefined : toNoVal(fields.startTime),
      end_time: fields.endTime === undefined ? undefined : toNoVal(fields.endTime),
      node_count: fields.nodeCount,
      node_list: fields.nodeList,
      users: joinList(fields.users),
      accounts: joinList(fields.accounts),
      partition: fields.partition,
      flags: fields.flags,
    }),
  };
}
