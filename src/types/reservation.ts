/**
 * Reservation types.
 */

import type { EpochSeconds, ListOptions } from './common.js';

/**
 * Advance reservation
 */
export interface Reservation {
  name: string;
  startTime: EpochSeconds;
  endTime: EpochSeconds;
  nodeCount: number;
  nodeList: string;
  users: string[];
  accounts: string[];
  partition: string;
  flags: string[];
}

/**
 * Reservation creation. Start and end time are required together.
 */
export interface ReservationCreate {
  name: string;
  startTime: EpochSeconds;
  endTime: EpochSeconds;
  nodeCount?: number;
  nodeList?: string;
  users?: string[];
  accounts?: string[];
  partition?: string;
  flags?: string[];
}

/**
 * Reservation update; absent fields are left untouched.
 */
export interface ReservationUpdate {
  startTime?: EpochSeconds;
  endTime?: EpochSeconds;
  nodeCount?: number;
  nodeList?: string;
  users?: string[];
  accounts?: string[];
  partition?: string;
  flags?: string[];
}

/**
 * Reservation list filters
 */
export interface ListReservationsOptions extends ListOptions {
  names?: string[];
  users?: string[];
  accounts?: string[];
  partition?: string;
}
