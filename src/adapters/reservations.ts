/**
 * Reservation adapter.
 * @module adapters/reservations
 */

import { SlurmError } from '../errors/index.js';
import { BaseManager, intersects, matchesAny, matchesOne, paginate } from '../managers/base.js';
import type { AdapterContext, EntityDecoder, Operation } from '../managers/base.js';
import type { ReservationManager } from '../managers/interfaces.js';
import type {
  ListReservationsOptions,
  ListResult,
  Reservation,
  ReservationCreate,
  ReservationUpdate,
} from '../types/index.js';
import { encodeReservation } from './converters/reservation.js';

function matchesReservation(reservation: Reservation, options: ListReservationsOptions): boolean {
  return (
    matchesAny(reservation.name, options.names) &&
    intersects(reservation.users, options.users) &&
    intersects(reservation.accounts, options.accounts) &&
    matchesOne(reservation.partition, options.partition)
  );
}

export class ReservationAdapter extends BaseManager implements ReservationManager {
  constructor(
    context: AdapterContext,
    private readonly decode: EntityDecoder<Reservation>,
    operations: readonly Operation[]
  ) {
    super('reservation', context, operations);
  }

  async list(
    signal: AbortSignal,
    options: ListReservationsOptions = {}
  ): Promise<ListResult<Reservation>> {
    const client = this.begin(signal, 'list');
    this.validateListOptions(options);

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurm',
      path: '/reservations',
    });
    const reservations = this.decodeEntries(data, 'reservations', this.decode);
    return paginate(
      reservations.filter((reservation) => matchesReservation(reservation, options)),
      options
    );
  }

  async get(signal: AbortSignal, name: string): Promise<Reservation> {
    const client = this.begin(signal, 'get');
    this.validateResourceName(name, 'reservation name');

    const data = await this.call(client, signal, {
      method: 'GET',
      api: 'slurm',
      path: `/reservation/${encodeURIComponent(name)}`,
    });
    return this.first(this.decodeEntries(data, 'reservations', this.decode), name);
  }

  async create(signal: AbortSignal, reservation: ReservationCreate): Promise<void> {
    const client = this.begin(signal, 'create');
    this.validateResourceName(reservation.name, 'reservation name');
    if (reservation.startTime === undefined || reservation.endTime === undefined) {
      throw SlurmError.validation('reservation start time and end time are required');
    }
    this.validateWindow(reservation.startTime, reservation.endTime);

    await this.call(client, signal, {
      method: 'POST',
      api: 'slurm',
      path: '/reservation',
      body: encodeReservation(reservation.name, reservation),
    });
  }

  async update(signal: AbortSignal, name: string, update: ReservationUpdate): Promise<void> {
    const client = this.begin(signal, 'update');
    this.validateResourceName(name, 'reservation name');
    this.requireUpdateFields(update);
    if (update.startTime !== undefined && update.endTime !== undefined) {
      this.validateWindow(update.startTime, update.endTime);
    }

    await this.call(client, signal, {
      method: 'POST',
      api: 'slurm',
      path: '/reservation',
      body: encodeReservation(name, update),
    });
  }

  async delete(signal: AbortSignal, name: string): Promise<void> {
    const client = this.begin(signal, 'delete');
    this.validateResourceName(name, 'reservation name');

    await this.call(client, signal, {
      method: 'DELETE',
      api: 'slurm',
      path: `/reservation/${encodeURIComponent(name)}`,
    });
  }

  private validateWindow(startTime: number, endTime: number): void {
    if (endTime <= startTime) {
      throw SlurmError.validation('reservation end time must be after start time');
    }
  }
}
