import type { Db } from '../db/sqlite.js';
import { AppointmentReader } from './appointment-reader.js';
import { AvailabilityService, DEFAULT_PAGE_SIZE } from './availability.service.js';
import { BookingEngine } from './booking.service.js';
import { IdempotencyService } from './idempotency.service.js';

export interface Services {
  db: Db;
  engine: BookingEngine;
  reader: AppointmentReader;
  availability: AvailabilityService;
  idempotency: IdempotencyService;
}

export interface ServiceOptions {
  searchPageSize?: number;
  idempotencyTtlHours?: number;
  now?: () => Date;
}

/** Wire every component onto the one connection handle. */
export function createServices(db: Db, options: ServiceOptions = {}): Services {
  const now = options.now ?? (() => new Date());
  return {
    db,
    engine: new BookingEngine(db, { now }),
    reader: new AppointmentReader(db),
    availability: new AvailabilityService(db, options.searchPageSize ?? DEFAULT_PAGE_SIZE, now),
    idempotency: new IdempotencyService(db, { ttlHours: options.idempotencyTtlHours, now }),
  };
}
