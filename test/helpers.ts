import { openDatabase, type Db } from '../src/db/sqlite.js';
import type { BookingRequest } from '../src/validation/booking.schema.js';

/** 2026-10-18 10:00 local time. */
export const FIXED_NOW = new Date(2026, 9, 18, 10, 0, 0);
export const fixedClock = (): Date => FIXED_NOW;

export function createTestDatabase(): Db {
  const db = openDatabase({ path: ':memory:', busyTimeoutMs: 50 });
  seedFixture(db);
  return db;
}

/**
 * Two clinics, three doctors and a handful of slots with fixed ids.
 * Slot 106 is in the past and 107 is already held.
 */
export function seedFixture(db: Db): void {
  const clinic = db.prepare(
    'INSERT INTO clinics (id, legal_name, address, city, state, phone) VALUES (?, ?, ?, ?, ?, ?)'
  );
  clinic.run('C1', 'Centro Medico Vila Nova', 'Rua das Acacias, 120', 'Sao Paulo', 'SP', '+55 11 3000-1000');
  clinic.run('C2', 'Clinica Horizonte', 'Avenida Central, 455', 'Campinas', 'SP', '+55 19 3200-2000');

  const doctor = db.prepare(
    'INSERT INTO doctors (id, clinic_id, name, specialty, consultation_price) VALUES (?, ?, ?, ?, ?)'
  );
  doctor.run(7, 'C1', 'Dr. Ana Ribeiro', 'Cardiology', 350);
  doctor.run(8, 'C2', 'Dr. Paulo Mendes', 'Dermatology', 280);
  doctor.run(9, 'C2', 'Dr. Lucia Prado', 'Pediatric Cardiology', 400);

  const slot = db.prepare(
    'INSERT INTO available_slots (id, doctor_id, clinic_id, date, time, is_available) VALUES (?, ?, ?, ?, ?, ?)'
  );
  slot.run(101, 7, 'C1', '2030-05-06', '09:00', 1);
  slot.run(102, 7, 'C1', '2030-05-06', '09:30', 1);
  slot.run(103, 7, 'C1', '2030-05-07', '08:00', 1);
  slot.run(104, 8, 'C2', '2030-05-06', '14:00', 1);
  slot.run(105, 9, 'C2', '2030-05-06', '08:30', 1);
  slot.run(106, 7, 'C1', '2020-01-10', '09:00', 1);
  slot.run(107, 7, 'C1', '2030-05-08', '10:00', 0);
}

export function mariaBooking(overrides: Partial<BookingRequest> = {}): BookingRequest {
  return {
    patient: {
      name: 'Maria Silva',
      identityKey: '12345678900',
      dateOfBirth: '1990-03-15',
    },
    doctorId: 7,
    slotId: 101,
    clinicId: 'C1',
    ...overrides,
  };
}

export function count(db: Db, sql: string, ...params: unknown[]): number {
  const row = db.prepare<unknown[], { total: number }>(sql).get(...params);
  return row ? row.total : 0;
}

export function slotFlag(db: Db, slotId: number): number | undefined {
  const row = db
    .prepare<[number], { is_available: number }>('SELECT is_available FROM available_slots WHERE id = ?')
    .get(slotId);
  return row?.is_available;
}
