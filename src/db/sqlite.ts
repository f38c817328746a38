import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { logger } from '../lib/logger.js';

export type Db = Database.Database;

export interface DatabaseOptions {
  /** File path, or ':memory:' for a private in-memory database. */
  path: string;
  /** How long a statement waits for a lock before failing with SQLITE_BUSY. */
  busyTimeoutMs: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS clinics (
    id TEXT PRIMARY KEY,
    legal_name TEXT NOT NULL,
    address TEXT,
    city TEXT,
    state TEXT,
    phone TEXT
  );

  CREATE TABLE IF NOT EXISTS doctors (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    clinic_id TEXT NOT NULL REFERENCES clinics(id),
    name TEXT NOT NULL,
    specialty TEXT NOT NULL,
    consultation_price REAL NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS available_slots (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    doctor_id INTEGER NOT NULL REFERENCES doctors(id),
    clinic_id TEXT NOT NULL REFERENCES clinics(id),
    date TEXT NOT NULL,
    time TEXT NOT NULL,
    is_available INTEGER NOT NULL DEFAULT 1 CHECK (is_available IN (0, 1)),
    UNIQUE (doctor_id, date, time)
  );

  CREATE INDEX IF NOT EXISTS idx_slots_open ON available_slots(is_available, date, time);

  CREATE TABLE IF NOT EXISTS patients (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    national_id TEXT NOT NULL UNIQUE,
    name TEXT NOT NULL,
    date_of_birth TEXT NOT NULL,
    email TEXT NOT NULL,
    phone TEXT NOT NULL DEFAULT '',
    insurance_type TEXT NOT NULL DEFAULT 'PRIVATE_PAY'
      CHECK (insurance_type IN ('PRIVATE_PAY', 'HEALTH_PLAN')),
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS appointments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    patient_id INTEGER NOT NULL REFERENCES patients(id),
    doctor_id INTEGER NOT NULL REFERENCES doctors(id),
    clinic_id TEXT NOT NULL REFERENCES clinics(id),
    slot_id INTEGER NOT NULL REFERENCES available_slots(id),
    appointment_datetime TEXT NOT NULL,
    insurance_type TEXT NOT NULL DEFAULT 'PRIVATE_PAY'
      CHECK (insurance_type IN ('PRIVATE_PAY', 'HEALTH_PLAN')),
    insurance_plan_id INTEGER,
    notes TEXT,
    status TEXT NOT NULL DEFAULT 'CONFIRMED'
      CHECK (status IN ('CONFIRMED', 'CANCELLED')),
    created_at TEXT NOT NULL,
    confirmed_at TEXT,
    cancelled_at TEXT,
    cancellation_reason TEXT
  );

  CREATE UNIQUE INDEX IF NOT EXISTS unique_confirmed_slot
  ON appointments(slot_id)
  WHERE status = 'CONFIRMED';

  CREATE INDEX IF NOT EXISTS idx_appointments_patient ON appointments(patient_id);

  CREATE TABLE IF NOT EXISTS idempotency_keys (
    idempotency_key TEXT PRIMARY KEY,
    request_hash TEXT NOT NULL,
    response_status INTEGER NOT NULL,
    response_body TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_idempotency_created ON idempotency_keys(created_at);
`;

/**
 * Open the process-wide connection and make sure the schema exists.
 * The handle is passed explicitly to every component and closed on shutdown.
 */
export function openDatabase(options: DatabaseOptions): Db {
  const inMemory = options.path === ':memory:';
  if (!inMemory) {
    const dataDir = path.dirname(path.resolve(options.path));
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const db = new Database(options.path, { timeout: options.busyTimeoutMs });

  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  // SQLite's LOWER() and LIKE only fold ASCII letters.
  db.function('fold_case', { deterministic: true }, (value: string) => value.toLowerCase());
  db.exec(SCHEMA);

  logger.info(`Database initialized: ${options.path}`);
  return db;
}

export function closeDatabase(db: Db): void {
  if (db.open) {
    db.close();
    logger.info('Database connection closed');
  }
}

export function pingDatabase(db: Db): boolean {
  try {
    db.prepare('SELECT 1').get();
    return true;
  } catch (error) {
    logger.error('Database health check failed', { error });
    return false;
  }
}
