import type { Db } from '../db/sqlite.js';
import { BookingError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { ErrorCode, type Patient, type PatientProfile } from '../types/index.js';
import {
  normalizeIdentityKey,
  normalizeInsuranceType,
  placeholderEmail,
} from '../validation/patient.js';

function prepareStatements(db: Db) {
  return {
    findIdByKey: db.prepare<[string], { id: number }>(`
      SELECT id FROM patients WHERE national_id = ?
    `),
    findByKey: db.prepare<[string], Patient>(`
      SELECT * FROM patients WHERE national_id = ?
    `),
    insertIfAbsent: db.prepare<
      [string, string, string, string, string, string, string],
      { id: number }
    >(`
      INSERT INTO patients (national_id, name, date_of_birth, email, phone, insurance_type, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(national_id) DO NOTHING
      RETURNING id
    `),
  };
}

/**
 * Maps a national id to exactly one patient row.
 * The first profile seen for a key wins; later profiles are never merged.
 */
export class IdentityResolver {
  private readonly statements: ReturnType<typeof prepareStatements>;

  constructor(
    db: Db,
    private readonly now: () => Date = () => new Date()
  ) {
    this.statements = prepareStatements(db);
  }

  /** A malformed key is a miss, not an error. */
  findByIdentityKey(identityKey: string): Patient | undefined {
    const key = normalizeIdentityKey(identityKey);
    if (!key) {
      return undefined;
    }
    return this.statements.findByKey.get(key);
  }

  resolve(identityKey: string, profile: PatientProfile): number {
    const key = normalizeIdentityKey(identityKey);
    if (!key) {
      throw new BookingError(ErrorCode.VALIDATION_ERROR, 'Identity key is malformed', {
        field: 'patient.identityKey',
      });
    }

    const existing = this.statements.findIdByKey.get(key);
    if (existing) {
      logger.debug('Existing patient found', { patientId: existing.id });
      return existing.id;
    }

    const inserted = this.statements.insertIfAbsent.get(
      key,
      profile.name,
      profile.dateOfBirth,
      profile.email || placeholderEmail(key),
      profile.phone || '',
      normalizeInsuranceType(profile.insuranceType),
      this.now().toISOString()
    );
    if (inserted) {
      logger.info('Patient created', { patientId: inserted.id });
      return inserted.id;
    }

    // Another writer inserted the same key between our read and write.
    const winner = this.statements.findIdByKey.get(key);
    if (!winner) {
      throw new BookingError(ErrorCode.STORAGE_ERROR, 'Patient row vanished after insert conflict');
    }
    return winner.id;
  }
}
