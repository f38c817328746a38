import type { Db } from '../db/sqlite.js';
import type { Slot } from '../types/index.js';

interface SlotRow {
  id: number;
  doctor_id: number;
  clinic_id: string;
  date: string;
  time: string;
  is_available: number;
}

function prepareStatements(db: Db) {
  return {
    claim: db.prepare<[number]>(`
      UPDATE available_slots SET is_available = 0
      WHERE id = ? AND is_available = 1
    `),
    release: db.prepare<[number]>(`
      UPDATE available_slots SET is_available = 1
      WHERE id = ?
    `),
    findById: db.prepare<[number], SlotRow>(`
      SELECT id, doctor_id, clinic_id, date, time, is_available
      FROM available_slots WHERE id = ?
    `),
  };
}

/**
 * Source of truth for which slots can still be booked.
 * Claim and release are single conditional statements; they do not open a
 * transaction themselves and join whatever unit of work is active.
 */
export class SlotLedger {
  private readonly statements: ReturnType<typeof prepareStatements>;

  constructor(db: Db) {
    this.statements = prepareStatements(db);
  }

  /** AVAILABLE -> HELD. False when the slot is already held or does not exist. */
  claim(slotId: number): boolean {
    return this.statements.claim.run(slotId).changes === 1;
  }

  /** HELD -> AVAILABLE. Releasing an available slot changes nothing. */
  release(slotId: number): void {
    this.statements.release.run(slotId);
  }

  findById(slotId: number): Slot | undefined {
    const row = this.statements.findById.get(slotId);
    if (!row) {
      return undefined;
    }
    return {
      id: row.id,
      doctorId: row.doctor_id,
      clinicId: row.clinic_id,
      date: row.date,
      time: row.time,
      availability: row.is_available === 1 ? 'AVAILABLE' : 'HELD',
    };
  }
}
