import type { Db } from '../db/sqlite.js';
import { failure, toErrorBody, validationFailure } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { AvailabilityEntry, BookingResult } from '../types/index.js';
import { toIsoDate } from '../validation/patient.js';

export const DEFAULT_PAGE_SIZE = 20;

interface AvailabilityRow {
  clinic_id: string;
  clinic_name: string;
  clinic_address: string | null;
  city: string | null;
  state: string | null;
  clinic_phone: string | null;
  doctor_id: number;
  doctor_name: string;
  specialty: string;
  consultation_price: number;
  slot_id: number;
  slot_date: string;
  slot_time: string;
}

function prepareSearch(db: Db) {
  return db.prepare<{ pattern: string; today: string; limit: number }, AvailabilityRow>(`
    SELECT
      c.id AS clinic_id,
      c.legal_name AS clinic_name,
      c.address AS clinic_address,
      c.city,
      c.state,
      c.phone AS clinic_phone,
      d.id AS doctor_id,
      d.name AS doctor_name,
      d.specialty,
      d.consultation_price,
      s.id AS slot_id,
      s.date AS slot_date,
      s.time AS slot_time
    FROM clinics c
    JOIN doctors d ON c.id = d.clinic_id
    JOIN available_slots s ON d.id = s.doctor_id AND c.id = s.clinic_id
    WHERE fold_case(TRIM(d.specialty)) LIKE @pattern ESCAPE '\\'
      AND s.is_available = 1
      AND s.date >= @today
    ORDER BY s.date ASC, s.time ASC, s.id ASC
    LIMIT @limit
  `);
}

function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export class AvailabilityService {
  private readonly searchStatement: ReturnType<typeof prepareSearch>;

  constructor(
    db: Db,
    private readonly pageSize: number = DEFAULT_PAGE_SIZE,
    private readonly now: () => Date = () => new Date()
  ) {
    this.searchStatement = prepareSearch(db);
  }

  /**
   * Open slots whose doctor's specialty contains the text, earliest first.
   */
  async search(specialtyText: string): Promise<BookingResult<AvailabilityEntry[]>> {
    const needle = specialtyText.trim().toLowerCase();
    if (!needle) {
      return validationFailure('Specialty must not be empty', { field: 'specialty' });
    }

    try {
      const rows = this.searchStatement.all({
        pattern: `%${escapeLike(needle)}%`,
        today: toIsoDate(this.now()),
        limit: this.pageSize,
      });

      if (rows.length === 0) {
        logger.warn('No availability found', { specialty: needle });
      } else {
        logger.debug('Availability search', { specialty: needle, results: rows.length });
      }

      return {
        success: true,
        data: rows.map((row) => ({
          clinic: {
            id: row.clinic_id,
            name: row.clinic_name,
            address: row.clinic_address,
            city: row.city,
            state: row.state,
            phone: row.clinic_phone,
          },
          doctor: {
            id: row.doctor_id,
            name: row.doctor_name,
            specialty: row.specialty,
          },
          slot: {
            id: row.slot_id,
            date: row.slot_date,
            time: row.slot_time,
          },
          price: row.consultation_price,
        })),
      };
    } catch (error: unknown) {
      logger.error('Availability search failed', { specialty: needle, error });
      return failure(toErrorBody(error));
    }
  }
}
