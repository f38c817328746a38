import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { logger } from '../lib/logger.js';
import { toIsoDate } from '../validation/patient.js';
import type { Db } from './sqlite.js';

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM');

const scheduleSchema = z
  .object({
    startTime: clockTime,
    endTime: clockTime,
    slotDurationMinutes: z.number().int().positive().max(240),
  })
  .refine((schedule) => schedule.startTime < schedule.endTime, {
    message: 'startTime must be before endTime',
  });

const doctorSchema = z.object({
  name: z.string().trim().min(1),
  specialty: z.string().trim().min(1),
  consultationPrice: z.number().nonnegative(),
  schedule: scheduleSchema,
});

const clinicSchema = z.object({
  id: z.string().trim().min(1).optional(),
  legalName: z.string().trim().min(1),
  address: z.string().optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  phone: z.string().optional(),
  doctors: z.array(doctorSchema),
});

export const catalogSchema = z.object({
  days: z.number().int().positive().max(90).default(14),
  clinics: z.array(clinicSchema).min(1),
});

export type Catalog = z.infer<typeof catalogSchema>;
export type DoctorSchedule = z.infer<typeof scheduleSchema>;

export interface SeedSummary {
  clinics: number;
  doctors: number;
  slots: number;
}

function minutesOf(time: string): number {
  const [hours, minutes] = time.split(':').map(Number);
  return hours * 60 + minutes;
}

function formatMinutes(total: number): string {
  const hours = Math.floor(total / 60);
  const minutes = total % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Start times of every slot that fits entirely inside the schedule.
 * Pure function.
 */
export function generateSlotTimes(schedule: DoctorSchedule): string[] {
  const times: string[] = [];
  const end = minutesOf(schedule.endTime);
  for (
    let start = minutesOf(schedule.startTime);
    start + schedule.slotDurationMinutes <= end;
    start += schedule.slotDurationMinutes
  ) {
    times.push(formatMinutes(start));
  }
  return times;
}

/** Weekdays from `from` (inclusive) over the next `days` calendar days. */
export function generateSlotDates(from: Date, days: number): string[] {
  const dates: string[] = [];
  const cursor = new Date(from.getFullYear(), from.getMonth(), from.getDate());
  for (let i = 0; i < days; i++) {
    const weekday = cursor.getDay();
    if (weekday !== 0 && weekday !== 6) {
      dates.push(toIsoDate(cursor));
    }
    cursor.setDate(cursor.getDate() + 1);
  }
  return dates;
}

/**
 * Insert the catalog and its slots in a single transaction.
 * Re-running it refreshes clinic and doctor fields and only adds missing slots.
 */
export function seedCatalog(db: Db, catalog: Catalog, from: Date = new Date()): SeedSummary {
  const upsertClinic = db.prepare<[string, string, string | null, string | null, string | null, string | null]>(`
    INSERT INTO clinics (id, legal_name, address, city, state, phone)
    VALUES (?, ?, ?, ?, ?, ?)
    ON CONFLICT(id) DO UPDATE SET
      legal_name = excluded.legal_name,
      address = excluded.address,
      city = excluded.city,
      state = excluded.state,
      phone = excluded.phone
  `);
  const findClinicByName = db.prepare<[string], { id: string }>(`
    SELECT id FROM clinics WHERE legal_name = ?
  `);
  const findDoctor = db.prepare<[string, string], { id: number }>(`
    SELECT id FROM doctors WHERE clinic_id = ? AND name = ?
  `);
  const updateDoctor = db.prepare<[string, number, number]>(`
    UPDATE doctors SET specialty = ?, consultation_price = ? WHERE id = ?
  `);
  const insertDoctor = db.prepare<[string, string, string, number]>(`
    INSERT INTO doctors (clinic_id, name, specialty, consultation_price)
    VALUES (?, ?, ?, ?)
  `);
  const insertSlot = db.prepare<[number, string, string, string]>(`
    INSERT OR IGNORE INTO available_slots (doctor_id, clinic_id, date, time, is_available)
    VALUES (?, ?, ?, ?, 1)
  `);

  const dates = generateSlotDates(from, catalog.days);

  const summary = db.transaction((): SeedSummary => {
    const totals: SeedSummary = { clinics: 0, doctors: 0, slots: 0 };

    for (const clinic of catalog.clinics) {
      const clinicId = clinic.id ?? findClinicByName.get(clinic.legalName)?.id ?? uuidv4();
      upsertClinic.run(
        clinicId,
        clinic.legalName,
        clinic.address ?? null,
        clinic.city ?? null,
        clinic.state ?? null,
        clinic.phone ?? null
      );
      totals.clinics++;

      for (const doctor of clinic.doctors) {
        const existing = findDoctor.get(clinicId, doctor.name);
        let doctorId: number;
        if (existing) {
          doctorId = existing.id;
          updateDoctor.run(doctor.specialty, doctor.consultationPrice, doctorId);
        } else {
          doctorId = Number(
            insertDoctor.run(clinicId, doctor.name, doctor.specialty, doctor.consultationPrice)
              .lastInsertRowid
          );
        }
        totals.doctors++;

        const times = generateSlotTimes(doctor.schedule);
        for (const date of dates) {
          for (const time of times) {
            totals.slots += insertSlot.run(doctorId, clinicId, date, time).changes;
          }
        }
      }
    }

    return totals;
  })();

  logger.info('Catalog seeded', { ...summary });
  return summary;
}
