import type { Db } from '../db/sqlite.js';
import { failure, toErrorBody, validationFailure } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import {
  ErrorCode,
  type AppointmentDetails,
  type AppointmentStatus,
  type BookingResult,
  type InsuranceType,
} from '../types/index.js';
import { parseAppointmentId } from '../validation/booking.schema.js';

interface AppointmentDetailsRow {
  id: number;
  status: AppointmentStatus;
  appointment_datetime: string;
  patient_id: number;
  patient_name: string;
  patient_identity_key: string;
  patient_email: string;
  patient_phone: string;
  doctor_id: number;
  doctor_name: string;
  specialty: string;
  consultation_price: number;
  clinic_id: string;
  clinic_name: string;
  clinic_phone: string | null;
  clinic_address: string | null;
  clinic_city: string | null;
  slot_id: number;
  slot_date: string;
  slot_time: string;
  insurance_type: InsuranceType;
  insurance_plan_id: number | null;
  notes: string | null;
  created_at: string;
  confirmed_at: string | null;
  cancelled_at: string | null;
  cancellation_reason: string | null;
}

function toDetails(row: AppointmentDetailsRow): AppointmentDetails {
  return {
    id: row.id,
    status: row.status,
    appointmentDatetime: row.appointment_datetime,
    patient: {
      id: row.patient_id,
      name: row.patient_name,
      identityKey: row.patient_identity_key,
      email: row.patient_email,
      phone: row.patient_phone,
    },
    doctor: {
      id: row.doctor_id,
      name: row.doctor_name,
      specialty: row.specialty,
      consultationPrice: row.consultation_price,
    },
    clinic: {
      id: row.clinic_id,
      name: row.clinic_name,
      phone: row.clinic_phone,
      address: row.clinic_address,
      city: row.clinic_city,
    },
    slot: {
      id: row.slot_id,
      date: row.slot_date,
      time: row.slot_time,
    },
    insuranceType: row.insurance_type,
    insurancePlanId: row.insurance_plan_id,
    notes: row.notes,
    createdAt: row.created_at,
    confirmedAt: row.confirmed_at,
    cancelledAt: row.cancelled_at,
    cancellationReason: row.cancellation_reason,
  };
}

function prepareFindById(db: Db) {
  return db.prepare<[number], AppointmentDetailsRow>(`
    SELECT
      a.id,
      a.status,
      a.appointment_datetime,
      p.id AS patient_id,
      p.name AS patient_name,
      p.national_id AS patient_identity_key,
      p.email AS patient_email,
      p.phone AS patient_phone,
      d.id AS doctor_id,
      d.name AS doctor_name,
      d.specialty,
      d.consultation_price,
      c.id AS clinic_id,
      c.legal_name AS clinic_name,
      c.phone AS clinic_phone,
      c.address AS clinic_address,
      c.city AS clinic_city,
      s.id AS slot_id,
      s.date AS slot_date,
      s.time AS slot_time,
      a.insurance_type,
      a.insurance_plan_id,
      a.notes,
      a.created_at,
      a.confirmed_at,
      a.cancelled_at,
      a.cancellation_reason
    FROM appointments a
    JOIN patients p ON a.patient_id = p.id
    JOIN doctors d ON a.doctor_id = d.id
    JOIN clinics c ON a.clinic_id = c.id
    JOIN available_slots s ON a.slot_id = s.id
    WHERE a.id = ?
  `);
}

/** Read-only projection of an appointment for presentation. */
export class AppointmentReader {
  private readonly findById: ReturnType<typeof prepareFindById>;

  constructor(db: Db) {
    this.findById = prepareFindById(db);
  }

  async getById(appointmentId: number): Promise<BookingResult<AppointmentDetails>> {
    const id = parseAppointmentId(appointmentId);
    if (id === null) {
      return validationFailure('Appointment id must be a positive integer', { appointmentId });
    }

    try {
      const row = this.findById.get(id);
      if (!row) {
        return failure({
          code: ErrorCode.NOT_FOUND,
          message: 'Appointment not found',
          details: { appointmentId: id },
        });
      }
      return { success: true, data: toDetails(row) };
    } catch (error: unknown) {
      logger.error('Appointment lookup failed', { appointmentId: id, error });
      return failure(toErrorBody(error));
    }
  }
}
