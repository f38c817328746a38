import type { Db } from '../db/sqlite.js';
import { UnitOfWork } from '../db/unit-of-work.js';
import {
  BookingError,
  failure,
  isUniqueViolation,
  sqliteErrorCode,
  toErrorBody,
  validationFailure,
} from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import {
  ErrorCode,
  type AppointmentStatus,
  type BookingConfirmation,
  type BookingResult,
  type CancellationReceipt,
  type InsuranceType,
} from '../types/index.js';
import {
  bookingRequestSchema,
  cancelRequestSchema,
  describeIssues,
  parseAppointmentId,
  type BookingRequest,
} from '../validation/booking.schema.js';
import { IdentityResolver } from './identity-resolver.js';
import { SlotLedger } from './slot-ledger.js';

export interface BookingEngineOptions {
  now?: () => Date;
  resolver?: IdentityResolver;
  ledger?: SlotLedger;
}

function prepareStatements(db: Db) {
  return {
    insertAppointment: db.prepare<
      [number, number, string, number, string, InsuranceType, number | null, string | null, string, string]
    >(`
      INSERT INTO appointments
        (patient_id, doctor_id, clinic_id, slot_id, appointment_datetime,
         insurance_type, insurance_plan_id, notes, status, created_at, confirmed_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, 'CONFIRMED', ?, ?)
    `),
    findForCancel: db.prepare<[number], { slot_id: number; status: AppointmentStatus }>(`
      SELECT slot_id, status FROM appointments WHERE id = ?
    `),
    cancelAppointment: db.prepare<[string, string | null, number]>(`
      UPDATE appointments
      SET status = 'CANCELLED', cancelled_at = ?, cancellation_reason = ?
      WHERE id = ? AND status = 'CONFIRMED'
    `),
  };
}

/**
 * Books and cancels appointments. Each call is one unit of work:
 * either every write lands or none does, and failures come back as
 * structured results instead of thrown errors.
 */
export class BookingEngine {
  private readonly statements: ReturnType<typeof prepareStatements>;
  private readonly unitOfWork: UnitOfWork;
  private readonly resolver: IdentityResolver;
  private readonly ledger: SlotLedger;
  private readonly now: () => Date;

  constructor(db: Db, options: BookingEngineOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.statements = prepareStatements(db);
    this.unitOfWork = new UnitOfWork(db);
    this.resolver = options.resolver ?? new IdentityResolver(db, this.now);
    this.ledger = options.ledger ?? new SlotLedger(db);
  }

  async book(request: BookingRequest): Promise<BookingResult<BookingConfirmation>> {
    const parsed = bookingRequestSchema.safeParse(request);
    if (!parsed.success) {
      return validationFailure('Booking request is invalid', describeIssues(parsed.error));
    }
    const booking = parsed.data;

    try {
      const confirmation = this.unitOfWork.run((): BookingConfirmation => {
        const patientId = this.resolver.resolve(booking.patient.identityKey, {
          name: booking.patient.name,
          dateOfBirth: booking.patient.dateOfBirth,
          email: booking.patient.email,
          phone: booking.patient.phone,
          insuranceType: booking.insurance.type,
        });

        if (!this.ledger.claim(booking.slotId)) {
          throw new BookingError(ErrorCode.SLOT_UNAVAILABLE, 'This slot is no longer available', {
            slotId: booking.slotId,
          });
        }

        const slot = this.ledger.findById(booking.slotId);
        if (!slot || slot.doctorId !== booking.doctorId || slot.clinicId !== booking.clinicId) {
          throw new BookingError(
            ErrorCode.VALIDATION_ERROR,
            'Slot does not belong to the given doctor and clinic',
            { slotId: booking.slotId, doctorId: booking.doctorId, clinicId: booking.clinicId }
          );
        }

        const appointmentDatetime = `${slot.date}T${slot.time}`;
        const createdAt = this.now().toISOString();
        const inserted = this.statements.insertAppointment.run(
          patientId,
          booking.doctorId,
          booking.clinicId,
          booking.slotId,
          appointmentDatetime,
          booking.insurance.type,
          booking.insurance.planId,
          booking.notes ?? null,
          createdAt,
          createdAt
        );

        return {
          appointmentId: Number(inserted.lastInsertRowid),
          patientId,
          slotId: booking.slotId,
          appointmentDatetime,
          status: 'CONFIRMED',
        };
      });

      logger.info('Appointment booked', {
        appointmentId: confirmation.appointmentId,
        slotId: confirmation.slotId,
      });
      return { success: true, data: confirmation };
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        // The partial unique index on confirmed slots caught a second booking.
        return failure(
          new BookingError(ErrorCode.SLOT_UNAVAILABLE, 'This slot is no longer available', {
            slotId: booking.slotId,
          }).toBody()
        );
      }
      return this.fail('Booking', error);
    }
  }

  async cancel(
    appointmentId: number,
    reason?: string | null
  ): Promise<BookingResult<CancellationReceipt>> {
    const id = parseAppointmentId(appointmentId);
    if (id === null) {
      return validationFailure('Appointment id must be a positive integer', {
        appointmentId,
      });
    }
    const parsedReason = cancelRequestSchema.safeParse({ reason });
    if (!parsedReason.success) {
      return validationFailure('Cancellation reason is invalid', describeIssues(parsedReason.error));
    }

    try {
      const receipt = this.unitOfWork.run((): CancellationReceipt => {
        const appointment = this.statements.findForCancel.get(id);
        if (!appointment) {
          throw new BookingError(ErrorCode.NOT_FOUND, 'Appointment not found', { appointmentId: id });
        }
        if (appointment.status === 'CANCELLED') {
          throw new BookingError(ErrorCode.ALREADY_CANCELLED, 'Appointment is already cancelled', {
            appointmentId: id,
          });
        }

        const cancelledAt = this.now().toISOString();
        const updated = this.statements.cancelAppointment.run(
          cancelledAt,
          parsedReason.data.reason,
          id
        );
        if (updated.changes === 0) {
          throw new BookingError(ErrorCode.ALREADY_CANCELLED, 'Appointment is already cancelled', {
            appointmentId: id,
          });
        }

        this.ledger.release(appointment.slot_id);
        return { appointmentId: id, slotId: appointment.slot_id, status: 'CANCELLED', cancelledAt };
      });

      logger.info('Appointment cancelled', { appointmentId: id, slotId: receipt.slotId });
      return { success: true, data: receipt };
    } catch (error: unknown) {
      return this.fail('Cancellation', error);
    }
  }

  private fail<T>(operation: string, error: unknown): BookingResult<T> {
    const body = toErrorBody(error);
    if (body.code === ErrorCode.STORAGE_ERROR) {
      logger.error(`${operation} rolled back`, { cause: sqliteErrorCode(error), error });
    } else {
      logger.warn(`${operation} rejected`, { code: body.code, details: body.details });
    }
    return failure(body);
  }
}
