export type InsuranceType = 'PRIVATE_PAY' | 'HEALTH_PLAN';

export type AppointmentStatus = 'CONFIRMED' | 'CANCELLED';

export type SlotAvailability = 'AVAILABLE' | 'HELD';

export interface Patient {
  id: number;
  national_id: string;
  name: string;
  date_of_birth: string;
  email: string;
  phone: string;
  insurance_type: InsuranceType;
  created_at: string;
}

export interface Clinic {
  id: string;
  legal_name: string;
  address: string | null;
  city: string | null;
  state: string | null;
  phone: string | null;
}

export interface Doctor {
  id: number;
  clinic_id: string;
  name: string;
  specialty: string;
  consultation_price: number;
}

export interface Slot {
  id: number;
  doctorId: number;
  clinicId: string;
  date: string;
  time: string;
  availability: SlotAvailability;
}

export interface Appointment {
  id: number;
  patient_id: number;
  doctor_id: number;
  clinic_id: string;
  slot_id: number;
  appointment_datetime: string;
  insurance_type: InsuranceType;
  insurance_plan_id: number | null;
  notes: string | null;
  status: AppointmentStatus;
  created_at: string;
  confirmed_at: string | null;
  cancelled_at: string | null;
  cancellation_reason: string | null;
}

export interface IdempotencyRecord {
  idempotency_key: string;
  request_hash: string;
  response_status: number;
  response_body: string;
  created_at: string;
}

/** Profile fields used only when the identity key has never been seen. */
export interface PatientProfile {
  name: string;
  dateOfBirth: string;
  email?: string;
  phone?: string;
  insuranceType?: string;
}

export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  SLOT_UNAVAILABLE = 'SLOT_UNAVAILABLE',
  NOT_FOUND = 'NOT_FOUND',
  ALREADY_CANCELLED = 'ALREADY_CANCELLED',
  STORAGE_ERROR = 'STORAGE_ERROR',
  MISSING_IDEMPOTENCY_KEY = 'MISSING_IDEMPOTENCY_KEY',
  IDEMPOTENCY_KEY_MISMATCH = 'IDEMPOTENCY_KEY_MISMATCH',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface ErrorBody {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type BookingResult<T> =
  | { success: true; data: T }
  | { success: false; error: ErrorBody };

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ErrorBody;
}

export interface BookingConfirmation {
  appointmentId: number;
  patientId: number;
  slotId: number;
  appointmentDatetime: string;
  status: AppointmentStatus;
}

export interface CancellationReceipt {
  appointmentId: number;
  slotId: number;
  status: AppointmentStatus;
  cancelledAt: string;
}

export interface AppointmentDetails {
  id: number;
  status: AppointmentStatus;
  appointmentDatetime: string;
  patient: {
    id: number;
    name: string;
    identityKey: string;
    email: string;
    phone: string;
  };
  doctor: {
    id: number;
    name: string;
    specialty: string;
    consultationPrice: number;
  };
  clinic: {
    id: string;
    name: string;
    phone: string | null;
    address: string | null;
    city: string | null;
  };
  slot: {
    id: number;
    date: string;
    time: string;
  };
  insuranceType: InsuranceType;
  insurancePlanId: number | null;
  notes: string | null;
  createdAt: string;
  confirmedAt: string | null;
  cancelledAt: string | null;
  cancellationReason: string | null;
}

export interface AvailabilityEntry {
  clinic: {
    id: string;
    name: string;
    address: string | null;
    city: string | null;
    state: string | null;
    phone: string | null;
  };
  doctor: {
    id: number;
    name: string;
    specialty: string;
  };
  slot: {
    id: number;
    date: string;
    time: string;
  };
  price: number;
}
