import { z } from 'zod';
import {
  IDENTITY_KEY_LENGTH,
  normalizeIdentityKey,
  normalizeInsuranceType,
  parseDateOfBirth,
} from './patient.js';

/** A JSON number or a string of decimal digits. Nothing else is coerced. */
export const positiveId = z
  .union([z.number(), z.string().trim().regex(/^\d+$/, 'must be a number')], {
    errorMap: () => ({ message: 'must be a number' }),
  })
  .transform((value) => Number(value))
  .pipe(
    z
      .number()
      .int('must be an integer')
      .positive('must be positive')
      .max(Number.MAX_SAFE_INTEGER, 'is too large')
  );

const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .optional()
    .transform((value) => (value ? value : undefined));

export const patientProfileSchema = z.object({
  name: z.string().trim().min(3, 'patient name must have at least 3 characters').max(200),
  identityKey: z.string().transform((value, ctx) => {
    const key = normalizeIdentityKey(value);
    if (!key) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `identity key must have exactly ${IDENTITY_KEY_LENGTH} digits`,
      });
      return z.NEVER;
    }
    return key;
  }),
  dateOfBirth: z.string().transform((value, ctx) => {
    const iso = parseDateOfBirth(value);
    if (!iso) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'date of birth must be a past date in YYYY-MM-DD or DD/MM/YYYY format',
      });
      return z.NEVER;
    }
    return iso;
  }),
  email: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined))
    .pipe(z.string().email('email is not valid').optional()),
  phone: optionalText(30),
});

export const insuranceSchema = z.object({
  type: z
    .string()
    .nullish()
    .transform((value) => normalizeInsuranceType(value)),
  planId: positiveId.nullish().transform((value) => value ?? null),
});

export const bookingRequestSchema = z.object({
  patient: patientProfileSchema,
  doctorId: positiveId,
  slotId: positiveId,
  clinicId: z.string().trim().min(1, 'clinicId is required'),
  insurance: insuranceSchema.optional().transform(
    (value) => value ?? { type: normalizeInsuranceType(undefined), planId: null }
  ),
  notes: optionalText(500),
});

export const cancelRequestSchema = z.object({
  reason: z
    .string()
    .trim()
    .max(500)
    .nullish()
    .transform((value) => (value ? value : null)),
});

export type BookingRequest = z.input<typeof bookingRequestSchema>;
export type NormalizedBooking = z.output<typeof bookingRequestSchema>;

/** Flatten zod issues into the details payload of a VALIDATION_ERROR. */
export function describeIssues(error: z.ZodError): Record<string, unknown> {
  return {
    fields: error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    })),
  };
}

export function parseAppointmentId(raw: unknown): number | null {
  const result = positiveId.safeParse(raw);
  return result.success ? result.data : null;
}
