import { Router, type Request, type Response } from 'express';
import { validationFailure } from '../lib/errors.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { validateIdempotencyKey } from '../middleware/idempotency.js';
import type { Services } from '../services/index.js';
import { ErrorCode, type ApiResponse } from '../types/index.js';
import {
  bookingRequestSchema,
  describeIssues,
  parseAppointmentId,
} from '../validation/booking.schema.js';
import { sendResult, toHttp } from './respond.js';

/** NaN for anything that is not a plain positive integer, so the service reports it. */
function appointmentIdParam(req: Request): number {
  return parseAppointmentId(req.params.id) ?? Number.NaN;
}

/**
 * POST /api/appointments
 *
 * Book an appointment. Requires an Idempotency-Key (UUID) header.
 *
 * Body:
 *   patient: { name, identityKey, dateOfBirth, email?, phone? }
 *   doctorId, slotId, clinicId
 *   insurance?: { type?: 'PRIVATE_PAY' | 'HEALTH_PLAN', planId? }
 *   notes?
 *
 * Responses:
 *   201: Appointment confirmed
 *   400: VALIDATION_ERROR / MISSING_IDEMPOTENCY_KEY
 *   409: SLOT_UNAVAILABLE, pick another slot
 *   422: IDEMPOTENCY_KEY_MISMATCH
 *   503: STORAGE_ERROR, safe to retry with the same key
 *
 * GET  /api/appointments/:id
 * POST /api/appointments/:id/cancel   body: { reason? }
 */
export function createAppointmentsRouter(services: Services): Router {
  const router = Router();

  router.post('/', validateIdempotencyKey, asyncHandler(async (req: Request, res: Response) => {
    const idempotencyKey = String(res.locals.idempotencyKey);
    const payload: unknown = req.body;

    const previous = services.idempotency.check(idempotencyKey, payload);
    if (previous.found) {
      if (previous.mismatch) {
        const response: ApiResponse = {
          success: false,
          error: {
            code: ErrorCode.IDEMPOTENCY_KEY_MISMATCH,
            message: 'This Idempotency-Key was already used with different request parameters',
            details: {
              hint: 'Generate a new Idempotency-Key for requests with different parameters',
            },
          },
        };
        res.status(422).json(response);
        return;
      }
      res.status(previous.response.status).json(previous.response.body);
      return;
    }

    const parsed = bookingRequestSchema.safeParse(payload);
    const outcome = parsed.success
      ? toHttp(await services.engine.book(parsed.data), 201)
      : toHttp(validationFailure('Booking request is invalid', describeIssues(parsed.error)));

    // Storage failures left nothing behind, so the same key may be retried.
    if (outcome.body.error?.code !== ErrorCode.STORAGE_ERROR) {
      services.idempotency.store(idempotencyKey, payload, outcome);
    }

    res.status(outcome.status).json(outcome.body);
  }));

  router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
    sendResult(res, await services.reader.getById(appointmentIdParam(req)));
  }));

  router.post('/:id/cancel', asyncHandler(async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const reason =
      body !== null && typeof body === 'object' && 'reason' in body && typeof body.reason === 'string'
        ? body.reason
        : null;

    sendResult(res, await services.engine.cancel(appointmentIdParam(req), reason));
  }));

  return router;
}

export function createAvailabilityRouter(services: Services): Router {
  const router = Router();

  /**
   * GET /api/availability?specialty=cardio
   */
  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const specialty = typeof req.query.specialty === 'string' ? req.query.specialty : '';
    sendResult(res, await services.availability.search(specialty));
  }));

  return router;
}
