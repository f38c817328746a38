import type { Request, Response, NextFunction } from 'express';
import { validate as isUuid } from 'uuid';
import { ErrorCode, type ApiResponse } from '../types/index.js';

/**
 * Requires an Idempotency-Key header on booking requests.
 * Agents retry on timeouts; the key lets a retry get the first answer.
 */
export function validateIdempotencyKey(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const idempotencyKey = req.headers['idempotency-key'];

  if (!idempotencyKey || typeof idempotencyKey !== 'string') {
    const response: ApiResponse = {
      success: false,
      error: {
        code: ErrorCode.MISSING_IDEMPOTENCY_KEY,
        message: 'Idempotency-Key header is required for this endpoint',
        details: {
          hint: 'Generate a unique UUID for each distinct booking request. Reuse the same key when retrying.',
        },
      },
    };
    res.status(400).json(response);
    return;
  }

  if (!isUuid(idempotencyKey)) {
    const response: ApiResponse = {
      success: false,
      error: {
        code: ErrorCode.MISSING_IDEMPOTENCY_KEY,
        message: 'Idempotency-Key must be a valid UUID',
        details: {
          received: idempotencyKey,
          expected_format: 'xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx',
        },
      },
    };
    res.status(400).json(response);
    return;
  }

  res.locals.idempotencyKey = idempotencyKey;
  next();
}
