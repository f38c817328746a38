import type { Response } from 'express';
import { ErrorCode, type ApiResponse, type BookingResult, type ErrorBody } from '../types/index.js';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.MISSING_IDEMPOTENCY_KEY]: 400,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.SLOT_UNAVAILABLE]: 409,
  [ErrorCode.ALREADY_CANCELLED]: 409,
  [ErrorCode.IDEMPOTENCY_KEY_MISMATCH]: 422,
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.STORAGE_ERROR]: 503,
};

export function statusFor(error: ErrorBody): number {
  return STATUS_BY_CODE[error.code];
}

export function toHttp<T>(
  result: BookingResult<T>,
  successStatus = 200
): { status: number; body: ApiResponse<T> } {
  if (result.success) {
    return { status: successStatus, body: { success: true, data: result.data } };
  }
  return { status: statusFor(result.error), body: { success: false, error: result.error } };
}

export function sendResult<T>(res: Response, result: BookingResult<T>, successStatus = 200): void {
  const { status, body } = toHttp(result, successStatus);
  res.status(status).json(body);
}
