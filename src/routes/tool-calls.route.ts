import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { validationFailure } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { asyncHandler } from '../middleware/async-handler.js';
import type { Services } from '../services/index.js';
import { ErrorCode, type ApiResponse, type BookingResult } from '../types/index.js';
import { describeIssues, positiveId, type BookingRequest } from '../validation/booking.schema.js';
import { toHttp } from './respond.js';

const toolCallSchema = z.object({
  id: z.string().min(1),
  function: z.object({
    name: z.string(),
    arguments: z.record(z.unknown()).default({}),
  }),
});

const webhookSchema = z.object({
  message: z
    .object({
      type: z.string(),
      toolCalls: z.array(toolCallSchema).optional(),
    })
    .optional(),
});

type ToolCall = z.infer<typeof toolCallSchema>;

interface ToolCallResponse {
  results: Array<{
    toolCallId: string;
    result: string;
  }>;
}

const clinicIdArg = z.union([z.number(), z.string().trim().min(1)]);
const optionalText = z.string().nullish().transform((value) => value ?? undefined);

const searchArgsSchema = z.object({ specialty: z.string() });

const bookArgsSchema = z
  .object({
    patient_name: z.string(),
    patient_identity_key: z.string(),
    patient_date_of_birth: z.string(),
    patient_email: optionalText,
    patient_phone: optionalText,
    doctor_id: positiveId,
    slot_id: positiveId,
    clinic_id: clinicIdArg.transform(String),
    insurance_type: optionalText,
    insurance_plan_id: positiveId.nullish(),
    notes: optionalText,
  })
  .transform(
    (args): BookingRequest => ({
      patient: {
        name: args.patient_name,
        identityKey: args.patient_identity_key,
        dateOfBirth: args.patient_date_of_birth,
        email: args.patient_email,
        phone: args.patient_phone,
      },
      doctorId: args.doctor_id,
      slotId: args.slot_id,
      clinicId: args.clinic_id,
      insurance: { type: args.insurance_type, planId: args.insurance_plan_id },
      notes: args.notes,
    })
  );

const cancelArgsSchema = z.object({
  appointment_id: positiveId,
  reason: optionalText,
});

const getArgsSchema = z.object({
  appointment_id: positiveId,
});

function invalidArguments(name: string, error: z.ZodError): BookingResult<never> {
  return validationFailure(`Invalid arguments for ${name}`, describeIssues(error));
}

async function handleBookAppointment(
  services: Services,
  toolCall: ToolCall
): Promise<ApiResponse> {
  const args = bookArgsSchema.safeParse(toolCall.function.arguments);
  if (!args.success) {
    return toHttp(invalidArguments(toolCall.function.name, args.error)).body;
  }

  // A retried tool call carries the same id; answer it from the first attempt.
  const idempotencyKey = `tool-call:${toolCall.id}`;
  const previous = services.idempotency.check(idempotencyKey, args.data);
  if (previous.found) {
    return previous.mismatch
      ? {
          success: false,
          error: {
            code: ErrorCode.IDEMPOTENCY_KEY_MISMATCH,
            message: 'This tool call id was already used with different arguments',
          },
        }
      : previous.response.body;
  }

  const outcome = toHttp(await services.engine.book(args.data), 201);
  if (outcome.body.error?.code !== ErrorCode.STORAGE_ERROR) {
    services.idempotency.store(idempotencyKey, args.data, outcome);
  }
  return outcome.body;
}

async function handleToolCall(services: Services, toolCall: ToolCall): Promise<ApiResponse> {
  const { name, arguments: rawArgs } = toolCall.function;
  logger.debug(`Tool call: ${name}`, { toolCallId: toolCall.id });

  switch (name) {
    case 'search_availability': {
      const args = searchArgsSchema.safeParse(rawArgs);
      return toHttp(
        args.success
          ? await services.availability.search(args.data.specialty)
          : invalidArguments(name, args.error)
      ).body;
    }
    case 'book_appointment':
      return handleBookAppointment(services, toolCall);
    case 'cancel_appointment': {
      const args = cancelArgsSchema.safeParse(rawArgs);
      return toHttp(
        args.success
          ? await services.engine.cancel(args.data.appointment_id, args.data.reason)
          : invalidArguments(name, args.error)
      ).body;
    }
    case 'get_appointment': {
      const args = getArgsSchema.safeParse(rawArgs);
      return toHttp(
        args.success
          ? await services.reader.getById(args.data.appointment_id)
          : invalidArguments(name, args.error)
      ).body;
    }
    default:
      return toHttp(validationFailure(`Unknown function: ${name}`)).body;
  }
}

/**
 * POST /api/tools/webhook
 *
 * Tool-call webhook for a voice or chat agent. Each tool call is answered with
 * the JSON-encoded engine result; the agent decides what to say.
 */
export function createToolCallsRouter(services: Services): Router {
  const router = Router();

  router.post('/webhook', asyncHandler(async (req: Request, res: Response) => {
    const parsed = webhookSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(
        toHttp(validationFailure('Malformed webhook payload', describeIssues(parsed.error))).body
      );
      return;
    }

    const message = parsed.data.message;
    if (message?.type === 'tool-calls' && message.toolCalls) {
      const results: ToolCallResponse['results'] = [];
      // In order: one batch may cancel an appointment and then rebook.
      for (const toolCall of message.toolCalls) {
        const result = await handleToolCall(services, toolCall);
        results.push({ toolCallId: toolCall.id, result: JSON.stringify(result) });
      }
      const response: ToolCallResponse = { results };
      res.json(response);
      return;
    }

    if (message?.type) {
      logger.debug(`Agent event: ${message.type}`);
    }
    res.json({ status: 'ok' });
  }));

  return router;
}
