/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';
import type { z } from 'zod';

import type { ErrorCode } from '@/types/index.js';

import { getErrorStatus } from '../types.js';

/**
 * Service error shape (matches Result pattern)
 */
interface ServiceError {
  code: ErrorCode;
  message: string;
  details?: unknown;
}

/**
 * Amounts leave the API as decimal strings, dates as ISO strings
 */
export function toWire(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(toWire);
  }
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = toWire(inner);
    }
    return out;
  }
  return value;
}

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: ServiceError,
  requestId: string
): Response {
  const status = getErrorStatus(error.code);

  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        details: toWire(error.details),
        requestId,
      },
    },
    status
  );
}

/**
 * Create success response with data
 */
export function successResponse(
  c: Context,
  data: unknown,
  requestId: string,
  status: 200 | 201 = 200
): Response {
  return c.json(
    {
      data: toWire(data),
      meta: { requestId },
    },
    status
  );
}

/**
 * 400 for a body that failed its schema
 */
export function validationErrorResponse(
  c: Context,
  error: z.ZodError,
  requestId: string
): Response {
  return c.json(
    {
      error: {
        code: 'VALIDATION_ERROR',
        message: error.issues[0]?.message ?? 'Validation error',
        requestId,
      },
    },
    400
  );
}

/**
 * Parse the JSON body, treating an unreadable body as empty
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return {};
  }
}
