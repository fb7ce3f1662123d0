/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';

import type { PaginatedResult } from '@/types/index.js';

import { getErrorStatus } from '../types.js';

/**
 * Service error shape (matches Result pattern)
 */
interface ServiceError {
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: ServiceError,
  requestId: string
): Response {
  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
        requestId,
      },
    },
    getErrorStatus(error.code)
  );
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 = 200
): Response {
  return c.json(
    {
      data,
      meta: { requestId },
    },
    status
  );
}

/**
 * Create cursor-paginated success response
 */
export function paginatedResponse<T>(
  c: Context,
  page: PaginatedResult<T>,
  requestId: string
): Response {
  return c.json({
    data: page.items,
    meta: {
      pagination: {
        nextCursor: page.nextCursor ?? null,
        hasMore: page.hasMore,
      },
      requestId,
    },
  });
}
