import { NextRequest, NextResponse } from 'next/server';
import { z, ZodError } from 'zod';
import type { ApiErrorResponse } from './api-types';
import { BadRequestError, isAppError, NotFoundError } from './errors';
import { createLogger } from './logger';

const log = createLogger('api');

type RouteHandler = (
  request: NextRequest,
  context: { params: Promise<Record<string, string>> },
) => Promise<NextResponse>;

export function assertUUID(id: string, resource: string): void {
  if (!z.string().uuid().safeParse(id).success) {
    throw new NotFoundError(resource, id);
  }
}

/** Parse a JSON request body; malformed JSON is a 400, not a 500. */
export async function readJsonBody(request: NextRequest): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    throw new BadRequestError('Request body must be valid JSON');
  }
}

/**
 * Wraps an API route handler with consistent error handling.
 * - AppError subclasses map to their HTTP status code
 * - ZodError returns 422 with field-level details
 * - Unknown errors return 500 with no internal details exposed
 */
export function withErrorBoundary(handler: RouteHandler): RouteHandler {
  return async (request, context) => {
    try {
      return await handler(request, context);
    } catch (error) {
      if (isAppError(error)) {
        return NextResponse.json(error.toJSON(), { status: error.statusCode });
      }

      if (error instanceof ZodError) {
        return NextResponse.json<ApiErrorResponse>(
          {
            error: {
              code: 'VALIDATION_ERROR',
              message: 'Request validation failed',
              context: { issues: error.issues },
            },
          },
          { status: 422 },
        );
      }

      log.error('Unhandled API error:', error);
      return NextResponse.json<ApiErrorResponse>(
        {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'An unexpected error occurred',
          },
        },
        { status: 500 },
      );
    }
  };
}
