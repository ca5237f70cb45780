import { CallHandler, ExecutionContext, HttpException, Injectable, NestInterceptor } from '@nestjs/common';
import type { Response } from 'express';
import { Observable } from 'rxjs';

/** `res.locals` key the JSON parser leaves a rejected body under. */
export const BODY_ERROR_LOCAL = 'bodyError';

export type BodyError = { status: number; error: string };

export function isBodyError(value: unknown): value is BodyError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'status' in value &&
    typeof value.status === 'number' &&
    'error' in value &&
    typeof value.error === 'string'
  );
}

/**
 * Reports a malformed or oversized body only once the route's guards have passed,
 * so unauthenticated callers get 401 whatever they sent.
 */
@Injectable()
export class BodyErrorInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const res = context.switchToHttp().getResponse<Response>();
    const bodyError: unknown = res.locals?.[BODY_ERROR_LOCAL];
    if (isBodyError(bodyError)) {
      throw new HttpException(
        { statusCode: bodyError.status, message: bodyError.error, error: 'invalid_body' },
        bodyError.status,
      );
    }
    return next.handle();
  }
}
