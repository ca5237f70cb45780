import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Request, Response } from 'express';
import { ZodError, ZodIssueCode, type ZodIssue } from 'zod';
import type { ApiErrorDto } from '../dto/email-delivery.dto';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function extractHttpMessage(exception: HttpException): { message: string; reason?: string } {
  const res = exception.getResponse();
  if (typeof res === 'string') return { message: res };
  if (isObject(res)) {
    const message = res.message;
    const error = res.error;
    if (Array.isArray(message)) {
      return { message: message.join('\n'), reason: typeof error === 'string' ? error : undefined };
    }
    if (typeof message === 'string') {
      return { message, reason: typeof error === 'string' ? error : undefined };
    }
  }
  return { message: exception.message };
}

function isMissingField(issue: ZodIssue): boolean {
  return issue.code === ZodIssueCode.invalid_type && issue.received === 'undefined' && issue.path.length > 0;
}

/**
 * One line naming every failed field, e.g.
 * `Missing required fields: to, subject; to: Invalid email`.
 */
export function describeZodIssues(issues: ZodIssue[]): string {
  const missing = issues.filter(isMissingField).map((i) => i.path.join('.'));
  const invalid = issues
    .filter((i) => !isMissingField(i))
    .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
  const parts = [...(missing.length ? [`Missing required fields: ${missing.join(', ')}`] : []), ...invalid];
  return parts.length ? parts.join('; ') : 'Invalid request';
}

/** The recipient is echoed back so callers can correlate failures. */
export function recipientFromBody(body: unknown): string | null {
  if (!isObject(body)) return null;
  return typeof body.to === 'string' ? body.to : null;
}

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const req = ctx.getRequest<Request>();
    const requestId = typeof res.locals?.requestId === 'string' ? res.locals.requestId : null;
    const to = recipientFromBody(req?.body);

    const send = (status: number, error: string, reason?: string) => {
      const payload: ApiErrorDto = {
        success: false,
        error,
        to,
        ...(reason ? { reason } : {}),
        ...(requestId ? { requestId } : {}),
      };
      return res.status(status).json(payload);
    };

    if (exception instanceof ZodError) {
      return send(HttpStatus.BAD_REQUEST, describeZodIssues(exception.issues), 'validation');
    }

    if (exception instanceof HttpException) {
      const { message, reason } = extractHttpMessage(exception);
      return send(exception.getStatus(), message, reason);
    }

    // Still a safe envelope for the caller; the underlying error goes to the log.
    this.logger.error(
      `Unhandled exception${requestId ? ` rid=${requestId}` : ''}: ${exception instanceof Error ? exception.message : String(exception)}`,
      exception instanceof Error ? exception.stack : undefined,
    );
    return send(HttpStatus.INTERNAL_SERVER_ERROR, 'Internal server error', 'internal_error');
  }
}
