import { HttpStatus, InternalServerErrorException } from '@nestjs/common';
import type { EmailFailureReason } from './providers/email-provider';

/** The relay refused or never accepted the message. Surfaces as HTTP 500. */
export class EmailDeliveryException extends InternalServerErrorException {
  constructor(
    message: string,
    readonly reason: EmailFailureReason,
  ) {
    super({ statusCode: HttpStatus.INTERNAL_SERVER_ERROR, message, error: reason });
  }
}
