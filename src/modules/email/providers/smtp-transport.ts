import * as nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import type { EmailFailureReason } from './email-provider';

/** The slice of a nodemailer transporter the provider relies on. */
export type SmtpTransport = {
  sendMail(mail: SendMailOptions): Promise<{ messageId?: string }>;
  close(): void;
};

export type SmtpTransportFactory = (options: SMTPTransport.Options) => SmtpTransport;

export const SMTP_TRANSPORT_FACTORY = Symbol('SMTP_TRANSPORT_FACTORY');

export const createSmtpTransport: SmtpTransportFactory = (options) => nodemailer.createTransport(options);

const CONNECTION_ERROR_CODES = new Set([
  'ECONNECTION',
  'ETIMEDOUT',
  'ESOCKET',
  'EDNS',
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ETLS',
]);

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Maps a nodemailer failure onto the service's transport taxonomy.
 * nodemailer tags its errors with `code` (EAUTH, ECONNECTION, ...) and, for
 * server replies, `responseCode` (535 = bad credentials).
 */
export function classifySmtpError(err: unknown): { reason: EmailFailureReason; message: string } {
  const detail = err instanceof Error ? err.message : String(err);
  const code = isObject(err) && typeof err.code === 'string' ? err.code : '';
  const responseCode = isObject(err) && typeof err.responseCode === 'number' ? err.responseCode : null;

  if (code === 'EAUTH' || responseCode === 535) {
    return { reason: 'smtp_auth_failed', message: `SMTP authentication failed: ${detail}` };
  }
  if (CONNECTION_ERROR_CODES.has(code)) {
    return { reason: 'smtp_connection_failed', message: `SMTP connection failed: ${detail}` };
  }
  return { reason: 'smtp_error', message: `SMTP error: ${detail}` };
}
