export type EmailSendRequest = {
  to: string;
  subject: string;
  /** Plain text version. At least one of `text` / `html` must be non-empty. */
  text?: string | null;
  html?: string | null;
};

export type EmailFailureReason =
  | 'smtp_not_configured'
  | 'email_invalid'
  | 'smtp_auth_failed'
  | 'smtp_connection_failed'
  | 'smtp_error';

export type EmailSendResult =
  | { sent: true; messageId: string | null }
  | { sent: false; reason: EmailFailureReason; message: string };

export interface EmailProvider {
  /** Reported to callers as `service_used`. */
  readonly name: string;
  sendEmail(req: EmailSendRequest): Promise<EmailSendResult>;
}

export const EMAIL_PROVIDER = Symbol('EMAIL_PROVIDER');
