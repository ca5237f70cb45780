import { Inject, Injectable, Logger } from '@nestjs/common';
import { AppConfigService } from '../../app/app-config.service';
import type { EmailProvider, EmailSendRequest, EmailSendResult } from './email-provider';
import { SMTP_TRANSPORT_FACTORY, classifySmtpError } from './smtp-transport';
import type { SmtpTransport, SmtpTransportFactory } from './smtp-transport';

@Injectable()
export class SmtpEmailProvider implements EmailProvider {
  readonly name = 'smtp';
  private readonly logger = new Logger(SmtpEmailProvider.name);

  constructor(
    private readonly appConfig: AppConfigService,
    @Inject(SMTP_TRANSPORT_FACTORY) private readonly createTransport: SmtpTransportFactory,
  ) {}

  async sendEmail(req: EmailSendRequest): Promise<EmailSendResult> {
    const cfg = this.appConfig.smtp();
    if (!cfg) return { sent: false, reason: 'smtp_not_configured', message: 'SMTP not configured' };

    const to = (req.to ?? '').trim();
    const subject = (req.subject ?? '').trim();
    const text = (req.text ?? '').trim();
    const html = (req.html ?? '').trim();
    if (!to || (!text && !html)) {
      return { sent: false, reason: 'email_invalid', message: 'Email needs a recipient and a text or html body' };
    }

    // One connection per message: no pooling, no reuse.
    let transport: SmtpTransport | null = null;
    try {
      transport = this.createTransport({
        host: cfg.host,
        port: cfg.port,
        secure: !cfg.useStartTls,
        requireTLS: cfg.useStartTls,
        auth: { user: cfg.user, pass: cfg.password },
        connectionTimeout: cfg.timeoutMs,
        greetingTimeout: cfg.timeoutMs,
        socketTimeout: cfg.timeoutMs,
      });

      // nodemailer emits multipart/alternative when both bodies are set.
      const info = await transport.sendMail({
        from: { name: cfg.fromName, address: cfg.fromEmail },
        to,
        subject,
        ...(text ? { text } : {}),
        ...(html ? { html } : {}),
      });

      this.logger.log(`Email sent via SMTP to ${to}`);
      return { sent: true, messageId: info.messageId ?? null };
    } catch (err: unknown) {
      const failure = classifySmtpError(err);
      this.logger.error(`[smtp] send to ${to} failed (${failure.reason}): ${failure.message}`);
      return { sent: false, ...failure };
    } finally {
      transport?.close();
    }
  }
}
