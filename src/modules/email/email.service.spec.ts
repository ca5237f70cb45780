import { ConfigService } from '@nestjs/config';
import { AppConfigService } from '../app/app-config.service';
import { EmailDeliveryException } from './email-delivery.exception';
import { EmailService } from './email.service';
import type { EmailProvider, EmailSendRequest, EmailSendResult } from './providers/email-provider';

class RecordingProvider implements EmailProvider {
  readonly name = 'smtp';
  readonly requests: EmailSendRequest[] = [];

  constructor(private readonly result: EmailSendResult = { sent: true, messageId: null }) {}

  async sendEmail(req: EmailSendRequest): Promise<EmailSendResult> {
    this.requests.push(req);
    return this.result;
  }
}

function makeService(result?: EmailSendResult) {
  const provider = new RecordingProvider(result);
  const svc = new EmailService(provider, new AppConfigService(new ConfigService()));
  return { svc, provider };
}

describe('EmailService', () => {
  it('delivers a generic message once and reports the provider used', async () => {
    const { svc, provider } = makeService();

    const res = await svc.deliver({ to: 'a@b.com', subject: 'Hi', text: 'hello' }, 'Email sent successfully');

    expect(res).toEqual({ success: true, message: 'Email sent successfully', service_used: 'smtp', to: 'a@b.com' });
    expect(provider.requests).toEqual([{ to: 'a@b.com', subject: 'Hi', text: 'hello' }]);
  });

  it('throws a delivery exception carrying the provider failure', async () => {
    const { svc } = makeService({ sent: false, reason: 'smtp_connection_failed', message: 'SMTP connection failed: down' });

    const attempt = svc.deliver({ to: 'a@b.com', subject: 'Hi', text: 'hello' }, 'Email sent successfully');

    await expect(attempt).rejects.toBeInstanceOf(EmailDeliveryException);
    await expect(attempt).rejects.toMatchObject({ reason: 'smtp_connection_failed', message: 'SMTP connection failed: down' });
  });

  it('renders the verification template with the configured brand', async () => {
    const { svc, provider } = makeService();

    const res = await svc.sendVerification({ to: 'a@b.com', verificationUrl: 'https://x/v/1', username: 'Jo' });

    expect(res.message).toBe('Verification email sent');
    expect(provider.requests).toHaveLength(1);
    expect(provider.requests[0]?.subject).toBe('Verify Your StockFolio Account');
    expect(provider.requests[0]?.text).toContain('https://x/v/1');
    expect(provider.requests[0]?.html).toContain('Hello Jo,');
  });

  it('renders password reset and dividend alert messages', async () => {
    const { svc, provider } = makeService();

    const reset = await svc.sendPasswordReset({ to: 'a@b.com', resetUrl: 'https://x/r/1' });
    const alert = await svc.sendDividendAlert({
      to: 'a@b.com',
      stockSymbol: 'KO',
      dividendDate: '2026-12-01',
      dividendAmount: 0.485,
      currency: 'USD',
      daysAdvance: 5,
      frequency: null,
    });

    expect(reset.message).toBe('Password reset email sent');
    expect(alert.message).toBe('Dividend alert sent');
    expect(provider.requests.map((r) => r.subject)).toEqual([
      'Reset Your StockFolio Password',
      'KO Dividend Alert (5 days early)',
    ]);
    expect(provider.requests[1]?.text).toContain('KO is paying a dividend of $0.485 on 2026-12-01.');
  });
});
