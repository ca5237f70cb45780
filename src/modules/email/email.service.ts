import { Inject, Injectable } from '@nestjs/common';
import { AppConfigService } from '../app/app-config.service';
import type { EmailDeliveryDto } from '../../common/dto/email-delivery.dto';
import { EMAIL_PROVIDER } from './providers/email-provider';
import type { EmailProvider, EmailSendRequest } from './providers/email-provider';
import { EmailDeliveryException } from './email-delivery.exception';
import { renderVerificationEmail } from './templates/verification.template';
import { renderPasswordResetEmail } from './templates/password-reset.template';
import { renderDividendAlertEmail, type DividendAlertEmailInput } from './templates/dividend-alert.template';

@Injectable()
export class EmailService {
  constructor(
    @Inject(EMAIL_PROVIDER) private readonly provider: EmailProvider,
    private readonly appConfig: AppConfigService,
  ) {}

  /** Single attempt. A failed send throws; nothing is queued or retried. */
  async deliver(req: EmailSendRequest, successMessage: string): Promise<EmailDeliveryDto> {
    const res = await this.provider.sendEmail(req);
    if (!res.sent) throw new EmailDeliveryException(res.message, res.reason);
    return { success: true, message: successMessage, service_used: this.provider.name, to: req.to };
  }

  async sendVerification(params: { to: string; verificationUrl: string; username?: string | null }) {
    const rendered = renderVerificationEmail(params, this.appConfig.branding());
    return await this.deliver({ to: params.to, ...rendered }, 'Verification email sent');
  }

  async sendPasswordReset(params: { to: string; resetUrl: string; username?: string | null }) {
    const rendered = renderPasswordResetEmail(params, this.appConfig.branding());
    return await this.deliver({ to: params.to, ...rendered }, 'Password reset email sent');
  }

  async sendDividendAlert(params: DividendAlertEmailInput & { to: string }) {
    const rendered = renderDividendAlertEmail(params, this.appConfig.branding());
    return await this.deliver({ to: params.to, ...rendered }, 'Dividend alert sent');
  }
}
