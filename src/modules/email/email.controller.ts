import { Body, Controller, HttpCode, HttpStatus, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { ApiKeyGuard } from '../auth/api-key.guard';
import { EmailService } from './email.service';
import {
  sendDividendAlertSchema,
  sendEmailSchema,
  sendPasswordResetSchema,
  sendVerificationSchema,
} from './email.schemas';

@ApiTags('email')
@ApiBearerAuth()
@UseGuards(ApiKeyGuard)
@Controller()
export class EmailController {
  constructor(private readonly email: EmailService) {}

  @Post('send')
  @HttpCode(HttpStatus.OK)
  async send(@Body() body: unknown) {
    const parsed = sendEmailSchema.parse(body);
    return await this.email.deliver(
      { to: parsed.to, subject: parsed.subject, html: parsed.html, text: parsed.text },
      'Email sent successfully',
    );
  }

  @Post('send-verification')
  @HttpCode(HttpStatus.OK)
  async sendVerification(@Body() body: unknown) {
    return await this.email.sendVerification(sendVerificationSchema.parse(body));
  }

  @Post('send-password-reset')
  @HttpCode(HttpStatus.OK)
  async sendPasswordReset(@Body() body: unknown) {
    return await this.email.sendPasswordReset(sendPasswordResetSchema.parse(body));
  }

  @Post('send-dividend-alert')
  @HttpCode(HttpStatus.OK)
  async sendDividendAlert(@Body() body: unknown) {
    return await this.email.sendDividendAlert(sendDividendAlertSchema.parse(body));
  }
}
