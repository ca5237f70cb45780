import { Module } from '@nestjs/common';
import { AppConfigModule } from '../app/app-config.module';
import { ApiKeyGuard } from '../auth/api-key.guard';
import { EmailController } from './email.controller';
import { EmailService } from './email.service';
import { EMAIL_PROVIDER } from './providers/email-provider';
import { SmtpEmailProvider } from './providers/smtp-email.provider';
import { SMTP_TRANSPORT_FACTORY, createSmtpTransport } from './providers/smtp-transport';

@Module({
  imports: [AppConfigModule],
  controllers: [EmailController],
  providers: [
    ApiKeyGuard,
    { provide: SMTP_TRANSPORT_FACTORY, useValue: createSmtpTransport },
    SmtpEmailProvider,
    // Provider selection stays here; Gmail SMTP is the only relay.
    { provide: EMAIL_PROVIDER, useExisting: SmtpEmailProvider },
    EmailService,
  ],
  exports: [EmailService],
})
export class EmailModule {}
