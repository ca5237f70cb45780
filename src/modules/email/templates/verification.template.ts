import type { EmailBranding } from '../../app/app-config.service';
import {
  displayName,
  escapeHtml,
  joinTextLines,
  renderButton,
  renderEmailLayout,
  renderLinkFallback,
  renderSignature,
  type RenderedEmail,
} from './email-layout';

export type VerificationEmailInput = {
  verificationUrl: string;
  username?: string | null;
};

export function renderVerificationEmail(input: VerificationEmailInput, branding: EmailBranding): RenderedEmail {
  const name = displayName(input.username);
  const title = `Verify Your ${branding.appName} Account`;
  const signature = `${branding.appName} Team`;

  const contentHtml = [
    `<p>Hello ${escapeHtml(name)},</p>`,
    `<p>Thank you for signing up! Please verify your email address by clicking the button below:</p>`,
    `<p style="text-align:center;margin:30px 0;">${renderButton({ href: input.verificationUrl, label: 'Verify Email Address' })}</p>`,
    renderLinkFallback(input.verificationUrl),
    `<p>This link will expire in 24 hours.</p>`,
    `<p>If you didn't create an account, please ignore this email.</p>`,
    renderSignature(signature),
  ].join('');

  const text = joinTextLines([
    title,
    '',
    `Hello ${name},`,
    '',
    'Thank you for signing up! Please verify your email address by visiting:',
    input.verificationUrl,
    '',
    'This link will expire in 24 hours.',
    '',
    "If you didn't create an account, please ignore this email.",
    '',
    'Best regards,',
    signature,
  ]);

  return {
    subject: title,
    html: renderEmailLayout({ title, preheader: 'Confirm your email address to finish signing up.', contentHtml, branding }),
    text,
  };
}
