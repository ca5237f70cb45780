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

export type PasswordResetEmailInput = {
  resetUrl: string;
  username?: string | null;
};

export function renderPasswordResetEmail(input: PasswordResetEmailInput, branding: EmailBranding): RenderedEmail {
  const name = displayName(input.username);
  const title = 'Reset Your Password';
  const signature = `${branding.appName} Team`;

  const contentHtml = [
    `<p>Hello ${escapeHtml(name)},</p>`,
    `<p>You requested to reset your password. Click the button below to create a new password:</p>`,
    `<p style="text-align:center;margin:30px 0;">${renderButton({ href: input.resetUrl, label: 'Reset Password', tone: 'info' })}</p>`,
    renderLinkFallback(input.resetUrl),
    `<p>This link will expire in 24 hours.</p>`,
    `<p>If you didn't request this, please ignore this email. Your password will remain unchanged.</p>`,
    renderSignature(signature),
  ].join('');

  const text = joinTextLines([
    title,
    '',
    `Hello ${name},`,
    '',
    'You requested to reset your password. Visit this link to create a new password:',
    input.resetUrl,
    '',
    'This link will expire in 24 hours.',
    '',
    "If you didn't request this, please ignore this email. Your password will remain unchanged.",
    '',
    'Best regards,',
    signature,
  ]);

  return {
    subject: `Reset Your ${branding.appName} Password`,
    html: renderEmailLayout({ title, preheader: 'Use this link to choose a new password.', contentHtml, branding }),
    text,
  };
}
