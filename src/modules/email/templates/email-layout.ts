import type { EmailBranding } from '../../app/app-config.service';

export type RenderedEmail = {
  subject: string;
  html: string;
  text: string;
};

export function escapeHtml(s: string): string {
  return String(s ?? '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export type ButtonTone = 'success' | 'info';

export function renderButton(params: { href: string; label: string; tone?: ButtonTone }): string {
  const background = (params.tone ?? 'success') === 'info' ? '#2196F3' : '#4CAF50';
  const href = escapeHtml(params.href);
  const label = escapeHtml(params.label);
  return `<a href="${href}" style="background-color:${background};color:#ffffff;padding:12px 24px;text-decoration:none;border-radius:5px;display:inline-block;font-weight:700;">${label}</a>`;
}

/** Long links wrap instead of widening the message. */
export function renderLinkFallback(href: string): string {
  return [
    `<p>Or copy and paste this link into your browser:</p>`,
    `<p style="word-break:break-all;color:#666666;">${escapeHtml(href)}</p>`,
  ].join('');
}

export function renderSignature(signature: string): string {
  return `<p>Best regards,<br>${escapeHtml(signature)}</p>`;
}

export function renderEmailLayout(params: {
  title: string;
  preheader: string;
  contentHtml: string;
  branding: EmailBranding;
}): string {
  const title = escapeHtml(params.title);
  const preheader = escapeHtml(params.preheader);
  const appName = escapeHtml(params.branding.appName);

  return [
    `<!doctype html>`,
    `<html lang="en">`,
    `<head>`,
    `<meta charset="utf-8" />`,
    `<meta name="viewport" content="width=device-width,initial-scale=1" />`,
    `<title>${title}</title>`,
    `</head>`,
    `<body style="margin:0;padding:0;background:#f6f7f9;color:#111827;font-family:Arial,Helvetica,sans-serif;">`,
    `<div style="display:none;max-height:0;overflow:hidden;opacity:0;color:transparent;">${preheader}</div>`,
    `<div style="max-width:600px;margin:0 auto;padding:24px 20px;background:#ffffff;line-height:1.6;">`,
    `<h2 style="margin:0 0 16px 0;">${title}</h2>`,
    params.contentHtml,
    `</div>`,
    `<div style="max-width:600px;margin:10px auto 0 auto;font-size:11px;color:#9ca3af;text-align:center;">${appName}</div>`,
    `</body></html>`,
  ].join('');
}

export function joinTextLines(lines: Array<string | null>): string {
  return lines.filter((line): line is string => line !== null).join('\n');
}

export function displayName(username: string | null | undefined): string {
  return (username ?? '').trim() || 'User';
}
