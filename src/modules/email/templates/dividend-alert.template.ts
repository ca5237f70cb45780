import type { EmailBranding } from '../../app/app-config.service';
import { escapeHtml, joinTextLines, renderEmailLayout, renderSignature, type RenderedEmail } from './email-layout';

export type DividendAlertEmailInput = {
  stockSymbol: string;
  /** Rendered as given (callers already format it for their users). */
  dividendDate: string;
  dividendAmount: number;
  /** ISO 4217 code. */
  currency: string;
  daysAdvance: number;
  frequency?: string | null;
};

export function formatDividendAmount(amount: number, currency: string): string {
  return new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency,
    minimumFractionDigits: 2,
    maximumFractionDigits: 4,
  }).format(amount);
}

function dayCount(n: number): string {
  return n === 1 ? '1 day' : `${n} days`;
}

export function renderDividendAlertEmail(input: DividendAlertEmailInput, branding: EmailBranding): RenderedEmail {
  const symbol = input.stockSymbol;
  const amount = formatDividendAmount(input.dividendAmount, input.currency);
  const frequency = (input.frequency ?? '').trim();
  const title = `Dividend Alert: ${symbol}`;
  const advance = `This alert was sent ${dayCount(input.daysAdvance)} in advance.`;

  const contentHtml = [
    `<p><strong>${escapeHtml(symbol)}</strong> is paying a dividend of <strong>${escapeHtml(amount)}</strong> on <strong>${escapeHtml(input.dividendDate)}</strong>.</p>`,
    frequency ? `<p>Payment frequency: ${escapeHtml(frequency)}</p>` : '',
    `<p>${escapeHtml(advance)}</p>`,
    renderSignature(branding.appName),
  ].join('');

  const text = joinTextLines([
    title,
    '',
    `${symbol} is paying a dividend of ${amount} on ${input.dividendDate}.`,
    frequency ? `Payment frequency: ${frequency}` : null,
    '',
    advance,
    '',
    'Best regards,',
    branding.appName,
  ]);

  return {
    subject: `${symbol} Dividend Alert (${dayCount(input.daysAdvance)} early)`,
    html: renderEmailLayout({ title, preheader: `${symbol} pays ${amount} on ${input.dividendDate}.`, contentHtml, branding }),
    text,
  };
}
