import { z } from 'zod';

const recipient = z.string().trim().email();

const httpUrl = z
  .string()
  .trim()
  .url()
  .refine((v) => /^https?:\/\//i.test(v), 'Must be an http(s) URL');

const username = z.string().trim().max(100).optional().nullable();

function blankToUndefined(v: unknown): unknown {
  return typeof v === 'string' && v.trim() === '' ? undefined : v;
}

/** Accepts JSON numbers and numeric strings ("0.24"). */
function numberLike(schema: z.ZodNumber) {
  return z.preprocess((v) => (typeof v === 'string' && v.trim() !== '' ? Number(v.trim()) : v), schema);
}

export const sendEmailSchema = z
  .object({
    to: recipient,
    subject: z.string().trim().min(1).max(255),
    html: z.string().optional().nullable(),
    text: z.string().optional().nullable(),
  })
  .strict()
  .refine((b) => Boolean(b.html?.trim() || b.text?.trim()), { message: 'At least one of html or text is required' });

export const sendVerificationSchema = z
  .object({
    to: recipient,
    verification_url: httpUrl,
    username,
  })
  .strict()
  .transform((b) => ({ to: b.to, verificationUrl: b.verification_url, username: b.username ?? null }));

export const sendPasswordResetSchema = z
  .object({
    to: recipient,
    reset_url: httpUrl,
    username,
  })
  .strict()
  .transform((b) => ({ to: b.to, resetUrl: b.reset_url, username: b.username ?? null }));

export const sendDividendAlertSchema = z
  .object({
    to: recipient,
    stock_symbol: z
      .string()
      .trim()
      .toUpperCase()
      .regex(/^[A-Z0-9.-]{1,12}$/, 'Must be a ticker symbol'),
    dividend_date: z.string().trim().min(1).max(64),
    dividend_amount: numberLike(z.number({ invalid_type_error: 'Must be a number' }).finite().nonnegative()),
    currency: z
      .string()
      .trim()
      .toUpperCase()
      .regex(/^[A-Z]{3}$/, 'Must be a 3-letter currency code')
      .default('USD'),
    days_advance: numberLike(z.number({ invalid_type_error: 'Must be a number' }).int().min(0).max(3650)).default(0),
    frequency: z.preprocess(blankToUndefined, z.string().trim().max(32).optional().nullable()),
  })
  .strict()
  .transform((b) => ({
    to: b.to,
    stockSymbol: b.stock_symbol,
    dividendDate: b.dividend_date,
    dividendAmount: b.dividend_amount,
    currency: b.currency,
    daysAdvance: b.days_advance,
    frequency: b.frequency ?? null,
  }));
