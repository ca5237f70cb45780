import * as crypto from 'node:crypto';

export function bearerTokenFromHeader(header: string | undefined): string | null {
  const raw = (header ?? '').trim();
  const match = /^Bearer\s+(.+)$/i.exec(raw);
  const token = match?.[1]?.trim() ?? '';
  return token ? token : null;
}

export function safeEqual(a: string, b: string): boolean {
  // Hash first so lengths match; timingSafeEqual throws on unequal lengths.
  const ha = crypto.createHash('sha256').update(a, 'utf8').digest();
  const hb = crypto.createHash('sha256').update(b, 'utf8').digest();
  return crypto.timingSafeEqual(ha, hb);
}
