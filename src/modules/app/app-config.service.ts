import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export type NodeEnv = 'development' | 'test' | 'production';

export type SmtpConfig = {
  host: string;
  port: number;
  /** true: plain connect then STARTTLS. false: TLS from the first byte. */
  useStartTls: boolean;
  user: string;
  password: string;
  fromEmail: string;
  fromName: string;
  /** Applied to the connection, greeting and socket phases separately. */
  timeoutMs: number;
};

export type EmailBranding = {
  appName: string;
};

@Injectable()
export class AppConfigService {
  private readonly logger = new Logger(AppConfigService.name);

  constructor(private readonly config: ConfigService) {}

  private readBool(key: string, fallback: boolean): boolean {
    const raw = this.config.get<string>(key);
    if (raw == null) return fallback;
    const v = String(raw).trim().toLowerCase();
    if (!v) return fallback;
    if (['1', 'true', 'yes', 'on'].includes(v)) return true;
    if (['0', 'false', 'no', 'off'].includes(v)) return false;
    return fallback;
  }

  private readPositiveInt(key: string, fallback: number): number {
    const raw = this.config.get<string>(key) ?? '';
    const n = Number(raw);
    return raw.trim() && Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
  }

  private readString(key: string): string {
    return this.config.get<string>(key)?.trim() ?? '';
  }

  nodeEnv(): NodeEnv {
    const v = this.readString('NODE_ENV');
    return v === 'production' || v === 'test' ? v : 'development';
  }

  isProd(): boolean {
    return this.nodeEnv() === 'production';
  }

  port(): number {
    return this.readPositiveInt('PORT', 5000);
  }

  trustProxy(): boolean {
    return this.readBool('TRUST_PROXY', false);
  }

  logRequests(): boolean {
    return this.readBool('LOG_REQUESTS', false);
  }

  bodyJsonLimit(): string {
    return this.readString('BODY_JSON_LIMIT') || '100kb';
  }

  allowedOrigins(): string[] {
    const raw = this.config.get<string>('ALLOWED_ORIGINS') ?? '';
    return raw
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }

  /** An empty allow-list means any origin (the service is called server-to-server). */
  isOriginAllowed(origin: string): boolean {
    const allowed = this.allowedOrigins();
    return allowed.length === 0 || allowed.includes(origin);
  }

  logCorsBlocked(origin: string) {
    this.logger.warn(`CORS blocked origin: ${origin}. Allowed origins: ${this.allowedOrigins().join(', ')}`);
  }

  requireAuth(): boolean {
    return this.readBool('REQUIRE_AUTH', true);
  }

  apiKey(): string | null {
    const v = this.readString('EMAIL_SERVICE_API_KEY');
    return v ? v : null;
  }

  smtp(): SmtpConfig | null {
    const user = this.readString('SMTP_USER');
    // Gmail app passwords are shown with spaces; those are part of the secret, so no trim here.
    const password = this.config.get<string>('SMTP_PASSWORD') ?? '';
    const fromEmail = this.readString('SMTP_FROM_EMAIL');
    if (!user || !password || !fromEmail) return null;

    return {
      host: this.readString('SMTP_HOST') || 'smtp.gmail.com',
      port: this.readPositiveInt('SMTP_PORT', 587),
      useStartTls: this.readBool('SMTP_USE_TLS', true),
      user,
      password,
      fromEmail,
      fromName: this.fromName(),
      timeoutMs: this.readPositiveInt('SMTP_TIMEOUT_MS', 30_000),
    };
  }

  fromName(): string {
    return this.readString('SMTP_FROM_NAME') || 'StockFolio';
  }

  branding(): EmailBranding {
    return { appName: this.readString('APP_NAME') || this.fromName() };
  }
}
