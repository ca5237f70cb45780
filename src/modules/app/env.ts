import { z } from 'zod';

const numericString = (name: string) =>
  z
    .string()
    .optional()
    .refine((v) => (v ? !Number.isNaN(Number(v)) : true), `${name} must be a number`);

const boolString = (name: string) =>
  z
    .string()
    .optional()
    .refine(
      (v) => (v ? ['1', 'true', 'yes', 'on', '0', 'false', 'no', 'off'].includes(v.trim().toLowerCase()) : true),
      `${name} must be true or false`,
    );

function isTruthy(raw: string | undefined, fallback: boolean): boolean {
  const v = (raw ?? '').trim().toLowerCase();
  if (!v) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(v);
}

export const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: numericString('PORT'),

    // Upstream relay. Gmail accepts STARTTLS on 587 with an app password.
    SMTP_HOST: z.string().optional().default('smtp.gmail.com'),
    SMTP_PORT: numericString('SMTP_PORT').default('587'),
    SMTP_USE_TLS: boolString('SMTP_USE_TLS').default('true'),
    SMTP_USER: z.string().optional(),
    SMTP_PASSWORD: z.string().optional(),
    SMTP_FROM_EMAIL: z.string().optional(),
    SMTP_FROM_NAME: z.string().optional().default('StockFolio'),
    SMTP_TIMEOUT_MS: numericString('SMTP_TIMEOUT_MS'),
    APP_NAME: z.string().optional(),

    // Shared secret expected as `Authorization: Bearer <key>`.
    EMAIL_SERVICE_API_KEY: z.string().optional(),
    REQUIRE_AUTH: boolString('REQUIRE_AUTH').default('true'),

    // Comma-separated CORS allow-list. Empty allows any origin.
    ALLOWED_ORIGINS: z.string().optional().default(''),
    TRUST_PROXY: boolString('TRUST_PROXY'),
    LOG_REQUESTS: boolString('LOG_REQUESTS'),
    BODY_JSON_LIMIT: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.SMTP_FROM_EMAIL?.trim() && !z.string().email().safeParse(env.SMTP_FROM_EMAIL.trim()).success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SMTP_FROM_EMAIL'],
        message: 'SMTP_FROM_EMAIL must be an email address',
      });
    }

    if (env.NODE_ENV !== 'production') return;

    for (const key of ['SMTP_USER', 'SMTP_PASSWORD', 'SMTP_FROM_EMAIL'] as const) {
      if (!env[key]?.trim()) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required in production`,
        });
      }
    }

    if (isTruthy(env.REQUIRE_AUTH, true) && (env.EMAIL_SERVICE_API_KEY ?? '').trim().length < 16) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['EMAIL_SERVICE_API_KEY'],
        message: 'EMAIL_SERVICE_API_KEY is required in production when REQUIRE_AUTH is on (min 16 chars)',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function validateEnv<TSchema extends z.ZodTypeAny>(schema: TSchema) {
  return (config: Record<string, unknown>) => {
    const parsed = schema.safeParse(config);
    if (!parsed.success) {
      // Nest expects thrown errors to abort bootstrap.
      throw new Error(
        `Invalid environment variables:\n${parsed.error.issues
          .map((i) => `- ${i.path.join('.')}: ${i.message}`)
          .join('\n')}`,
      );
    }
    return parsed.data;
  };
}
