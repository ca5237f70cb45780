// Deterministic env for every spec: overrides whatever the shell exported.
Object.assign(process.env, {
  NODE_ENV: 'test',
  SMTP_HOST: 'smtp.example.test',
  SMTP_PORT: '587',
  SMTP_USE_TLS: 'true',
  SMTP_USER: 'relay@example.com',
  SMTP_PASSWORD: 'test-password',
  SMTP_FROM_EMAIL: 'relay@example.com',
  SMTP_FROM_NAME: 'StockFolio',
  SMTP_TIMEOUT_MS: '5000',
  APP_NAME: '',
  EMAIL_SERVICE_API_KEY: 'test-secret',
  REQUIRE_AUTH: 'true',
  ALLOWED_ORIGINS: '',
  LOG_REQUESTS: 'false',
});
