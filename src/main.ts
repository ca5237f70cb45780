import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from '@nestjs/common';
import { AppModule } from './modules/app/app.module';
import { AppConfigService } from './modules/app/app-config.service';
import { configureApp } from './app.bootstrap';

async function bootstrap() {
  const startup = new Logger('Startup');
  const nodeEnv = (process.env.NODE_ENV ?? 'development').trim().toLowerCase();
  const isProd = nodeEnv === 'production';
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bodyParser: false,
    logger: isProd ? ['error', 'warn', 'log'] : ['error', 'warn', 'log', 'debug', 'verbose'],
  });

  const appConfig = app.get(AppConfigService);

  // Fail fast in production rather than 500 on the first send.
  const smtp = appConfig.smtp();
  if (!smtp) {
    if (appConfig.isProd()) {
      startup.error('SMTP_USER, SMTP_PASSWORD and SMTP_FROM_EMAIL must be set in production. Exiting.');
      process.exit(1);
    }
    startup.warn('SMTP is not configured; every send will fail with "SMTP not configured".');
  }
  if (appConfig.requireAuth() && !appConfig.apiKey()) {
    startup.warn('REQUIRE_AUTH is on but EMAIL_SERVICE_API_KEY is empty; all send requests will be rejected.');
  }
  if (!appConfig.requireAuth()) {
    startup.warn('REQUIRE_AUTH=false: send routes accept unauthenticated requests.');
  }

  if (!appConfig.isProd()) {
    startup.log(
      [
        `nodeEnv=${appConfig.nodeEnv()}`,
        `port=${appConfig.port()}`,
        `smtp=${smtp ? `${smtp.host}:${smtp.port} ${smtp.useStartTls ? 'starttls' : 'tls'}` : '(not configured)'}`,
        `requireAuth=${appConfig.requireAuth()}`,
        `allowedOrigins=${appConfig.allowedOrigins().join(',') || '(any)'}`,
        `bodyJsonLimit=${appConfig.bodyJsonLimit()}`,
      ].join(' | '),
    );
  }

  configureApp(app, appConfig);
  app.enableShutdownHooks();

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Email Service')
    .setDescription('Relays JSON requests as emails through an authenticated SMTP account.')
    .setVersion('1.0.0')
    .addBearerAuth()
    .build();
  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('docs', app, document);

  const port = appConfig.port();
  try {
    await app.listen(port, '0.0.0.0');
    startup.log(`Email service listening on port ${port}`);
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'EADDRINUSE') {
      startup.error(`Port ${port} is already in use.`);
    } else {
      startup.error(`Failed to start server: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  }
}

void bootstrap();
