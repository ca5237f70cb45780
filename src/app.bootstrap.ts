import { Logger } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import * as express from 'express';
import type { NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import { randomUUID } from 'node:crypto';
import { ApiExceptionFilter } from './common/filters/api-exception.filter';
import { BODY_ERROR_LOCAL, BodyErrorInterceptor, type BodyError } from './common/interceptors/body-error.interceptor';
import { AppConfigService } from './modules/app/app-config.service';

type BodyParserError = { status: number; type?: string; message: string };

function isBodyParserError(err: unknown): err is BodyParserError {
  return err instanceof Error && 'status' in err && typeof err.status === 'number';
}

function describeBodyError(err: unknown): BodyError {
  if (!isBodyParserError(err)) return { status: 400, error: 'Malformed JSON body' };
  if (err.status === 413) return { status: 413, error: 'Request body too large' };
  if (err.type === 'entity.parse.failed') return { status: err.status, error: 'Malformed JSON body' };
  return { status: err.status, error: err.message };
}

/**
 * Middleware and global filters shared by `main.ts` and the e2e specs.
 * Expects the app to be created with `{ bodyParser: false }`; JSON parsing is registered here
 * so malformed bodies get the same error shape as everything else, after auth.
 */
export function configureApp(app: NestExpressApplication, appConfig: AppConfigService): void {
  const logger = new Logger('HTTP');

  if (appConfig.trustProxy()) {
    // Only behind a trusted proxy (Railway, Cloudflare); otherwise req.ip is spoofable.
    app.set('trust proxy', 1);
  }

  app.use(
    helmet({
      crossOriginResourcePolicy: false,
      contentSecurityPolicy: false,
    }),
  );

  // Request id (for tracing + debugging). Returned as `x-request-id`.
  app.use((req: Request, res: Response, next: NextFunction) => {
    const incoming = String(req.headers['x-request-id'] ?? '').trim();
    const id = incoming || randomUUID();
    res.setHeader('x-request-id', id);
    res.locals.requestId = id;
    next();
  });

  if (!appConfig.isProd() && appConfig.logRequests()) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      const start = Date.now();
      const method = String(req.method || '');
      const path = String(req.originalUrl || req.url || '');
      res.on('finish', () => {
        const ms = Date.now() - start;
        const rid = String(res.getHeader('x-request-id') ?? '');
        logger.log(`${method} ${path} -> ${res.statusCode} (${ms}ms)${rid ? ` rid=${rid}` : ''}`);
      });
      next();
    });
  }

  app.enableCors({
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // Server-to-server callers send no Origin.
      if (!origin) return callback(null, true);
      if (appConfig.isOriginAllowed(origin)) return callback(null, true);
      appConfig.logCorsBlocked(origin);
      return callback(null, false);
    },
  });

  // Parse failures are parked on res.locals and raised by BodyErrorInterceptor after the guards run.
  const jsonParser = express.json({ limit: appConfig.bodyJsonLimit() });
  app.use((req: Request, res: Response, next: NextFunction) => {
    jsonParser(req, res, (err?: unknown) => {
      if (err) res.locals[BODY_ERROR_LOCAL] = describeBodyError(err);
      next();
    });
  });

  app.useGlobalFilters(new ApiExceptionFilter());
  app.useGlobalInterceptors(new BodyErrorInterceptor());
}
