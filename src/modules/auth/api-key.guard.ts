import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import { AppConfigService } from '../app/app-config.service';
import { bearerTokenFromHeader, safeEqual } from './auth.utils';

/**
 * Shared-secret auth for callers (the web backend). With REQUIRE_AUTH on, the token
 * must equal EMAIL_SERVICE_API_KEY exactly; with no key configured nothing gets through.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private readonly appConfig: AppConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    if (!this.appConfig.requireAuth()) return true;

    const req = context.switchToHttp().getRequest<Request>();
    const token = bearerTokenFromHeader(req.headers.authorization);
    const apiKey = this.appConfig.apiKey();
    if (!token || !apiKey || !safeEqual(token, apiKey)) throw new UnauthorizedException('Unauthorized');
    return true;
  }
}
