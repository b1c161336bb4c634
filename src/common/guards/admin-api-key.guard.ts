import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import type { Request } from 'express';
import { AuditLoggerService } from '../services/audit-logger.service';
import { getClientIp } from '../utils/request.util';

export const ADMIN_KEY_HEADER = 'x-admin-key';

function keysEqual(expected: string, provided: string): boolean {
  const left = Buffer.from(expected);
  const right = Buffer.from(provided);
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

/**
 * Admin API Key Guard
 *
 * Admin endpoints require the configured key in the `x-admin-key` header.
 * With no key configured every admin request is refused.
 */
@Injectable()
export class AdminApiKeyGuard implements CanActivate {
  constructor(
    private configService: ConfigService,
    private auditLogger: AuditLoggerService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const header = request.headers[ADMIN_KEY_HEADER];
    const provided = Array.isArray(header) ? header[0] : header;
    const expected = this.configService.get<string>('admin.apiKey');

    if (!expected) {
      return this.deny(request, provided, 'Admin API key is not configured');
    }
    if (!provided) {
      return this.deny(request, provided, 'Missing admin API key');
    }
    if (!keysEqual(expected, provided)) {
      return this.deny(request, provided, 'Invalid admin API key');
    }

    return true;
  }

  private deny(request: Request, provided: string | undefined, reason: string): never {
    this.auditLogger.logAdminAccessDenied(getClientIp(request), provided, reason);
    throw new UnauthorizedException(reason);
  }
}
