import {
  Injectable,
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import { RedisService } from '../../redis/redis.service';
import { AuditLoggerService } from '../services/audit-logger.service';
import { getClientIp } from '../utils/request.util';
import { getErrorMessage } from '../utils/error.util';
import { QUALIFICATION_CONSTANTS } from '../../qualification/types/qualification.types';

export class TooManyRequestsException extends HttpException {
  constructor(message: string) {
    super(message, HttpStatus.TOO_MANY_REQUESTS);
  }
}

/**
 * Fixed-window request counter per client IP, kept in Redis. Requests are
 * let through when Redis cannot be reached.
 */
@Injectable()
export class RateLimitingGuard implements CanActivate {
  private readonly logger = new Logger(RateLimitingGuard.name);

  constructor(
    private redisService: RedisService,
    private configService: ConfigService,
    private auditLogger: AuditLoggerService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();
    const ip = getClientIp(request);
    const key = `${QUALIFICATION_CONSTANTS.CACHE_KEYS.RATE_LIMIT_PREFIX}${ip}`;

    const windowSeconds = this.configService.get<number>('rateLimit.windowSeconds') || 60;
    const maxRequests = this.configService.get<number>('rateLimit.maxRequests') || 20;

    let requests: number;
    try {
      requests = await this.redisService.incr(key);
      if (requests === 1) {
        await this.redisService.expire(key, windowSeconds);
      }
    } catch (error) {
      this.logger.warn(`Rate limit check skipped: ${getErrorMessage(error)}`);
      return true;
    }

    if (requests > maxRequests) {
      this.auditLogger.logRateLimitExceeded(ip, request.path);
      throw new TooManyRequestsException('RATE_LIMIT_EXCEEDED');
    }

    return true;
  }
}
