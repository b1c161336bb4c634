import { Injectable, CanActivate, ExecutionContext, ForbiddenException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import { getClientIp } from '../utils/request.util';

function matchesPrefix(ip: string, cidr: string): boolean {
  const [network, bitsText] = cidr.split('/');
  const bits = Number(bitsText);
  if (!network || !Number.isInteger(bits) || bits % 8 !== 0) return false;
  const octets = network.split('.').slice(0, bits / 8);
  const candidate = ip.replace(/^::ffff:/, '').split('.');
  return octets.every((octet, index) => candidate[index] === octet);
}

/**
 * Metrics Guard
 *
 * Restricts /metrics to the addresses in `METRICS_ALLOWED_IPS`. Entries are
 * exact addresses, `*`, or IPv4 networks on an octet boundary (`10.0.0.0/8`).
 */
@Injectable()
export class MetricsGuard implements CanActivate {
  private readonly allowedIps: string[];

  constructor(private configService: ConfigService) {
    this.allowedIps = this.configService.get<string[]>('metrics.allowedIps') ?? [
      '127.0.0.1',
      '::1',
      '::ffff:127.0.0.1',
    ];
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const clientIp = getClientIp(request);

    const isAllowed = this.allowedIps.some((allowedIp) => {
      if (allowedIp === '*') return true;
      if (allowedIp.includes('/')) return matchesPrefix(clientIp, allowedIp);
      return clientIp === allowedIp;
    });

    if (!isAllowed) {
      throw new ForbiddenException(`IP ${clientIp} is not allowed to read metrics`);
    }

    return true;
  }
}
