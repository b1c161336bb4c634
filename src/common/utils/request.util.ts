import type { Request } from 'express';

/**
 * Client address, preferring the first hop of `x-forwarded-for`.
 */
export function getClientIp(request: Request): string {
  const forwarded = request.headers['x-forwarded-for'];
  const first = Array.isArray(forwarded) ? forwarded[0] : forwarded?.split(',')[0];
  return first?.trim() || request.ip || request.socket.remoteAddress || 'unknown';
}
