import type { ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import { safeEqual } from '../../utils/constant-time';
import { SERVICE_TOKEN_HEADER } from '../../types/request.interface';

/** True when the request carries the configured service token. */
export function hasServiceToken(req: Pick<Request, 'headers'>, expected: string): boolean {
  if (!expected) return false;
  const provided = req.headers[SERVICE_TOKEN_HEADER];
  return typeof provided === 'string' && provided.length > 0 && safeEqual(expected, provided);
}

export function serviceTokenSkip(expected: string) {
  return (context: ExecutionContext): boolean =>
    context.getType() === 'http' &&
    hasServiceToken(context.switchToHttp().getRequest<Request>(), expected);
}
