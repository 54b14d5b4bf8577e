import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import type { Request } from 'express';
import {
  PROFILE_ID_HEADER,
  ProfileCredentials,
  SECRET_TOKEN_HEADER,
} from '../../types/request.interface';

/**
 * Extracts profile credentials. The profile id comes from the `:id` route
 * parameter when the route has one, otherwise from `X-Profile-ID`.
 * Missing credentials are a 401; whether they match is the service's call.
 */
export const ProfileAuth = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): ProfileCredentials => {
    const req = ctx.switchToHttp().getRequest<Request>();
    const fromPath: unknown = req.params?.id;
    const profileId =
      typeof fromPath === 'string' && fromPath ? fromPath : req.header(PROFILE_ID_HEADER);
    const secretToken = req.header(SECRET_TOKEN_HEADER);
    if (!profileId || !secretToken) {
      throw new UnauthorizedException('Profile credentials required');
    }
    return { profileId, secretToken };
  },
);
