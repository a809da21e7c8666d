import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import { ApiTokenService } from './api-token.service';
import { AuthUser } from './auth-user';

/** Bearer authentication for the token API; fills `req.user` like the JWT strategy does. */
@Injectable()
export class ApiTokenGuard implements CanActivate {
  constructor(private readonly tokens: ApiTokenService) {}

  async canActivate(ctx: ExecutionContext) {
    const req = ctx.switchToHttp().getRequest<Request>();
    const header = req.headers.authorization ?? '';
    const [scheme, raw] = header.split(' ');
    if (scheme?.toLowerCase() !== 'bearer' || !raw) {
      throw new UnauthorizedException('missing_api_token');
    }

    const owner = await this.tokens.verify(raw.trim());
    if (!owner) throw new UnauthorizedException('invalid_api_token');

    const user: AuthUser = {
      userId: owner.id,
      username: owner.username,
      role: owner.role,
      via: 'api-token',
    };
    req.user = user;
    return true;
  }
}
