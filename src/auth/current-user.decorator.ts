import { ExecutionContext, UnauthorizedException, createParamDecorator } from '@nestjs/common';
import type { Request } from 'express';
import { AuthUser, isAuthUser } from './auth-user';

export function currentUserOf(ctx: ExecutionContext): AuthUser {
  const req = ctx.switchToHttp().getRequest<Request>();
  const user: unknown = req.user;
  if (!isAuthUser(user)) throw new UnauthorizedException();
  return user;
}

export const CurrentUser = createParamDecorator((_data: unknown, ctx: ExecutionContext) => currentUserOf(ctx));
