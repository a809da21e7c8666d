import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request } from 'express';
import { CAPABILITIES_KEY } from './roles.constant';
import { Capability, can } from './roles';
import { isAuthUser } from './auth-user';

/** Runs after an authentication guard; checks the `@Requires(...)` capabilities. */
@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private reflector: Reflector) {}

  canActivate(ctx: ExecutionContext): boolean {
    const required = this.reflector.getAllAndOverride<Capability[] | undefined>(CAPABILITIES_KEY, [
      ctx.getHandler(),
      ctx.getClass(),
    ]);
    if (!required || required.length === 0) return true;

    const req = ctx.switchToHttp().getRequest<Request>();
    const user: unknown = req.user;
    if (!isAuthUser(user)) return false;

    return required.every((capability) => can(user.role, capability));
  }
}
