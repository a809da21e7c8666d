import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { UsersService } from '../users/users.service';
import { AuthUser, JwtPayload } from './auth-user';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    cfg: ConfigService,
    private readonly users: UsersService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: cfg.getOrThrow<string>('JWT_SECRET'),
    });
  }

  /**
   * The token only names the account. Role and active flag come from the
   * stored user on every request, so a demotion or deactivation applies at once.
   */
  async validate(payload: JwtPayload): Promise<AuthUser> {
    const user = await this.users.requireActive(payload.sub);
    return { userId: user.id, username: user.username, role: user.role, via: 'jwt' };
  }
}
