import { Inject, Injectable, UnauthorizedException, Logger } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { Strategy, ExtractJwt } from 'passport-jwt';
import { appConfig } from '../../config/app.config';
import type { AppConfig } from '../../config/app.config';
import { UsersRepository } from '../../users/users.repository';
import type { TokenClaims } from '../../tokens';
import type { RequestUser } from '../interfaces';

/**
 * JWT Strategy — validates Bearer access tokens on protected routes.
 *
 * Flow:
 * 1. Passport extracts the JWT from the Authorization header
 * 2. passport-jwt verifies signature and expiry (HS256, shared secret)
 * 3. validate() rejects refresh tokens and tokens of missing or
 *    deactivated users
 * 4. The returned RequestUser is attached to request.user
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor(
    @Inject(appConfig.KEY)
    config: AppConfig,
    private readonly usersRepository: UsersRepository,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: config.jwt.secret,
      algorithms: ['HS256'],
    });
  }

  async validate(payload: Partial<TokenClaims>): Promise<RequestUser> {
    if (payload.token_type !== 'access') {
      throw new UnauthorizedException('Token has wrong type');
    }

    if (typeof payload.user_id !== 'string' || payload.user_id === '') {
      throw new UnauthorizedException(
        'Token contained no recognizable user identification',
      );
    }

    const user = await this.usersRepository.findById(payload.user_id);

    if (!user) {
      this.logger.warn(`JWT validation failed: user ${payload.user_id} not found`);
      throw new UnauthorizedException('User not found.');
    }

    if (!user.isActive) {
      this.logger.warn(`JWT validation failed: user ${payload.user_id} is deactivated`);
      throw new UnauthorizedException('User account is disabled.');
    }

    return {
      userId: user.id,
      email: user.email,
      isStaff: user.isStaff,
    };
  }
}
