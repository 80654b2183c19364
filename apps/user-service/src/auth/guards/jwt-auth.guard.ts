import { Injectable, UnauthorizedException, Logger } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

/**
 * JWT Authentication Guard — requires a valid access token in the
 * `Authorization: Bearer` header.
 *
 * Overrides handleRequest to give descriptive 401 messages instead of
 * Passport's bare "Unauthorized".
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  private readonly logger = new Logger(JwtAuthGuard.name);

  handleRequest<TUser>(
    err: Error | null,
    user: TUser | false,
    info: Error | undefined,
  ): TUser {
    if (err) {
      this.logger.warn(`JWT auth error: ${err.message}`);
      throw err instanceof UnauthorizedException
        ? err
        : new UnauthorizedException(err.message);
    }

    if (!user) {
      const message = this.getFailureMessage(info);
      this.logger.debug(`JWT auth rejected: ${message}`);
      throw new UnauthorizedException(message);
    }

    return user;
  }

  private getFailureMessage(info: Error | undefined): string {
    if (!info) {
      return 'Authentication credentials were not provided.';
    }

    if (info.name === 'TokenExpiredError') {
      return 'Authentication token has expired.';
    }

    if (info.name === 'JsonWebTokenError') {
      return 'Invalid authentication token.';
    }

    return info.message || 'Authentication failed.';
  }
}
