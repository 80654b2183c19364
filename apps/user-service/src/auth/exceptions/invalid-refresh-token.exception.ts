import { UnauthorizedException } from '@nestjs/common';

/** HTTP 401 for a refresh token that is invalid, expired, revoked or orphaned */
export class InvalidRefreshTokenException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Invalid or expired token.',
    });
  }
}
