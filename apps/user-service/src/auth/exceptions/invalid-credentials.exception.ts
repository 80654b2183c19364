import { UnauthorizedException } from '@nestjs/common';

/**
 * Thrown when login fails: unknown email, wrong password or a
 * deactivated account all produce the same body.
 *
 * HTTP 401 Unauthorized.
 */
export class InvalidCredentialsException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Invalid email or password.',
    });
  }
}
