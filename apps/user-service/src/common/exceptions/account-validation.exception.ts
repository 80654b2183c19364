import { BadRequestException } from '@nestjs/common';

/**
 * Thrown when an account mutation is rejected by a business rule
 * (password confirmation, password content, username uniqueness, an
 * invalid refresh token on logout).
 *
 * HTTP 400 Bad Request. `field` names the request property at fault.
 */
export class AccountValidationException extends BadRequestException {
  constructor(field: string, message: string) {
    super({
      statusCode: 400,
      error: 'Bad Request',
      field,
      message,
    });
  }
}
