import { ConflictException } from '@nestjs/common';

/**
 * Thrown when registering with an email that belongs to any existing
 * account, active or not.
 *
 * HTTP 409 Conflict.
 */
export class EmailAlreadyExistsException extends ConflictException {
  constructor() {
    super({
      statusCode: 409,
      error: 'Conflict',
      field: 'email',
      message: 'A user with this email already exists.',
    });
  }
}
