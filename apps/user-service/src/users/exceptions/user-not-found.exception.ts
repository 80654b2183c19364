import { NotFoundException } from '@nestjs/common';

/**
 * Thrown when a user cannot be found by ID.
 */
export class UserNotFoundException extends NotFoundException {
  constructor(userId: string) {
    super(`User with ID "${userId}" not found`);
  }
}
