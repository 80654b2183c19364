import { Inject, Injectable } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import { appConfig } from '../config/app.config';
import type { AppConfig } from '../config/app.config';

/**
 * Salted one-way password hashing with bcrypt.
 * Salt rounds come from BCRYPT_SALT_ROUNDS (default 12).
 */
@Injectable()
export class PasswordHasher {
  constructor(
    @Inject(appConfig.KEY)
    private readonly config: AppConfig,
  ) {}

  hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.config.bcryptSaltRounds);
  }

  /** Timing-safe comparison of a plaintext password against a stored hash */
  verify(password: string, passwordHash: string): Promise<boolean> {
    return bcrypt.compare(password, passwordHash);
  }
}
