import { Module } from '@nestjs/common';
import { DatabaseModule } from '@user-service/database';
import { UsersRepository } from './users.repository';
import { PasswordHasher } from './password-hasher.service';
import { UsersService } from './users.service';
import { UsersController } from './users.controller';

/**
 * UsersModule — the credential store and profile management.
 *
 * Exports the repository and hasher so AuthModule and LookupModule share
 * one credential store.
 */
@Module({
  imports: [DatabaseModule.forFeature()],
  controllers: [UsersController],
  providers: [UsersRepository, PasswordHasher, UsersService],
  exports: [UsersRepository, PasswordHasher],
})
export class UsersModule {}
