import { Injectable, Logger } from '@nestjs/common';
import { User } from '@user-service/database';
import { Result, ok, err } from '../common/result';
import { toPageWindow } from '../common/pagination';
import { UsersRepository, ProfileChanges } from './users.repository';
import { PasswordHasher } from './password-hasher.service';
import { checkNewPassword, PasswordPolicyError } from './password-policy';
import {
  UpdateProfileDto,
  ChangePasswordDto,
  UserListResponseDto,
  UserProfileDto,
} from './dto';

export type UpdateProfileError = 'USER_NOT_FOUND' | 'USERNAME_TAKEN';

export type ChangePasswordError =
  | 'USER_NOT_FOUND'
  | 'OLD_PASSWORD_INCORRECT'
  | PasswordPolicyError;

const PROFILE_FIELDS = ['username', 'firstName', 'lastName', 'phoneNumber'] as const;

/**
 * UsersService — profile management for the authenticated user and the
 * staff-only user directory.
 *
 * Expected failures come back as Result errors; only store faults throw.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    private readonly usersRepository: UsersRepository,
    private readonly passwordHasher: PasswordHasher,
  ) {}

  findById(userId: string): Promise<User | null> {
    return this.usersRepository.findById(userId);
  }

  async updateProfile(
    userId: string,
    dto: UpdateProfileDto,
  ): Promise<Result<User, UpdateProfileError>> {
    const changes: ProfileChanges = {};
    for (const field of PROFILE_FIELDS) {
      const value = dto[field];
      if (value !== undefined) {
        changes[field] = value.trim();
      }
    }

    if (
      changes.username &&
      (await this.usersRepository.isUsernameTaken(changes.username, userId))
    ) {
      return err('USERNAME_TAKEN');
    }

    if (Object.keys(changes).length > 0) {
      await this.usersRepository.updateProfile(userId, changes);
    }

    const updated = await this.usersRepository.findById(userId);
    if (!updated) {
      return err('USER_NOT_FOUND');
    }

    this.logger.log(`Profile updated: ${userId}`);
    return ok(updated);
  }

  async changePassword(
    userId: string,
    dto: ChangePasswordDto,
  ): Promise<Result<void, ChangePasswordError>> {
    const user = await this.usersRepository.findById(userId);
    if (!user) {
      return err('USER_NOT_FOUND');
    }

    const oldPasswordMatches = await this.passwordHasher.verify(
      dto.oldPassword,
      user.passwordHash,
    );
    if (!oldPasswordMatches) {
      return err('OLD_PASSWORD_INCORRECT');
    }

    const policyError = checkNewPassword(dto.newPassword, dto.newPasswordConfirm);
    if (policyError) {
      return err(policyError);
    }

    const passwordHash = await this.passwordHasher.hash(dto.newPassword);
    await this.usersRepository.updatePasswordHash(userId, passwordHash);

    this.logger.log(`Password changed for user: ${user.id} (${user.email})`);
    return ok(undefined);
  }

  async deactivate(userId: string): Promise<Result<void, 'USER_NOT_FOUND'>> {
    const user = await this.usersRepository.findById(userId);
    if (!user) {
      return err('USER_NOT_FOUND');
    }

    await this.usersRepository.deactivate(userId);

    this.logger.log(`User deactivated: ${user.id} (${user.email})`);
    return ok(undefined);
  }

  /** Active users, newest first, with the same paging rules as the gRPC ListUsers */
  async listActive(page?: number, pageSize?: number): Promise<UserListResponseDto> {
    const window = toPageWindow(page, pageSize);

    const [users, total] = await Promise.all([
      this.usersRepository.listActive(window.offset, window.pageSize),
      this.usersRepository.countActive(),
    ]);

    return {
      users: users.map((user) => UserProfileDto.fromEntity(user)),
      total,
      page: window.page,
      pageSize: window.pageSize,
    };
  }
}
