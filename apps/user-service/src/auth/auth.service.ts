import { Injectable, Logger } from '@nestjs/common';
import { User } from '@user-service/database';
import { Result, ok, err } from '../common/result';
import { UsersRepository, isUniqueViolation } from '../users/users.repository';
import { PasswordHasher } from '../users/password-hasher.service';
import { checkNewPassword, PasswordPolicyError } from '../users/password-policy';
import { UserProfileDto } from '../users/dto';
import { TokenService, InvalidTokenException } from '../tokens';
import {
  RegisterDto,
  LoginDto,
  AuthResponseDto,
  AccessTokenResponseDto,
} from './dto';

export type RegisterError = PasswordPolicyError | 'EMAIL_TAKEN';

export type LoginError = 'INVALID_CREDENTIALS';

export type RefreshTokenError = 'INVALID_REFRESH_TOKEN';

/**
 * AuthService — registration, login, logout and access-token refresh.
 *
 * Expected failures come back as Result errors and are mapped to HTTP
 * exceptions by AuthController. Unknown email, wrong password and a
 * deactivated account are indistinguishable to the caller.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly usersRepository: UsersRepository,
    private readonly passwordHasher: PasswordHasher,
    private readonly tokenService: TokenService,
  ) {}

  async register(dto: RegisterDto): Promise<Result<AuthResponseDto, RegisterError>> {
    const policyError = checkNewPassword(dto.password, dto.passwordConfirm);
    if (policyError) {
      return err(policyError);
    }

    if (await this.usersRepository.isEmailTaken(dto.email)) {
      return err('EMAIL_TAKEN');
    }

    const passwordHash = await this.passwordHasher.hash(dto.password);

    let user: User;
    try {
      user = await this.usersRepository.create({
        email: dto.email,
        passwordHash,
        username: dto.username?.trim(),
        firstName: dto.firstName?.trim(),
        lastName: dto.lastName?.trim(),
        phoneNumber: dto.phoneNumber?.trim(),
      });
    } catch (error) {
      // Lost the race against a concurrent registration of the same email
      if (isUniqueViolation(error)) {
        return err('EMAIL_TAKEN');
      }
      throw error;
    }

    this.logger.log(`User registered: ${user.id} (${user.email})`);

    const tokens = await this.tokenService.issuePair(user.id);
    return ok(
      new AuthResponseDto(
        'User registered successfully.',
        UserProfileDto.fromEntity(user),
        tokens,
      ),
    );
  }

  async login(dto: LoginDto): Promise<Result<AuthResponseDto, LoginError>> {
    const user = await this.usersRepository.findByEmail(dto.email);

    if (!user) {
      // Still hash to prevent timing-based user enumeration
      await this.passwordHasher.hash(dto.password);
      this.logger.debug('Login rejected: unknown email');
      return err('INVALID_CREDENTIALS');
    }

    const isPasswordValid = await this.passwordHasher.verify(
      dto.password,
      user.passwordHash,
    );

    if (!isPasswordValid || !user.isActive) {
      this.logger.warn(`Login rejected for user ${user.id}`);
      return err('INVALID_CREDENTIALS');
    }

    const loggedInAt = new Date();
    await this.usersRepository.recordLogin(user.id, loggedInAt);
    user.lastLoginAt = loggedInAt;

    this.logger.log(`User logged in: ${user.id} (${user.email})`);

    const tokens = await this.tokenService.issuePair(user.id);
    return ok(
      new AuthResponseDto('Login successful.', UserProfileDto.fromEntity(user), tokens),
    );
  }

  /**
   * Revokes a refresh token owned by `userId`. A token issued to someone
   * else is treated like any other invalid token.
   */
  async logout(
    userId: string,
    refreshToken: string,
  ): Promise<Result<void, RefreshTokenError>> {
    try {
      const verified = await this.tokenService.verify(refreshToken, 'refresh');
      if (verified.userId !== userId) {
        this.logger.warn(`User ${userId} tried to revoke a token of user ${verified.userId}`);
        return err('INVALID_REFRESH_TOKEN');
      }

      await this.tokenService.revoke(refreshToken);
    } catch (error) {
      if (error instanceof InvalidTokenException) {
        this.logger.debug(`Logout rejected: ${error.detail}`);
        return err('INVALID_REFRESH_TOKEN');
      }
      throw error;
    }

    this.logger.log(`User logged out: ${userId}`);
    return ok(undefined);
  }

  /** Exchanges a valid refresh token of an active user for a new access token */
  async refresh(
    refreshToken: string,
  ): Promise<Result<AccessTokenResponseDto, RefreshTokenError>> {
    let userId: string;
    try {
      ({ userId } = await this.tokenService.verify(refreshToken, 'refresh'));
    } catch (error) {
      if (error instanceof InvalidTokenException) {
        this.logger.debug(`Refresh rejected: ${error.detail}`);
        return err('INVALID_REFRESH_TOKEN');
      }
      throw error;
    }

    const user = await this.usersRepository.findById(userId);
    if (!user || !user.isActive) {
      this.logger.warn(`Refresh rejected: user ${userId} is missing or inactive`);
      return err('INVALID_REFRESH_TOKEN');
    }

    const access = await this.tokenService.issueAccess(user.id);
    return ok(new AccessTokenResponseDto(access));
  }
}
