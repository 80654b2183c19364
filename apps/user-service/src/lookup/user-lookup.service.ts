import { Injectable, Logger } from '@nestjs/common';
import type {
  UserRequest,
  EmailRequest,
  TokenRequest,
  ListUsersRequest,
  UserResponse,
  TokenResponse,
  ListUsersResponse,
} from '@user-service/proto';
import { User } from '@user-service/database';
import { toPageWindow } from '../common/pagination';
import { UsersRepository } from '../users/users.repository';
import { TokenService, InvalidTokenException } from '../tokens';
import { toUserData } from './user-data.mapper';

export type LookupStatus = 'OK' | 'NOT_FOUND' | 'INTERNAL';

/**
 * A lookup result before it reaches the transport: the full response body,
 * the status the call should end with and, for non-OK statuses, the text
 * reported as status details.
 */
export interface LookupOutcome<TBody> {
  status: LookupStatus;
  body: TBody;
  detail?: string;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * UserLookupService — read-only queries for other services.
 *
 * Every method resolves; expected failures (unknown user, bad token,
 * disabled account) are described in the body, and store faults are
 * logged and reported with status INTERNAL and the error text.
 */
@Injectable()
export class UserLookupService {
  private readonly logger = new Logger(UserLookupService.name);

  constructor(
    private readonly usersRepository: UsersRepository,
    private readonly tokenService: TokenService,
  ) {}

  /** Finds a user by id regardless of isActive */
  getUser(request: UserRequest): Promise<LookupOutcome<UserResponse>> {
    const userId = request.userId ?? '';
    return this.findOne('GetUser', () => this.usersRepository.findById(userId));
  }

  /** Finds a user by email, case-insensitively, regardless of isActive */
  getUserByEmail(request: EmailRequest): Promise<LookupOutcome<UserResponse>> {
    const email = request.email ?? '';
    return this.findOne('GetUserByEmail', () => this.usersRepository.findByEmail(email));
  }

  async validateToken(request: TokenRequest): Promise<LookupOutcome<TokenResponse>> {
    try {
      const { userId } = await this.tokenService.verify(request.token ?? '', 'access');

      const user = await this.usersRepository.findById(userId);
      if (!user) {
        return { status: 'OK', body: this.invalidToken('User not found.') };
      }

      if (!user.isActive) {
        return { status: 'OK', body: this.invalidToken('User account is disabled.') };
      }

      return {
        status: 'OK',
        body: { valid: true, message: 'Token is valid.', userId: user.id, email: user.email },
      };
    } catch (error) {
      if (error instanceof InvalidTokenException) {
        return { status: 'OK', body: this.invalidToken(`Invalid token: ${error.detail}`) };
      }

      const message = messageOf(error);
      this.logger.error(`ValidateToken failed: ${message}`);
      return { status: 'INTERNAL', body: this.invalidToken(message), detail: message };
    }
  }

  /** Active users, newest first; out-of-range paging values are normalised */
  async listUsers(request: ListUsersRequest): Promise<LookupOutcome<ListUsersResponse>> {
    const window = toPageWindow(request.page, request.pageSize);

    try {
      const [users, total] = await Promise.all([
        this.usersRepository.listActive(window.offset, window.pageSize),
        this.usersRepository.countActive(),
      ]);

      return {
        status: 'OK',
        body: { success: true, users: users.map(toUserData), total },
      };
    } catch (error) {
      const message = messageOf(error);
      this.logger.error(`ListUsers failed: ${message}`);
      return {
        status: 'INTERNAL',
        body: { success: false, users: [], total: 0 },
        detail: message,
      };
    }
  }

  private async findOne(
    method: string,
    query: () => Promise<User | null>,
  ): Promise<LookupOutcome<UserResponse>> {
    try {
      const user = await query();
      if (!user) {
        return {
          status: 'NOT_FOUND',
          body: { success: false, message: 'User not found.' },
          detail: 'User not found.',
        };
      }

      return {
        status: 'OK',
        body: { success: true, message: 'User found.', user: toUserData(user) },
      };
    } catch (error) {
      const message = messageOf(error);
      this.logger.error(`${method} failed: ${message}`);
      return { status: 'INTERNAL', body: { success: false, message }, detail: message };
    }
  }

  private invalidToken(message: string): TokenResponse {
    return { valid: false, message, userId: '', email: '' };
  }
}
