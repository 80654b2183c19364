import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ClientGrpc } from '@nestjs/microservices';
import { status as GrpcStatus } from '@grpc/grpc-js';
import { Observable, lastValueFrom, timeout, catchError, map, of, throwError } from 'rxjs';
import {
  USER_SERVICE_GRPC_CLIENT,
  USER_SERVICE_NAME,
  grpcStatusOf,
} from '@user-service/proto';
import type {
  UserServiceClient,
  UserData,
  TokenResponse,
  ListUsersResponse,
} from '@user-service/proto';

/** Default timeout for unary gRPC calls (in milliseconds) */
export const GRPC_UNARY_TIMEOUT_MS = 10_000;

/**
 * Type-safe wrapper around the raw gRPC client stub for user.UserService.
 *
 * Consuming services import UserLookupClientModule and inject this class;
 * every call returns a Promise and fails after GRPC_UNARY_TIMEOUT_MS.
 */
@Injectable()
export class UserLookupClient implements OnModuleInit {
  private readonly logger = new Logger(UserLookupClient.name);
  private grpcService!: UserServiceClient;

  constructor(
    @Inject(USER_SERVICE_GRPC_CLIENT)
    private readonly client: ClientGrpc,
  ) {}

  onModuleInit(): void {
    this.grpcService = this.client.getService<UserServiceClient>(USER_SERVICE_NAME);
    this.logger.log(`gRPC client initialized for ${USER_SERVICE_NAME}`);
  }

  /** Resolves to null when the user service answers NOT_FOUND */
  getUser(userId: string): Promise<UserData | null> {
    return this.findOne('GetUser', this.grpcService.getUser({ userId }));
  }

  /** Resolves to null when the user service answers NOT_FOUND */
  getUserByEmail(email: string): Promise<UserData | null> {
    return this.findOne('GetUserByEmail', this.grpcService.getUserByEmail({ email }));
  }

  /**
   * An invalid token is not an error: check `valid` on the response.
   */
  validateToken(token: string): Promise<TokenResponse> {
    return lastValueFrom(
      this.grpcService.validateToken({ token }).pipe(
        timeout(GRPC_UNARY_TIMEOUT_MS),
        catchError((error: unknown) => this.fail('ValidateToken', error)),
      ),
    );
  }

  listUsers(page: number, pageSize: number): Promise<ListUsersResponse> {
    return lastValueFrom(
      this.grpcService.listUsers({ page, pageSize }).pipe(
        // proto3 drops empty repeated fields from the wire
        map((response) => ({ ...response, users: response.users ?? [] })),
        timeout(GRPC_UNARY_TIMEOUT_MS),
        catchError((error: unknown) => this.fail('ListUsers', error)),
      ),
    );
  }

  private findOne(
    method: string,
    call: Observable<{ user?: UserData }>,
  ): Promise<UserData | null> {
    return lastValueFrom(
      call.pipe(
        timeout(GRPC_UNARY_TIMEOUT_MS),
        map((response) => response.user ?? null),
        catchError((error: unknown) =>
          grpcStatusOf(error) === GrpcStatus.NOT_FOUND
            ? of(null)
            : this.fail(method, error),
        ),
      ),
    );
  }

  private fail(method: string, error: unknown): Observable<never> {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`${method} failed: ${message}`);
    return throwError(() => error);
  }
}
