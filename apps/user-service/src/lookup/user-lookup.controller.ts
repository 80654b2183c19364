import { Controller } from '@nestjs/common';
import { GrpcMethod } from '@nestjs/microservices';
import {
  USER_SERVICE_NAME,
  GrpcNotFoundException,
  GrpcInternalException,
} from '@user-service/proto';
import type {
  UserRequest,
  EmailRequest,
  TokenRequest,
  ListUsersRequest,
  UserResponse,
  TokenResponse,
  ListUsersResponse,
} from '@user-service/proto';
import { UserLookupService, LookupOutcome } from './user-lookup.service';

/**
 * Returns the body of an OK outcome; any other status ends the call with
 * the matching gRPC code and the outcome's detail text.
 */
function unwrap<TBody>(outcome: LookupOutcome<TBody>): TBody {
  switch (outcome.status) {
    case 'OK':
      return outcome.body;
    case 'NOT_FOUND':
      throw new GrpcNotFoundException(outcome.detail ?? 'Not found');
    case 'INTERNAL':
      throw new GrpcInternalException(outcome.detail ?? 'Internal error');
  }
}

/**
 * gRPC controller for user.UserService.
 *
 * Maps proto RPC methods to NestJS handler methods; all four are unary.
 */
@Controller()
export class UserLookupController {
  constructor(private readonly userLookupService: UserLookupService) {}

  @GrpcMethod(USER_SERVICE_NAME, 'GetUser')
  async getUser(request: UserRequest): Promise<UserResponse> {
    const outcome = await this.userLookupService.getUser(request);
    return unwrap(outcome);
  }

  @GrpcMethod(USER_SERVICE_NAME, 'GetUserByEmail')
  async getUserByEmail(request: EmailRequest): Promise<UserResponse> {
    const outcome = await this.userLookupService.getUserByEmail(request);
    return unwrap(outcome);
  }

  @GrpcMethod(USER_SERVICE_NAME, 'ValidateToken')
  async validateToken(request: TokenRequest): Promise<TokenResponse> {
    const outcome = await this.userLookupService.validateToken(request);
    return unwrap(outcome);
  }

  @GrpcMethod(USER_SERVICE_NAME, 'ListUsers')
  async listUsers(request: ListUsersRequest): Promise<ListUsersResponse> {
    const outcome = await this.userLookupService.listUsers(request);
    return unwrap(outcome);
  }
}
