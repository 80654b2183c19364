/**
 * @user-service/proto
 *
 * Shared protobuf definition and TypeScript interfaces for the user
 * lookup gRPC service.
 *
 * - The proto file is consumed at runtime by @grpc/proto-loader
 * - TypeScript interfaces provide compile-time type safety
 * - gRPC exceptions provide a shared error contract
 */
import { join } from 'path';

// ── Proto File Paths ────────────────────────────────────

/** Absolute path to the user lookup proto file */
export const USER_PROTO_PATH: string = join(__dirname, 'user.proto');

// ── Package & Service Constants ─────────────────────────

/** gRPC package name matching the proto `package` directive */
export const USER_PACKAGE_NAME = 'user';

/** Service name for the user lookup gRPC service */
export const USER_SERVICE_NAME = 'UserService';

/** NestJS injection token for a consumer's user-service gRPC client */
export const USER_SERVICE_GRPC_CLIENT = 'USER_SERVICE_GRPC_CLIENT';

// ── TypeScript Interfaces ───────────────────────────────

export type {
  UserRequest,
  EmailRequest,
  TokenRequest,
  ListUsersRequest,
  UserData,
  UserResponse,
  TokenResponse,
  ListUsersResponse,
  UserServiceClient,
} from './interfaces';

// ── gRPC Exceptions ─────────────────────────────────────

export {
  GrpcNotFoundException,
  GrpcInternalException,
  grpcStatusOf,
} from './grpc-exceptions';
