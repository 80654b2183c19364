/**
 * TypeScript interfaces mirroring the user.proto definitions.
 *
 * Hand-written to match the proto contract without a code-generation step.
 * @grpc/proto-loader parses the proto at run time and converts field names
 * to camelCase (user_id → userId); these types give both sides compile-time
 * safety.
 *
 * proto3 leaves scalar fields at their default value off the wire, so a
 * request field the caller left empty arrives as `undefined`.
 */
import { Observable } from 'rxjs';

// ── Request Interfaces ──────────────────────────────────

export interface UserRequest {
  userId?: string;
}

export interface EmailRequest {
  email?: string;
}

export interface TokenRequest {
  token?: string;
}

export interface ListUsersRequest {
  page?: number;
  pageSize?: number;
}

// ── Response Interfaces ─────────────────────────────────

export interface UserData {
  id: string;
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  phoneNumber: string;
  isActive: boolean;
  isVerified: boolean;
  /** ISO-8601; empty string when unset */
  dateJoined: string;
}

export interface UserResponse {
  success: boolean;
  message: string;
  user?: UserData;
}

export interface TokenResponse {
  valid: boolean;
  message: string;
  userId: string;
  email: string;
}

export interface ListUsersResponse {
  success: boolean;
  users: UserData[];
  total: number;
}

// ── Service Client Interface ────────────────────────────
// Matches the gRPC service definition for use with NestJS ClientGrpc

export interface UserServiceClient {
  getUser(request: UserRequest): Observable<UserResponse>;
  getUserByEmail(request: EmailRequest): Observable<UserResponse>;
  validateToken(request: TokenRequest): Observable<TokenResponse>;
  listUsers(request: ListUsersRequest): Observable<ListUsersResponse>;
}
