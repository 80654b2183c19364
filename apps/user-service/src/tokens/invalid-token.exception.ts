/** Detail strings carried by InvalidTokenException */
export const INVALID_TOKEN_DETAIL = {
  INVALID_OR_EXPIRED: 'Token is invalid or expired',
  WRONG_TYPE: 'Token has wrong type',
  NO_USER: 'Token contained no recognizable user identification',
  BLACKLISTED: 'Token is blacklisted',
} as const;

/**
 * Raised by TokenService when a token fails signature, expiry, type or
 * revocation checks. Transport-neutral: the HTTP layer maps it to 401/400,
 * the lookup service to `{ valid: false }`.
 */
export class InvalidTokenException extends Error {
  constructor(readonly detail: string) {
    super(detail);
    this.name = 'InvalidTokenException';
  }
}
