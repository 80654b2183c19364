export type TokenType = 'access' | 'refresh';

/**
 * Claims signed into every token. `jti` and `exp` are set through the
 * signing options rather than the payload.
 */
export interface TokenClaims {
  user_id: string;
  token_type: TokenType;
  jti: string;
  iat: number;
  exp: number;
}

export interface VerifiedToken {
  userId: string;
  tokenType: TokenType;
  jti: string;
  expiresAt: Date;
}

export interface TokenPair {
  access: string;
  refresh: string;
}
