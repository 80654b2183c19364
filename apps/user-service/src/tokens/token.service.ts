import { Inject, Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { randomUUID } from 'crypto';
import { appConfig } from '../config/app.config';
import type { AppConfig } from '../config/app.config';
import { RevokedTokenStore } from './revoked-token.store';
import {
  InvalidTokenException,
  INVALID_TOKEN_DETAIL,
} from './invalid-token.exception';
import type {
  TokenClaims,
  TokenPair,
  TokenType,
  VerifiedToken,
} from './token.interfaces';

/**
 * TokenService — issues and verifies the signed access/refresh pair.
 *
 * Both token types share one HS256 secret and are told apart by the
 * `token_type` claim. Access tokens are stateless; refresh tokens can be
 * revoked, which records their `jti` in Redis until natural expiry.
 */
@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly revokedTokens: RevokedTokenStore,
    @Inject(appConfig.KEY)
    private readonly config: AppConfig,
  ) {}

  async issuePair(userId: string): Promise<TokenPair> {
    const [access, refresh] = await Promise.all([
      this.sign(userId, 'access'),
      this.sign(userId, 'refresh'),
    ]);
    return { access, refresh };
  }

  issueAccess(userId: string): Promise<string> {
    return this.sign(userId, 'access');
  }

  /**
   * Verifies signature, expiry and type; refresh tokens are also checked
   * against the blacklist.
   *
   * @throws InvalidTokenException on any token-level failure
   */
  async verify(
    token: string,
    expectedType: TokenType = 'access',
  ): Promise<VerifiedToken> {
    let claims: Partial<TokenClaims>;
    try {
      claims = await this.jwtService.verifyAsync<Partial<TokenClaims>>(token);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Token rejected: ${reason}`);
      throw new InvalidTokenException(INVALID_TOKEN_DETAIL.INVALID_OR_EXPIRED);
    }

    if (claims.token_type !== expectedType) {
      throw new InvalidTokenException(INVALID_TOKEN_DETAIL.WRONG_TYPE);
    }

    if (typeof claims.user_id !== 'string' || claims.user_id === '') {
      throw new InvalidTokenException(INVALID_TOKEN_DETAIL.NO_USER);
    }

    if (typeof claims.jti !== 'string' || typeof claims.exp !== 'number') {
      throw new InvalidTokenException(INVALID_TOKEN_DETAIL.INVALID_OR_EXPIRED);
    }

    if (expectedType === 'refresh' && (await this.revokedTokens.isRevoked(claims.jti))) {
      throw new InvalidTokenException(INVALID_TOKEN_DETAIL.BLACKLISTED);
    }

    return {
      userId: claims.user_id,
      tokenType: expectedType,
      jti: claims.jti,
      expiresAt: new Date(claims.exp * 1000),
    };
  }

  /**
   * Blacklists a refresh token for the rest of its lifetime.
   *
   * @throws InvalidTokenException if the token is not a valid, unrevoked refresh token
   */
  async revoke(refreshToken: string): Promise<VerifiedToken> {
    const verified = await this.verify(refreshToken, 'refresh');
    const remainingSeconds = (verified.expiresAt.getTime() - Date.now()) / 1000;

    await this.revokedTokens.revoke(verified.jti, remainingSeconds);
    this.logger.log(`Refresh token ${verified.jti} revoked for user ${verified.userId}`);

    return verified;
  }

  private sign(userId: string, tokenType: TokenType): Promise<string> {
    const expiresIn =
      tokenType === 'access'
        ? this.config.jwt.accessTtlSeconds
        : this.config.jwt.refreshTtlSeconds;

    return this.jwtService.signAsync(
      { user_id: userId, token_type: tokenType },
      { expiresIn, jwtid: randomUUID() },
    );
  }
}
