import { Injectable } from '@nestjs/common';
import { RedisStoreService } from '@user-service/redis';

/** Redis key for a revoked token, following the {domain}:{id}:{type} convention */
function revokedKey(jti: string): string {
  return `token:${jti}:revoked`;
}

/**
 * Blacklist of revoked refresh tokens, keyed by `jti`.
 *
 * Each entry expires together with the token it revokes, so the
 * blacklist never outgrows the set of still-valid refresh tokens.
 */
@Injectable()
export class RevokedTokenStore {
  constructor(private readonly store: RedisStoreService) {}

  revoke(jti: string, ttlSeconds: number): Promise<void> {
    return this.store.setWithTtl(revokedKey(jti), '1', ttlSeconds);
  }

  isRevoked(jti: string): Promise<boolean> {
    return this.store.exists(revokedKey(jti));
  }
}
