import { Test } from '@nestjs/testing';
import { JwtModule, JwtService } from '@nestjs/jwt';
import { appConfig } from '../config/app.config';
import { TokenService } from './token.service';
import { RevokedTokenStore } from './revoked-token.store';
import {
  InvalidTokenException,
  INVALID_TOKEN_DETAIL,
} from './invalid-token.exception';

const SECRET = 'test-secret';
const USER_ID = '0d6f2f7e-5a44-4c3b-9e53-1b7a8f6c2d10';

/** In-memory stand-in for the Redis-backed blacklist */
class InMemoryRevokedTokenStore {
  readonly entries = new Map<string, number>();

  async revoke(jti: string, ttlSeconds: number): Promise<void> {
    this.entries.set(jti, ttlSeconds);
  }

  async isRevoked(jti: string): Promise<boolean> {
    return this.entries.has(jti);
  }
}

async function expectInvalid(promise: Promise<unknown>, detail: string): Promise<void> {
  await expect(promise).rejects.toBeInstanceOf(InvalidTokenException);
  await expect(promise).rejects.toMatchObject({ detail });
}

describe('TokenService', () => {
  let tokenService: TokenService;
  let revokedTokens: InMemoryRevokedTokenStore;

  beforeEach(async () => {
    revokedTokens = new InMemoryRevokedTokenStore();

    const moduleRef = await Test.createTestingModule({
      imports: [JwtModule.register({ secret: SECRET })],
      providers: [
        TokenService,
        { provide: RevokedTokenStore, useValue: revokedTokens },
        {
          provide: appConfig.KEY,
          useValue: { jwt: { secret: SECRET, accessTtlSeconds: 900, refreshTtlSeconds: 604_800 } },
        },
      ],
    }).compile();

    tokenService = moduleRef.get(TokenService);
  });

  it('issues an access/refresh pair bound to the user', async () => {
    const { access, refresh } = await tokenService.issuePair(USER_ID);

    const verifiedAccess = await tokenService.verify(access, 'access');
    const verifiedRefresh = await tokenService.verify(refresh, 'refresh');

    expect(verifiedAccess.userId).toBe(USER_ID);
    expect(verifiedAccess.tokenType).toBe('access');
    expect(verifiedRefresh.userId).toBe(USER_ID);
    expect(verifiedRefresh.jti).not.toBe(verifiedAccess.jti);
  });

  it('gives the refresh token a longer lifetime than the access token', async () => {
    const { access, refresh } = await tokenService.issuePair(USER_ID);

    const verifiedAccess = await tokenService.verify(access, 'access');
    const verifiedRefresh = await tokenService.verify(refresh, 'refresh');

    const accessSeconds = (verifiedAccess.expiresAt.getTime() - Date.now()) / 1000;
    const refreshSeconds = (verifiedRefresh.expiresAt.getTime() - Date.now()) / 1000;
    expect(accessSeconds).toBeLessThanOrEqual(900);
    expect(refreshSeconds).toBeGreaterThan(900);
  });

  it('rejects a token signed with another key', async () => {
    const forged = await new JwtService({ secret: 'other-secret' }).signAsync(
      { user_id: USER_ID, token_type: 'access' },
      { expiresIn: 60, jwtid: 'forged' },
    );

    await expectInvalid(tokenService.verify(forged), INVALID_TOKEN_DETAIL.INVALID_OR_EXPIRED);
  });

  it('rejects an expired token', async () => {
    const expired = await new JwtService({ secret: SECRET }).signAsync(
      { user_id: USER_ID, token_type: 'access' },
      { expiresIn: -10, jwtid: 'expired' },
    );

    await expectInvalid(tokenService.verify(expired), INVALID_TOKEN_DETAIL.INVALID_OR_EXPIRED);
  });

  it('rejects garbage', async () => {
    await expectInvalid(tokenService.verify('not.a.jwt'), INVALID_TOKEN_DETAIL.INVALID_OR_EXPIRED);
    await expectInvalid(tokenService.verify(''), INVALID_TOKEN_DETAIL.INVALID_OR_EXPIRED);
  });

  it('rejects a refresh token where an access token is expected and vice versa', async () => {
    const { access, refresh } = await tokenService.issuePair(USER_ID);

    await expectInvalid(tokenService.verify(refresh, 'access'), INVALID_TOKEN_DETAIL.WRONG_TYPE);
    await expectInvalid(tokenService.verify(access, 'refresh'), INVALID_TOKEN_DETAIL.WRONG_TYPE);
  });

  it('rejects a token without a user id', async () => {
    const anonymous = await new JwtService({ secret: SECRET }).signAsync(
      { token_type: 'access' },
      { expiresIn: 60, jwtid: 'anonymous' },
    );

    await expectInvalid(tokenService.verify(anonymous), INVALID_TOKEN_DETAIL.NO_USER);
  });

  describe('revoke', () => {
    it('blacklists the refresh token for its remaining lifetime', async () => {
      const { refresh } = await tokenService.issuePair(USER_ID);
      const { jti } = await tokenService.verify(refresh, 'refresh');

      await tokenService.revoke(refresh);

      const ttl = revokedTokens.entries.get(jti);
      expect(ttl).toBeGreaterThan(604_790);
      expect(ttl).toBeLessThanOrEqual(604_800);
      await expectInvalid(tokenService.verify(refresh, 'refresh'), INVALID_TOKEN_DETAIL.BLACKLISTED);
    });

    it('refuses to revoke the same token twice', async () => {
      const { refresh } = await tokenService.issuePair(USER_ID);
      await tokenService.revoke(refresh);

      await expectInvalid(tokenService.revoke(refresh), INVALID_TOKEN_DETAIL.BLACKLISTED);
    });

    it('refuses access tokens', async () => {
      const { access } = await tokenService.issuePair(USER_ID);

      await expectInvalid(tokenService.revoke(access), INVALID_TOKEN_DETAIL.WRONG_TYPE);
      expect(revokedTokens.entries.size).toBe(0);
    });

    it('leaves access tokens of the same user usable', async () => {
      const { access, refresh } = await tokenService.issuePair(USER_ID);
      await tokenService.revoke(refresh);

      await expect(tokenService.verify(access)).resolves.toMatchObject({ userId: USER_ID });
    });
  });
});
