import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { RedisModule } from '@user-service/redis';
import { appConfig } from '../config/app.config';
import type { AppConfig } from '../config/app.config';
import { TokenService } from './token.service';
import { RevokedTokenStore } from './revoked-token.store';

/**
 * TokensModule — JWT signing/verification and the refresh-token blacklist.
 *
 * Imported by both the HTTP account endpoints and the gRPC lookup service;
 * neither talks to JwtModule or Redis directly.
 */
@Module({
  imports: [
    JwtModule.registerAsync({
      inject: [appConfig.KEY],
      useFactory: (config: AppConfig) => ({
        secret: config.jwt.secret,
        signOptions: { algorithm: 'HS256' },
        verifyOptions: { algorithms: ['HS256'] },
      }),
    }),

    RedisModule.forRootAsync({
      inject: [appConfig.KEY],
      useFactory: (config: AppConfig) => config.redis,
    }),
  ],
  providers: [TokenService, RevokedTokenStore],
  exports: [TokenService],
})
export class TokensModule {}
