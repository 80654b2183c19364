import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { UsersModule } from '../users/users.module';
import { TokensModule } from '../tokens';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { JwtStrategy } from './strategies/jwt.strategy';

/**
 * AuthModule — registration, login and the token lifecycle over HTTP.
 *
 * The JwtStrategy is registered here but works globally via Passport, so
 * other feature modules only need JwtAuthGuard from the barrel.
 */
@Module({
  imports: [
    UsersModule,
    TokensModule,
    PassportModule.register({ defaultStrategy: 'jwt' }),
  ],
  controllers: [AuthController],
  providers: [AuthService, JwtStrategy],
})
export class AuthModule {}
