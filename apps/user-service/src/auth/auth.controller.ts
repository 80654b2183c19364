import {
  Controller,
  Post,
  Body,
  UseGuards,
  HttpCode,
  HttpStatus,
  HttpException,
} from '@nestjs/common';
import { AccountValidationException } from '../common/exceptions/account-validation.exception';
import { MessageResponseDto } from '../users/dto';
import { AuthService, RegisterError } from './auth.service';
import {
  RegisterDto,
  LoginDto,
  RefreshTokenDto,
  AuthResponseDto,
  AccessTokenResponseDto,
} from './dto';
import {
  EmailAlreadyExistsException,
  InvalidCredentialsException,
  InvalidRefreshTokenException,
} from './exceptions';
import { JwtAuthGuard } from './guards';
import { CurrentUser } from './decorators';
import type { RequestUser } from './interfaces';

function registerException(error: RegisterError): HttpException {
  switch (error) {
    case 'PASSWORD_MISMATCH':
      return new AccountValidationException('passwordConfirm', 'Passwords do not match.');
    case 'PASSWORD_ENTIRELY_NUMERIC':
      return new AccountValidationException('password', 'This password is entirely numeric.');
    case 'EMAIL_TAKEN':
      return new EmailAlreadyExistsException();
  }
}

/**
 * AuthController — REST endpoints for the token lifecycle.
 *
 * Routes:
 * - POST /auth/register  → Create an account and receive a token pair (public)
 * - POST /auth/login     → Authenticate and receive a token pair (public)
 * - POST /auth/logout    → Revoke a refresh token (protected)
 * - POST /auth/refresh   → Exchange a refresh token for an access token (public)
 */
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * @returns 201 Created with the profile and a token pair
   * @throws 400 Bad Request on password confirmation/content failures
   * @throws 409 Conflict if the email is already registered
   */
  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  async register(@Body() dto: RegisterDto): Promise<AuthResponseDto> {
    const result = await this.authService.register(dto);
    if (!result.ok) {
      throw registerException(result.error);
    }
    return result.value;
  }

  /**
   * @throws 401 Unauthorized if credentials are invalid or the account is disabled
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto): Promise<AuthResponseDto> {
    const result = await this.authService.login(dto);
    if (!result.ok) {
      throw new InvalidCredentialsException();
    }
    return result.value;
  }

  /**
   * @throws 400 Bad Request if the refresh token is invalid, expired,
   *   already revoked or not the caller's
   */
  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @UseGuards(JwtAuthGuard)
  async logout(
    @CurrentUser() user: RequestUser,
    @Body() dto: RefreshTokenDto,
  ): Promise<MessageResponseDto> {
    const result = await this.authService.logout(user.userId, dto.refresh);
    if (!result.ok) {
      throw new AccountValidationException('refresh', 'Invalid or expired token.');
    }
    return new MessageResponseDto('Logout successful.');
  }

  /**
   * @throws 401 Unauthorized if the refresh token is unusable
   */
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh(@Body() dto: RefreshTokenDto): Promise<AccessTokenResponseDto> {
    const result = await this.authService.refresh(dto.refresh);
    if (!result.ok) {
      throw new InvalidRefreshTokenException();
    }
    return result.value;
  }
}
