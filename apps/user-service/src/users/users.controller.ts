import {
  Controller,
  Get,
  Patch,
  Put,
  Delete,
  Post,
  Body,
  Param,
  Query,
  UseGuards,
  HttpCode,
  HttpStatus,
  HttpException,
  ParseUUIDPipe,
} from '@nestjs/common';
import { AccountValidationException } from '../common/exceptions/account-validation.exception';
import { JwtAuthGuard, StaffGuard } from '../auth/guards';
import { CurrentUser } from '../auth/decorators';
import type { RequestUser } from '../auth/interfaces';
import { UsersService, ChangePasswordError, UpdateProfileError } from './users.service';
import { UserNotFoundException } from './exceptions/user-not-found.exception';
import {
  UserProfileDto,
  UpdateProfileDto,
  ChangePasswordDto,
  ListUsersQueryDto,
  UserListResponseDto,
  MessageResponseDto,
} from './dto';

function updateProfileException(userId: string, error: UpdateProfileError): HttpException {
  switch (error) {
    case 'USER_NOT_FOUND':
      return new UserNotFoundException(userId);
    case 'USERNAME_TAKEN':
      return new AccountValidationException('username', 'This username is already taken.');
  }
}

function changePasswordException(userId: string, error: ChangePasswordError): HttpException {
  switch (error) {
    case 'USER_NOT_FOUND':
      return new UserNotFoundException(userId);
    case 'OLD_PASSWORD_INCORRECT':
      return new AccountValidationException('oldPassword', 'Old password is incorrect.');
    case 'PASSWORD_MISMATCH':
      return new AccountValidationException('newPasswordConfirm', 'New passwords do not match.');
    case 'PASSWORD_ENTIRELY_NUMERIC':
      return new AccountValidationException('newPassword', 'This password is entirely numeric.');
  }
}

/**
 * UsersController — the authenticated user's own account, plus the
 * staff-only user directory.
 *
 * Routes:
 * - GET    /users/me           → Current profile
 * - PATCH  /users/me           → Update profile fields
 * - PUT    /users/me           → Same as PATCH
 * - DELETE /users/me           → Deactivate own account
 * - POST   /users/me/password  → Change password
 * - GET    /users              → List active users (staff)
 * - GET    /users/:id          → Any user by id (staff)
 */
@Controller('users')
@UseGuards(JwtAuthGuard)
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get('me')
  async getMe(@CurrentUser() user: RequestUser): Promise<UserProfileDto> {
    const found = await this.usersService.findById(user.userId);
    if (!found) {
      throw new UserNotFoundException(user.userId);
    }
    return UserProfileDto.fromEntity(found);
  }

  @Patch('me')
  updateMe(
    @CurrentUser() user: RequestUser,
    @Body() dto: UpdateProfileDto,
  ): Promise<UserProfileDto> {
    return this.applyProfileUpdate(user.userId, dto);
  }

  @Put('me')
  replaceMe(
    @CurrentUser() user: RequestUser,
    @Body() dto: UpdateProfileDto,
  ): Promise<UserProfileDto> {
    return this.applyProfileUpdate(user.userId, dto);
  }

  @Delete('me')
  @HttpCode(HttpStatus.OK)
  async deactivateMe(@CurrentUser() user: RequestUser): Promise<MessageResponseDto> {
    const result = await this.usersService.deactivate(user.userId);
    if (!result.ok) {
      throw new UserNotFoundException(user.userId);
    }
    return new MessageResponseDto('Account deactivated successfully.');
  }

  @Post('me/password')
  @HttpCode(HttpStatus.OK)
  async changePassword(
    @CurrentUser() user: RequestUser,
    @Body() dto: ChangePasswordDto,
  ): Promise<MessageResponseDto> {
    const result = await this.usersService.changePassword(user.userId, dto);
    if (!result.ok) {
      throw changePasswordException(user.userId, result.error);
    }
    return new MessageResponseDto('Password changed successfully.');
  }

  @Get()
  @UseGuards(StaffGuard)
  list(@Query() query: ListUsersQueryDto): Promise<UserListResponseDto> {
    return this.usersService.listActive(query.page, query.pageSize);
  }

  /**
   * @throws 404 Not Found when the user does not exist or `id` is not a UUID
   */
  @Get(':id')
  @UseGuards(StaffGuard)
  async getById(
    @Param('id', new ParseUUIDPipe({ errorHttpStatusCode: HttpStatus.NOT_FOUND }))
    id: string,
  ): Promise<UserProfileDto> {
    const user = await this.usersService.findById(id);
    if (!user) {
      throw new UserNotFoundException(id);
    }
    return UserProfileDto.fromEntity(user);
  }

  private async applyProfileUpdate(
    userId: string,
    dto: UpdateProfileDto,
  ): Promise<UserProfileDto> {
    const result = await this.usersService.updateProfile(userId, dto);
    if (!result.ok) {
      throw updateProfileException(userId, result.error);
    }
    return UserProfileDto.fromEntity(result.value);
  }
}
