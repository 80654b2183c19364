export { UserProfileDto } from './user-profile.dto';
export { UpdateProfileDto } from './update-profile.dto';
export { ChangePasswordDto } from './change-password.dto';
export { ListUsersQueryDto } from './list-users-query.dto';
export { UserListResponseDto } from './user-list-response.dto';
export { MessageResponseDto } from './message-response.dto';
