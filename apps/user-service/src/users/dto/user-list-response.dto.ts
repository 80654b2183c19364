import { UserProfileDto } from './user-profile.dto';

/** Response body for GET /users */
export class UserListResponseDto {
  users!: UserProfileDto[];

  /** Count of all active users, independent of the page window */
  total!: number;

  page!: number;
  pageSize!: number;
}
