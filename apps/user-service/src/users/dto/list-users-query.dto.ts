import { IsInt, IsOptional } from 'class-validator';

/**
 * Query string for GET /users.
 *
 * Values are coerced to numbers by the global ValidationPipe
 * (enableImplicitConversion); range normalisation happens in the service
 * so that out-of-range values are clamped rather than rejected.
 */
export class ListUsersQueryDto {
  @IsOptional()
  @IsInt()
  page?: number;

  @IsOptional()
  @IsInt()
  pageSize?: number;
}
