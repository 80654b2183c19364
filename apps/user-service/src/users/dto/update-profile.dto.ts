import { IsOptional, IsString, MaxLength } from 'class-validator';

/**
 * DTO for PATCH/PUT /users/me.
 *
 * Only display attributes are writable here; email, flags and password
 * have their own flows (or none).
 */
export class UpdateProfileDto {
  @IsOptional()
  @IsString()
  @MaxLength(150)
  username?: string;

  @IsOptional()
  @IsString()
  @MaxLength(150)
  firstName?: string;

  @IsOptional()
  @IsString()
  @MaxLength(150)
  lastName?: string;

  @IsOptional()
  @IsString()
  @MaxLength(20)
  phoneNumber?: string;
}
