import { IsNotEmpty, IsString } from 'class-validator';

/** Body of POST /auth/logout and POST /auth/refresh */
export class RefreshTokenDto {
  @IsString()
  @IsNotEmpty({ message: 'Refresh token is required' })
  refresh!: string;
}
