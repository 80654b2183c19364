import type { TokenPair } from '../../tokens';
import { UserProfileDto } from '../../users/dto';

/** Response shape for successful register/login */
export class AuthResponseDto {
  constructor(
    readonly message: string,
    readonly user: UserProfileDto,
    readonly tokens: TokenPair,
  ) {}
}

/** Response shape for POST /auth/refresh */
export class AccessTokenResponseDto {
  constructor(readonly access: string) {}
}
