export { RegisterDto } from './register.dto';
export { LoginDto } from './login.dto';
export { RefreshTokenDto } from './refresh-token.dto';
export { AuthResponseDto, AccessTokenResponseDto } from './auth-response.dto';
