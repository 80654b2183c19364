export { TokensModule } from './tokens.module';
export { TokenService } from './token.service';
export {
  InvalidTokenException,
  INVALID_TOKEN_DETAIL,
} from './invalid-token.exception';
export type {
  TokenClaims,
  TokenPair,
  TokenType,
  VerifiedToken,
} from './token.interfaces';
