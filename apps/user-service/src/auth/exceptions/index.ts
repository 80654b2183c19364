export { EmailAlreadyExistsException } from './email-already-exists.exception';
export { InvalidCredentialsException } from './invalid-credentials.exception';
export { InvalidRefreshTokenException } from './invalid-refresh-token.exception';
