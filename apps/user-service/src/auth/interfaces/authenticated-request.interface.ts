/**
 * Shape of request.user after JWT validation.
 * Populated by JwtStrategy.validate() and attached by Passport.
 */
export interface RequestUser {
  userId: string;
  email: string;
  isStaff: boolean;
}
