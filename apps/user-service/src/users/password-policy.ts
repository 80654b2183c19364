export type PasswordPolicyError = 'PASSWORD_MISMATCH' | 'PASSWORD_ENTIRELY_NUMERIC';

const ENTIRELY_NUMERIC = /^\d+$/;

/**
 * Checks a new password against its confirmation and the content rules.
 * Length limits are enforced by the request DTOs.
 */
export function checkNewPassword(
  password: string,
  confirmation: string,
): PasswordPolicyError | null {
  if (password !== confirmation) {
    return 'PASSWORD_MISMATCH';
  }
  if (ENTIRELY_NUMERIC.test(password)) {
    return 'PASSWORD_ENTIRELY_NUMERIC';
  }
  return null;
}
