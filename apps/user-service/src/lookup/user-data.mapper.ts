import { User } from '@user-service/database';
import type { UserData } from '@user-service/proto';

/** Projects a stored user onto the wire record; the password hash never leaves */
export function toUserData(user: User): UserData {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    firstName: user.firstName,
    lastName: user.lastName,
    phoneNumber: user.phoneNumber,
    isActive: user.isActive,
    isVerified: user.isVerified,
    dateJoined: user.createdAt instanceof Date ? user.createdAt.toISOString() : '',
  };
}
