import { User } from '@user-service/database';

/**
 * Public user profile data — never includes passwordHash.
 *
 * Uses a static factory method to enforce that we always map
 * from the entity explicitly.
 */
export class UserProfileDto {
  id: string;
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  phoneNumber: string;
  isActive: boolean;
  isVerified: boolean;
  dateJoined: Date;
  updatedAt: Date;

  private constructor(user: User) {
    this.id = user.id;
    this.email = user.email;
    this.username = user.username;
    this.firstName = user.firstName;
    this.lastName = user.lastName;
    this.phoneNumber = user.phoneNumber;
    this.isActive = user.isActive;
    this.isVerified = user.isVerified;
    this.dateJoined = user.createdAt;
    this.updatedAt = user.updatedAt;
  }

  /** The only way to construct this DTO */
  static fromEntity(user: User): UserProfileDto {
    return new UserProfileDto(user);
  }
}
