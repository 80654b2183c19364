import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Not, QueryFailedError, Repository } from 'typeorm';
import { isUUID } from 'class-validator';
import { User } from '@user-service/database';

/** PostgreSQL SQLSTATE for unique_violation */
const PG_UNIQUE_VIOLATION = '23505';

export type NewUser = Pick<User, 'email' | 'passwordHash'> &
  Partial<Pick<User, 'username' | 'firstName' | 'lastName' | 'phoneNumber'>>;

export type ProfileChanges = Partial<
  Pick<User, 'username' | 'firstName' | 'lastName' | 'phoneNumber'>
>;

/** Lower-cases and trims an email so lookups and uniqueness are case-insensitive */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * True when `error` is a PostgreSQL unique-constraint violation, i.e. a
 * concurrent insert won the race for the same email.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === PG_UNIQUE_VIOLATION
  );
}

/**
 * UsersRepository — the credential store.
 *
 * Lookups by id or email ignore `isActive`; only the listing and the
 * active count filter on it.
 */
@Injectable()
export class UsersRepository {
  constructor(
    @InjectRepository(User)
    private readonly repository: Repository<User>,
  ) {}

  async findById(id: string): Promise<User | null> {
    // A non-UUID can never match and would make PostgreSQL raise a cast error
    if (!isUUID(id)) {
      return null;
    }
    return this.repository.findOne({ where: { id } });
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.repository.findOne({
      where: { email: normalizeEmail(email) },
    });
  }

  async isEmailTaken(email: string): Promise<boolean> {
    const count = await this.repository.count({
      where: { email: normalizeEmail(email) },
    });
    return count > 0;
  }

  async isUsernameTaken(username: string, exceptUserId: string): Promise<boolean> {
    const count = await this.repository.count({
      where: { username, id: Not(exceptUserId) },
    });
    return count > 0;
  }

  async countActive(): Promise<number> {
    return this.repository.count({ where: { isActive: true } });
  }

  /** Active users, newest first */
  async listActive(offset: number, limit: number): Promise<User[]> {
    return this.repository.find({
      where: { isActive: true },
      order: { createdAt: 'DESC' },
      skip: offset,
      take: limit,
    });
  }

  async create(data: NewUser): Promise<User> {
    const user = this.repository.create({
      ...data,
      email: normalizeEmail(data.email),
    });
    return this.repository.save(user);
  }

  async updateProfile(id: string, changes: ProfileChanges): Promise<void> {
    await this.repository.update(id, changes);
  }

  async updatePasswordHash(id: string, passwordHash: string): Promise<void> {
    await this.repository.update(id, { passwordHash });
  }

  async recordLogin(id: string, at: Date): Promise<void> {
    await this.repository.update(id, { lastLoginAt: at });
  }

  /** Soft delete: the row stays, the account is excluded from login and listings */
  async deactivate(id: string): Promise<void> {
    await this.repository.update(id, { isActive: false });
  }
}
