import { User } from '@user-service/database';
import { normalizeEmail } from '../users/users.repository';

/**
 * Array-backed stand-in for the read side of UsersRepository, with the
 * same matching and ordering rules as the PostgreSQL queries.
 */
export class InMemoryUsersRepository {
  constructor(private readonly users: User[] = []) {}

  async findById(id: string): Promise<User | null> {
    return this.users.find((user) => user.id === id) ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const normalized = normalizeEmail(email);
    return this.users.find((user) => user.email === normalized) ?? null;
  }

  async countActive(): Promise<number> {
    return this.active().length;
  }

  async listActive(offset: number, limit: number): Promise<User[]> {
    return this.active()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(offset, offset + limit);
  }

  private active(): User[] {
    return this.users.filter((user) => user.isActive);
  }
}
