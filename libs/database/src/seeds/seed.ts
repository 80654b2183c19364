import { Logger } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import AppDataSource from '../data-source';
import { User } from '../entities/user.entity';

/**
 * Seed script — populates the users table with demo accounts.
 *
 * Usage:
 *   npm run build && npm run migration:run && npm run seed
 *
 * Idempotent: truncates the users table before inserting.
 * Every demo account uses the password "password123".
 */

const DEMO_PASSWORD = 'password123';
const SEED_SALT_ROUNDS = 10;

interface SeedUser {
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  isActive: boolean;
  isStaff: boolean;
  isVerified: boolean;
}

const USERS: SeedUser[] = [
  {
    email: 'admin@example.com',
    username: 'admin',
    firstName: 'Ada',
    lastName: 'Admin',
    isActive: true,
    isStaff: true,
    isVerified: true,
  },
  {
    email: 'alice@example.com',
    username: 'alice',
    firstName: 'Alice',
    lastName: 'Johnson',
    isActive: true,
    isStaff: false,
    isVerified: true,
  },
  {
    email: 'bob@example.com',
    username: 'bob',
    firstName: 'Bob',
    lastName: 'Smith',
    isActive: true,
    isStaff: false,
    isVerified: false,
  },
  {
    email: 'charlie@example.com',
    username: 'charlie',
    firstName: 'Charlie',
    lastName: 'Brown',
    isActive: false,
    isStaff: false,
    isVerified: false,
  },
];

async function seed(): Promise<void> {
  const logger = new Logger('Seed');

  logger.log('Initializing data source...');
  await AppDataSource.initialize();

  const queryRunner = AppDataSource.createQueryRunner();
  await queryRunner.connect();
  await queryRunner.startTransaction();

  try {
    logger.log('Truncating users...');
    await queryRunner.query('TRUNCATE TABLE users CASCADE');

    const passwordHash = await bcrypt.hash(DEMO_PASSWORD, SEED_SALT_ROUNDS);

    const userRepo = queryRunner.manager.getRepository(User);
    const savedUsers = await userRepo.save(
      USERS.map((u) => userRepo.create({ ...u, passwordHash })),
    );

    await queryRunner.commitTransaction();
    logger.log(`✅ Seed completed: ${savedUsers.length} users inserted`);
  } catch (error) {
    logger.error('Seed failed, rolling back transaction...');
    await queryRunner.rollbackTransaction();
    throw error;
  } finally {
    await queryRunner.release();
    await AppDataSource.destroy();
  }
}

seed().catch((error: Error) => {
  // eslint-disable-next-line no-console
  console.error('Fatal seed error:', error.message);
  process.exit(1);
});
