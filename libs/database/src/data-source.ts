import { config } from 'dotenv';
import { DataSource, DataSourceOptions } from 'typeorm';
import { join } from 'path';

import { User } from './entities/user.entity';

/**
 * Load env vars from the project root .env file.
 * Supports running from both source and dist/ layouts.
 */
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../../../.env') });

/**
 * TypeORM DataSource for CLI-driven migrations and the seed script.
 *
 * Used by `typeorm migration:run` / `migration:revert`. Credentials come
 * from the same POSTGRES_* variables the service reads at startup.
 */
const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env['POSTGRES_HOST'] || 'localhost',
  port: parseInt(process.env['POSTGRES_PORT'] || '5432', 10),
  username: process.env['POSTGRES_USER'] || 'users',
  password: process.env['POSTGRES_PASSWORD'] || 'users_secret',
  database: process.env['POSTGRES_DB'] || 'users',
  entities: [User],
  migrations: [join(__dirname, 'migrations', '*{.ts,.js}')],
  synchronize: false,
  logging: process.env['NODE_ENV'] !== 'production',
};

const AppDataSource = new DataSource(dataSourceOptions);

export default AppDataSource;
