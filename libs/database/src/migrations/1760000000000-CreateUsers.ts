import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Creates the users table.
 *
 * Hand-written to match the User entity, since migration:generate needs a
 * live database. PostgreSQL-specific (uuid_generate_v4, timestamptz).
 */
export class CreateUsers1760000000000 implements MigrationInterface {
  name = 'CreateUsers1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    await queryRunner.query(`
      CREATE TABLE "users" (
        "id"            uuid NOT NULL DEFAULT uuid_generate_v4(),
        "email"         varchar(255) NOT NULL,
        "username"      varchar(150) NOT NULL DEFAULT '',
        "first_name"    varchar(150) NOT NULL DEFAULT '',
        "last_name"     varchar(150) NOT NULL DEFAULT '',
        "phone_number"  varchar(20) NOT NULL DEFAULT '',
        "password_hash" varchar(255) NOT NULL,
        "is_active"     boolean NOT NULL DEFAULT true,
        "is_staff"      boolean NOT NULL DEFAULT false,
        "is_verified"   boolean NOT NULL DEFAULT false,
        "created_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        "last_login_at" TIMESTAMPTZ,
        CONSTRAINT "PK_users" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_users_email" UNIQUE ("email")
      )
    `);

    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_users_email" ON "users" ("email")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_users_created_at" ON "users" ("created_at")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "users"`);
    await queryRunner.query(`DROP EXTENSION IF EXISTS "uuid-ossp"`);
  }
}
