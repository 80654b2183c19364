import { Module, DynamicModule } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from './entities/user.entity';

/** All entity classes registered in this database library */
const ENTITIES = [User] as const;

/**
 * DatabaseModule — registers the TypeORM entity repositories.
 *
 * @example
 * ```ts
 * @Module({
 *   imports: [DatabaseModule.forFeature()],
 * })
 * export class UsersModule {}
 * ```
 */
@Module({})
export class DatabaseModule {
  static forFeature(): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [TypeOrmModule.forFeature([...ENTITIES])],
      exports: [TypeOrmModule],
    };
  }

  /**
   * Returns the array of all entity classes.
   * Useful for passing to TypeOrmModule.forRoot({ entities }).
   */
  static get entities(): ReadonlyArray<Function> {
    return ENTITIES;
  }
}
