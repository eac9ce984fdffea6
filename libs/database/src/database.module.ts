import { Module, DynamicModule } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from './entities/user.entity';
import { CreateUsers1760000000000 } from './migrations/1760000000000-CreateUsers';

/** All entity classes registered in this database library */
const ENTITIES = [User] as const;

/** Migrations in the order they must run */
const MIGRATIONS = [CreateUsers1760000000000] as const;

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
  /**
   * Registers all entity repositories for injection.
   * Uses TypeOrmModule.forFeature under the hood.
   */
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

  /** Migration classes for TypeOrmModule.forRoot({ migrations }). */
  static get migrations(): ReadonlyArray<Function> {
    return MIGRATIONS;
  }
}
