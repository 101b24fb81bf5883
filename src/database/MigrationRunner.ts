import { DatabaseConnection, Migration } from '../types/database.js';
import { ContentSchemaMigration } from './migrations/20240601_001_content_schema.js';
import { rollbackAfterError } from './DatabaseManager.js';
import { MigrationError } from '../errors/index.js';
import { logger } from '../utils/logging.js';
import { toError } from '../utils/errorHandling.js';

interface MigrationRecord {
  version: string;
}

export interface MigrationStatus {
  version: string;
  name: string;
  executed: boolean;
}

/**
 * Known migrations, oldest first
 */
export const MIGRATIONS: readonly Migration[] = [
  {
    version: ContentSchemaMigration.version,
    name: ContentSchemaMigration.migrationName,
    up: ContentSchemaMigration.up,
    down: ContentSchemaMigration.down,
  },
];

/**
 * Migration Runner
 *
 * Applies migrations in version order, one transaction per migration, and
 * records each in the `migrations` ledger table.
 */
export class MigrationRunner {
  private db: DatabaseConnection;
  private migrations: readonly Migration[];

  constructor(db: DatabaseConnection, migrations: readonly Migration[] = MIGRATIONS) {
    this.db = db;
    this.migrations = [...migrations].sort((a, b) => a.version.localeCompare(b.version));
  }

  async ensureMigrationTable(): Promise<void> {
    await this.db.execute(`
      CREATE TABLE IF NOT EXISTS migrations (
        version VARCHAR(255) PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        executed_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  async getExecutedMigrations(): Promise<string[]> {
    const results = await this.db.query<MigrationRecord>(
      'SELECT version FROM migrations ORDER BY version'
    );
    return results.map(row => row.version);
  }

  async migrate(): Promise<string[]> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();
    const applied: string[] = [];

    for (const migration of this.migrations) {
      if (executedMigrations.includes(migration.version)) {
        continue;
      }

      logger.info(`[MigrationRunner] Running migration: ${migration.version} - ${migration.name}`);

      await this.db.beginTransaction();
      try {
        await migration.up(this.db);
        await this.db.execute('INSERT INTO migrations (version, name) VALUES (?, ?)', [
          migration.version,
          migration.name,
        ]);
        await this.db.commit();
      } catch (error) {
        await rollbackAfterError(this.db, 'MigrationRunner');
        throw new MigrationError(
          migration.version,
          'up',
          `Migration failed: ${migration.version} - ${toError(error).message}`,
          { service: 'MigrationRunner', operation: 'migrate' },
          toError(error)
        );
      }

      applied.push(migration.version);
      logger.info(`[MigrationRunner] Migration completed: ${migration.version}`);
    }

    return applied;
  }

  /**
   * Undo applied migrations newer than `targetVersion`, newest first.
   * Without a target every applied migration is undone.
   */
  async rollback(targetVersion?: string): Promise<string[]> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();
    const rolledBack: string[] = [];

    const migrationsToRollback = this.migrations
      .filter(migration => executedMigrations.includes(migration.version))
      .reverse();

    for (const migration of migrationsToRollback) {
      if (targetVersion && migration.version <= targetVersion) {
        break;
      }

      logger.info(`[MigrationRunner] Rolling back migration: ${migration.version} - ${migration.name}`);

      await this.db.beginTransaction();
      try {
        await migration.down(this.db);
        await this.db.execute('DELETE FROM migrations WHERE version = ?', [migration.version]);
        await this.db.commit();
      } catch (error) {
        await rollbackAfterError(this.db, 'MigrationRunner');
        throw new MigrationError(
          migration.version,
          'down',
          `Rollback failed: ${migration.version} - ${toError(error).message}`,
          { service: 'MigrationRunner', operation: 'rollback' },
          toError(error)
        );
      }

      rolledBack.push(migration.version);
      logger.info(`[MigrationRunner] Rollback completed: ${migration.version}`);
    }

    return rolledBack;
  }

  async status(): Promise<MigrationStatus[]> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();

    return this.migrations.map(migration => ({
      version: migration.version,
      name: migration.name,
      executed: executedMigrations.includes(migration.version),
    }));
  }
}
