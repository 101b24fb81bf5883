import { DatabaseConnection } from '../../types/database.js';
import { applyContentSchema, dropContentSchema } from '../schema/applySchema.js';

/**
 * Content Schema Migration
 *
 * Creates the catalog in the `content` namespace:
 * - film_work, person, genre
 * - person_film_work and genre_film_work junction tables
 *
 * FOREIGN KEY CASCADE RULES:
 * - Junction rows are removed with their film, person or genre (ON DELETE CASCADE)
 *
 * Statements are IF NOT EXISTS, so running `up` against a database that
 * already has the tables (e.g. created by hand from the printed script)
 * records the migration without failing.
 */
export class ContentSchemaMigration {
  static version = '20240601_001';
  static migrationName = 'content_schema';

  static async up(db: DatabaseConnection): Promise<void> {
    await applyContentSchema(db);
  }

  static async down(db: DatabaseConnection): Promise<void> {
    await dropContentSchema(db);
  }
}
