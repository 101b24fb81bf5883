/**
 * ContentTransferService Tests
 *
 * Legacy source and target are both in-memory SQLite databases; the target
 * carries the content schema.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ContentTransferService, TRANSFER_ORDER } from '../../../src/services/transfer/ContentTransferService.js';
import { ContentLoader } from '../../../src/services/transfer/ContentLoader.js';
import { SqliteSourceReader } from '../../../src/services/transfer/SqliteSourceReader.js';
import { TransferVerifier } from '../../../src/services/transfer/TransferVerifier.js';
import { DatabaseManager } from '../../../src/database/DatabaseManager.js';
import { SqliteConnection } from '../../../src/database/connections/SqliteConnection.js';
import { applyContentSchema } from '../../../src/database/schema/applySchema.js';
import {
  ForeignKeyViolationError,
  SchemaValidationError,
  TransferVerificationError,
} from '../../../src/errors/index.js';
import { ContentTableName } from '../../../src/types/content.js';
import { createLegacySource, IDS, LEGACY_CREATED } from '../../utils/testDatabase.js';

describe('legacy transfer', () => {
  let source: SqliteConnection;
  let target: DatabaseManager;

  async function count(table: ContentTableName): Promise<number> {
    const row = await target.getConnection().get<{ count: number }>(`SELECT COUNT(*) AS count FROM ${table}`);
    return row?.count ?? 0;
  }

  beforeEach(async () => {
    source = await createLegacySource();
    target = new DatabaseManager({ type: 'sqlite3', database: 'test', filename: ':memory:' });
    await target.connect();
    await applyContentSchema(target.getConnection());
  });

  afterEach(async () => {
    await target.disconnect();
    await source.close();
  });

  describe('ContentTransferService', () => {
    it('should load parents before children', () => {
      expect(TRANSFER_ORDER).toEqual([
        'film_work',
        'genre',
        'person',
        'genre_film_work',
        'person_film_work',
      ]);
    });

    it('should copy every table and verify it', async () => {
      const service = new ContentTransferService(source, target, { batchSize: 2 });

      const summary = await service.run({ verify: true });

      expect(summary.verified).toBe(true);
      expect(summary.tables).toEqual([
        { table: 'film_work', read: 3, inserted: 3, skipped: 0 },
        { table: 'genre', read: 2, inserted: 2, skipped: 0 },
        { table: 'person', read: 2, inserted: 2, skipped: 0 },
        { table: 'genre_film_work', read: 2, inserted: 2, skipped: 0 },
        { table: 'person_film_work', read: 2, inserted: 2, skipped: 0 },
      ]);

      const film = await target.getConnection().get(
        'SELECT id, title, description, creation_date, rating, type, created, modified FROM film_work WHERE id = ?',
        [IDS.film1]
      );
      expect(film).toEqual({
        id: IDS.film1,
        title: 'Night Harbor',
        description: 'A quiet thriller',
        creation_date: '2021-03-04',
        rating: 7.5,
        type: 'movie',
        created: LEGACY_CREATED,
        modified: LEGACY_CREATED,
      });
    });

    it('should fill missing timestamps with the current time', async () => {
      await new ContentTransferService(source, target).run({ verify: false });

      const person = await target
        .getConnection()
        .get<{ created: string | null; modified: string | null }>(
          'SELECT created, modified FROM person WHERE id = ?',
          [IDS.person2]
        );
      expect(person?.created).toEqual(expect.any(String));
      expect(person?.modified).toEqual(expect.any(String));
    });

    it('should skip rows already present on a second run', async () => {
      const service = new ContentTransferService(source, target, { batchSize: 2 });
      await service.run();

      const second = await service.run();

      expect(second.tables.map(t => [t.table, t.inserted, t.skipped])).toEqual([
        ['film_work', 0, 3],
        ['genre', 0, 2],
        ['person', 0, 2],
        ['genre_film_work', 0, 2],
        ['person_film_work', 0, 2],
      ]);
      expect(await count('film_work')).toBe(3);
    });

    it('should roll back everything when a row is invalid', async () => {
      await source.execute("UPDATE person SET full_name = '' WHERE id = ?", [IDS.person2]);

      await expect(new ContentTransferService(source, target).run()).rejects.toThrow(
        SchemaValidationError
      );

      for (const table of TRANSFER_ORDER) {
        expect(await count(table)).toBe(0);
      }
    });

    it('should roll back when a link points at a missing film', async () => {
      await source.execute(
        'INSERT INTO genre_film_work (id, film_work_id, genre_id, created_at) VALUES (?, ?, ?, NULL)',
        ['00000000-0000-4000-8000-0000000000e9', '00000000-0000-4000-8000-0000000000f9', IDS.genre1]
      );

      await expect(new ContentTransferService(source, target).run()).rejects.toThrow(
        ForeignKeyViolationError
      );
      expect(await count('film_work')).toBe(0);
    });

    it('should skip verification when asked', async () => {
      const summary = await new ContentTransferService(source, target).run({ verify: false });

      expect(summary.verified).toBe(false);
    });
  });

  describe('ContentLoader', () => {
    it('should report only the rows it inserted', async () => {
      const loader = new ContentLoader(target.getConnection());
      const genre = { id: IDS.genre1, name: 'Drama', description: null, created: null, modified: null };

      expect(await loader.loadBatch('genre', [genre])).toBe(1);
      expect(
        await loader.loadBatch('genre', [
          genre,
          { ...genre, id: IDS.genre2, name: 'Comedy' },
        ])
      ).toBe(1);
      expect(await loader.loadBatch('genre', [])).toBe(0);
      expect(await count('genre')).toBe(2);
    });
  });

  describe('TransferVerifier', () => {
    let verifier: TransferVerifier;

    beforeEach(async () => {
      await new ContentTransferService(source, target).run({ verify: false });
      verifier = new TransferVerifier(new SqliteSourceReader(source), target.getConnection(), 2);
    });

    it('should pass for an exact copy', async () => {
      await expect(verifier.verifyTable('film_work')).resolves.toEqual({
        table: 'film_work',
        checked: 3,
      });
    });

    it('should ignore differing timestamps', async () => {
      await target.execute('UPDATE person SET modified = CURRENT_TIMESTAMP');

      await expect(verifier.verifyTable('person')).resolves.toEqual({ table: 'person', checked: 2 });
    });

    it('should list mismatched and missing ids', async () => {
      await target.execute("UPDATE film_work SET title = 'Changed' WHERE id = ?", [IDS.film1]);
      await target.execute('DELETE FROM film_work WHERE id = ?', [IDS.film3]);

      const error = await verifier.verifyTable('film_work').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransferVerificationError);
      if (error instanceof TransferVerificationError) {
        expect(error.table).toBe('film_work');
        expect(error.mismatchedIds).toEqual([IDS.film1]);
        expect(error.missingIds).toEqual([IDS.film3]);
        expect(error.message).toBe(
          "Transfer verification failed for 'film_work': 1 missing, 1 mismatched"
        );
      }
    });

    it('should detect a changed rating', async () => {
      await target.execute('UPDATE film_work SET rating = 8 WHERE id = ?', [IDS.film1]);

      await expect(verifier.verifyTable('film_work')).rejects.toThrow(TransferVerificationError);
    });
  });
});
