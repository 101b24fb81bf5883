import { DatabaseConnection } from '../../types/database.js';
import { ContentRecordMap, ContentTableName } from '../../types/content.js';
import { parseLegacyRow } from '../../validation/contentSchemas.js';
import { ValidationError } from '../../errors/index.js';
import { MAX_TRANSFER_BATCH_SIZE } from '../../config/defaults.js';

export const DEFAULT_BATCH_SIZE = 100;

type LegacyRow = Record<string, unknown>;

/**
 * Reads the legacy SQLite catalog page by page.
 *
 * Pages are taken in rowid order so that consecutive reads of an unchanged
 * file return the same rows in the same batches.
 */
export class SqliteSourceReader {
  constructor(private readonly source: DatabaseConnection) {}

  async *readBatches(
    table: ContentTableName,
    batchSize: number = DEFAULT_BATCH_SIZE
  ): AsyncGenerator<LegacyRow[]> {
    if (!Number.isInteger(batchSize) || batchSize < 1 || batchSize > MAX_TRANSFER_BATCH_SIZE) {
      throw new ValidationError(
        `Batch size must be an integer between 1 and ${MAX_TRANSFER_BATCH_SIZE}`,
        {
          service: 'SqliteSourceReader',
          operation: 'readBatches',
          metadata: { table, batchSize },
        }
      );
    }

    let offset = 0;
    while (true) {
      const rows = await this.source.query<LegacyRow>(
        `SELECT * FROM ${table} ORDER BY rowid LIMIT ? OFFSET ?`,
        [batchSize, offset]
      );

      if (rows.length === 0) {
        return;
      }

      yield rows;

      if (rows.length < batchSize) {
        return;
      }
      offset += rows.length;
    }
  }

  /**
   * Same batches, validated and mapped to records
   */
  async *readRecords<T extends ContentTableName>(
    table: T,
    batchSize: number = DEFAULT_BATCH_SIZE
  ): AsyncGenerator<ContentRecordMap[T][]> {
    for await (const rows of this.readBatches(table, batchSize)) {
      yield rows.map(row => parseLegacyRow(table, row));
    }
  }
}
