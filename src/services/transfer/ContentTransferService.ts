import { DatabaseManager } from '../../database/DatabaseManager.js';
import { DatabaseConnection } from '../../types/database.js';
import { ContentTableName } from '../../types/content.js';
import { logger } from '../../utils/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { ContentLoader } from './ContentLoader.js';
import { DEFAULT_BATCH_SIZE, SqliteSourceReader } from './SqliteSourceReader.js';
import { TransferVerifier } from './TransferVerifier.js';

/**
 * Parents before children, so every foreign key resolves on insert
 */
export const TRANSFER_ORDER: readonly ContentTableName[] = [
  'film_work',
  'genre',
  'person',
  'genre_film_work',
  'person_film_work',
];

export interface TableTransferResult {
  table: ContentTableName;
  read: number;
  inserted: number;
  /** Rows whose id already existed in the target */
  skipped: number;
}

export interface TransferSummary {
  tables: TableTransferResult[];
  verified: boolean;
  durationMs: number;
}

export interface TransferRunOptions {
  verify?: boolean;
}

export interface ContentTransferOptions {
  batchSize?: number;
}

/**
 * ContentTransferService
 *
 * Copies the legacy SQLite catalog into the content schema:
 * - All tables load inside one target transaction; any failure rolls back everything
 * - Rows already present (by id) are skipped, so a run can be repeated
 * - Optionally re-reads the source afterwards and compares every row
 */
export class ContentTransferService {
  private readonly reader: SqliteSourceReader;
  private readonly batchSize: number;

  constructor(
    source: DatabaseConnection,
    private readonly target: DatabaseManager,
    options: ContentTransferOptions = {}
  ) {
    this.reader = new SqliteSourceReader(source);
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  async run(options: TransferRunOptions = {}): Promise<TransferSummary> {
    const verify = options.verify ?? true;
    const startTime = Date.now();

    logger.info('[ContentTransferService] Starting transfer', {
      batchSize: this.batchSize,
      targetType: this.target.getDatabaseType(),
    });

    let tables: TableTransferResult[];
    try {
      tables = await this.target.transaction(async connection => {
        const loader = new ContentLoader(connection);
        const results: TableTransferResult[] = [];
        for (const table of TRANSFER_ORDER) {
          results.push(await this.transferTable(table, loader));
        }
        return results;
      });
    } catch (error) {
      logger.error('[ContentTransferService] Transfer failed, target rolled back', {
        error: getErrorMessage(error),
      });
      throw error;
    }

    if (verify) {
      const verifier = new TransferVerifier(
        this.reader,
        this.target.getConnection(),
        this.batchSize
      );
      for (const table of TRANSFER_ORDER) {
        await verifier.verifyTable(table);
      }
    }

    const summary: TransferSummary = {
      tables,
      verified: verify,
      durationMs: Date.now() - startTime,
    };

    logger.info('[ContentTransferService] Transfer complete', {
      tables: tables.map(t => `${t.table}: ${t.inserted}/${t.read}`),
      verified: verify,
      durationMs: summary.durationMs,
    });

    return summary;
  }

  private async transferTable<T extends ContentTableName>(
    table: T,
    loader: ContentLoader
  ): Promise<TableTransferResult> {
    let read = 0;
    let inserted = 0;

    for await (const records of this.reader.readRecords(table, this.batchSize)) {
      read += records.length;
      inserted += await loader.loadBatch(table, records);
    }

    const result = { table, read, inserted, skipped: read - inserted };
    logger.info(`[ContentTransferService] ${table}: read ${read}, inserted ${inserted}`);
    return result;
  }
}
