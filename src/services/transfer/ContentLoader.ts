import { DatabaseConnection, SqlParam } from '../../types/database.js';
import { ContentRecordMap, ContentTableName } from '../../types/content.js';
import { contentSchema, SchemaDefinition } from '../../database/schema/contentSchema.js';
import { qualifiedName } from '../../database/schema/ddl.js';
import { buildBatchInsertQuery, InsertColumn } from '../../utils/sqlBuilder.js';
import { contentColumnMappings } from './columnMappings.js';
import { logger } from '../../utils/logging.js';

const TIMESTAMP_EXPRESSION = 'COALESCE(?, CURRENT_TIMESTAMP)';

/**
 * Writes record batches into the target schema
 *
 * Rows whose id is already present are skipped, so a batch can be loaded
 * again without duplicating anything.
 */
export class ContentLoader {
  constructor(
    private readonly db: DatabaseConnection,
    private readonly schema: SchemaDefinition = contentSchema
  ) {}

  /**
   * @returns number of rows actually inserted
   */
  async loadBatch<T extends ContentTableName>(
    table: T,
    records: readonly ContentRecordMap[T][]
  ): Promise<number> {
    if (records.length === 0) {
      return 0;
    }

    const mappings = contentColumnMappings[table];
    const columns: InsertColumn[] = mappings.map(mapping =>
      mapping.timestamp
        ? { column: mapping.column, expression: TIMESTAMP_EXPRESSION }
        : { column: mapping.column }
    );
    const rows: SqlParam[][] = records.map(record =>
      mappings.map(mapping => mapping.value(record))
    );

    const { query, values } = buildBatchInsertQuery(
      qualifiedName(this.schema, table, this.db.type),
      columns,
      rows,
      'id'
    );

    const result = await this.db.execute(query, values);

    logger.debug('[ContentLoader] Batch loaded', {
      table,
      received: records.length,
      inserted: result.affectedRows,
    });

    return result.affectedRows;
  }
}
