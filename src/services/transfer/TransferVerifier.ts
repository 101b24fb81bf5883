import { DatabaseConnection, SqlParam } from '../../types/database.js';
import { ContentTableName } from '../../types/content.js';
import { contentSchema, getTable, SchemaDefinition } from '../../database/schema/contentSchema.js';
import { qualifiedName } from '../../database/schema/ddl.js';
import { inClausePlaceholders } from '../../utils/sqlBuilder.js';
import { TransferVerificationError } from '../../errors/index.js';
import { logger } from '../../utils/logging.js';
import { contentColumnMappings } from './columnMappings.js';
import { DEFAULT_BATCH_SIZE, SqliteSourceReader } from './SqliteSourceReader.js';

export interface TableVerificationResult {
  table: ContentTableName;
  checked: number;
}

type TargetRow = Record<string, unknown>;

function valuesEqual(expected: SqlParam, actual: unknown): boolean {
  const normalized = actual === undefined ? null : actual;
  if (typeof expected === 'number' && typeof normalized === 'string') {
    return expected === Number(normalized);
  }
  return expected === normalized;
}

/**
 * Compares the target schema with the legacy source, table by table.
 *
 * Only business columns are compared: timestamps may have been defaulted on
 * load. uuid and date columns are read back as text so both dialects
 * return the same representation.
 */
export class TransferVerifier {
  constructor(
    private readonly reader: SqliteSourceReader,
    private readonly target: DatabaseConnection,
    private readonly batchSize: number = DEFAULT_BATCH_SIZE,
    private readonly schema: SchemaDefinition = contentSchema
  ) {}

  async verifyTable<T extends ContentTableName>(table: T): Promise<TableVerificationResult> {
    const mappings = contentColumnMappings[table].filter(mapping => !mapping.timestamp);
    const definition = getTable(table, this.schema);

    const selectList = mappings
      .map(mapping => {
        const column = definition.columns.find(c => c.name === mapping.column);
        const asText = column?.type === 'uuid' || column?.type === 'date';
        return asText ? `CAST(${mapping.column} AS TEXT) AS ${mapping.column}` : mapping.column;
      })
      .join(', ');
    const target = qualifiedName(this.schema, table, this.target.type);

    const missingIds: string[] = [];
    const mismatchedIds: string[] = [];
    let checked = 0;

    for await (const records of this.reader.readRecords(table, this.batchSize)) {
      const ids = records.map(record => record.id);
      const rows = await this.target.query<TargetRow>(
        `SELECT ${selectList} FROM ${target} WHERE id IN ${inClausePlaceholders(ids.length)}`,
        ids
      );

      const rowsById = new Map<unknown, TargetRow>();
      for (const row of rows) {
        rowsById.set(row.id, row);
      }

      for (const record of records) {
        checked++;
        const row = rowsById.get(record.id);
        if (!row) {
          missingIds.push(record.id);
          continue;
        }
        const matches = mappings.every(mapping =>
          valuesEqual(mapping.value(record), row[mapping.column])
        );
        if (!matches) {
          mismatchedIds.push(record.id);
        }
      }
    }

    if (missingIds.length > 0 || mismatchedIds.length > 0) {
      throw new TransferVerificationError(table, missingIds, mismatchedIds, undefined, {
        service: 'TransferVerifier',
        operation: 'verifyTable',
      });
    }

    logger.info(`[TransferVerifier] ${table}: ${checked} row(s) match the source`);

    return { table, checked };
  }
}
