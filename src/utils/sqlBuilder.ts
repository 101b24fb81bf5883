/**
 * SQL Builders
 *
 * Statements are written once with `?` placeholders and run on both
 * SQLite and PostgreSQL. Table and column names passed here always come
 * from the schema definition, never from input data.
 */

import { ValidationError } from '../errors/index.js';
import { SqlParam } from '../types/database.js';

export interface InsertColumn {
  column: string;
  /**
   * SQL expression wrapping the value placeholder, e.g.
   * `COALESCE(?, CURRENT_TIMESTAMP)`. Must contain exactly one `?`.
   */
  expression?: string;
}

export interface BatchInsertResult {
  query: string;
  values: SqlParam[];
}

/**
 * Rewrite `?` placeholders to PostgreSQL's `$1, $2, ...` form.
 * Question marks inside single-quoted literals or double-quoted
 * identifiers are left alone.
 *
 * @example
 * toPostgresPlaceholders("SELECT * FROM migrations WHERE version = ? AND name <> '?'")
 * // "SELECT * FROM migrations WHERE version = $1 AND name <> '?'"
 */
export function toPostgresPlaceholders(sql: string): string {
  let result = '';
  let index = 0;
  let quote: "'" | '"' | null = null;

  for (const char of sql) {
    if (quote) {
      if (char === quote) {
        quote = null;
      }
      result += char;
    } else if (char === "'" || char === '"') {
      quote = char;
      result += char;
    } else if (char === '?') {
      index++;
      result += `$${index}`;
    } else {
      result += char;
    }
  }

  return result;
}

/**
 * Build a `(?, ?, ?)` row tuple for the given columns
 */
function rowPlaceholders(columns: readonly InsertColumn[]): string {
  return `(${columns.map(c => c.expression ?? '?').join(', ')})`;
}

/**
 * Builds a multi-row INSERT
 *
 * @param table - Target table, already qualified for the dialect
 * @param columns - Target columns in parameter order
 * @param rows - One parameter array per row, same order as `columns`
 * @param conflictColumn - When set, rows whose key already exists are skipped
 *
 * @example
 * ```typescript
 * const { query, values } = buildBatchInsertQuery(
 *   'content.genre',
 *   [{ column: 'id' }, { column: 'name' }],
 *   [['6a1f...', 'Drama'], ['0b7c...', 'Comedy']],
 *   'id'
 * );
 * // query: "INSERT INTO content.genre (id, name) VALUES (?, ?), (?, ?) ON CONFLICT (id) DO NOTHING"
 * ```
 */
export function buildBatchInsertQuery(
  table: string,
  columns: readonly InsertColumn[],
  rows: readonly SqlParam[][],
  conflictColumn?: string
): BatchInsertResult {
  if (columns.length === 0) {
    throw new ValidationError('At least one column is required', {
      service: 'sqlBuilder',
      operation: 'buildBatchInsertQuery',
      metadata: { table },
    });
  }

  if (rows.length === 0) {
    throw new ValidationError('At least one row is required', {
      service: 'sqlBuilder',
      operation: 'buildBatchInsertQuery',
      metadata: { table },
    });
  }

  for (const column of columns) {
    const expression = column.expression ?? '?';
    if (expression.split('?').length !== 2) {
      throw new ValidationError(
        `Column expression must contain exactly one placeholder: ${expression}`,
        {
          service: 'sqlBuilder',
          operation: 'buildBatchInsertQuery',
          metadata: { table, column: column.column },
        }
      );
    }
  }

  const values: SqlParam[] = [];
  rows.forEach((row, rowIndex) => {
    if (row.length !== columns.length) {
      throw new ValidationError(
        `Row ${rowIndex} has ${row.length} values, expected ${columns.length}`,
        {
          service: 'sqlBuilder',
          operation: 'buildBatchInsertQuery',
          metadata: { table, rowIndex },
        }
      );
    }
    values.push(...row);
  });

  const tuple = rowPlaceholders(columns);
  const columnList = columns.map(c => c.column).join(', ');
  let query = `INSERT INTO ${table} (${columnList}) VALUES ${rows.map(() => tuple).join(', ')}`;

  if (conflictColumn) {
    query += ` ON CONFLICT (${conflictColumn}) DO NOTHING`;
  }

  return { query, values };
}

/**
 * `(?, ?, ?)` list for an `IN` clause with `count` parameters
 */
export function inClausePlaceholders(count: number): string {
  if (count < 1) {
    throw new ValidationError('IN clause needs at least one value', {
      service: 'sqlBuilder',
      operation: 'inClausePlaceholders',
    });
  }
  return `(${Array.from({ length: count }, () => '?').join(', ')})`;
}
