import { DatabaseType } from '../../types/database.js';
import {
  ColumnDefinition,
  ColumnType,
  IndexDefinition,
  SchemaDefinition,
  TableDefinition,
} from './contentSchema.js';

const COLUMN_TYPES: Record<DatabaseType, Record<ColumnType, string>> = {
  postgres: {
    uuid: 'uuid',
    text: 'TEXT',
    date: 'DATE',
    float: 'FLOAT',
    timestamptz: 'timestamp with time zone',
  },
  // SQLite has no uuid, date or timestamp storage classes
  sqlite3: {
    uuid: 'TEXT',
    text: 'TEXT',
    date: 'TEXT',
    float: 'REAL',
    timestamptz: 'TEXT',
  },
};

const INDENT = '    ';

/**
 * Table name as written in statements for the dialect. SQLite has no
 * schema namespaces, so its tables live unqualified in the main database.
 */
export function qualifiedName(
  schema: SchemaDefinition,
  table: string,
  dialect: DatabaseType
): string {
  return dialect === 'postgres' ? `${schema.namespace}.${table}` : table;
}

function renderColumn(
  schema: SchemaDefinition,
  column: ColumnDefinition,
  dialect: DatabaseType
): string {
  let sql = `${column.name} ${COLUMN_TYPES[dialect][column.type]}`;

  if (column.primaryKey) {
    sql += ' PRIMARY KEY';
  }
  // SQLite lets NULL into non-integer primary keys unless told otherwise
  if (!column.nullable && (!column.primaryKey || dialect === 'sqlite3')) {
    sql += ' NOT NULL';
  }
  if (column.unique) {
    sql += ' UNIQUE';
  }
  if (column.defaultSql !== undefined) {
    sql += ` DEFAULT ${column.defaultSql}`;
  }
  if (column.references) {
    const { table, column: target, onDelete } = column.references;
    sql += ` REFERENCES ${qualifiedName(schema, table, dialect)} (${target}) ON DELETE ${onDelete}`;
  }

  return sql;
}

export function renderCreateTable(
  schema: SchemaDefinition,
  table: TableDefinition,
  dialect: DatabaseType
): string {
  const columns = table.columns
    .map(column => `${INDENT}${renderColumn(schema, column, dialect)}`)
    .join(',\n');

  return `CREATE TABLE IF NOT EXISTS ${qualifiedName(schema, table.name, dialect)} (\n${columns}\n)`;
}

export function renderCreateIndex(
  schema: SchemaDefinition,
  table: TableDefinition,
  index: IndexDefinition,
  dialect: DatabaseType
): string {
  const kind = index.unique ? 'UNIQUE INDEX' : 'INDEX';
  const target = qualifiedName(schema, table.name, dialect);
  return `CREATE ${kind} IF NOT EXISTS ${index.name} ON ${target} (${index.columns.join(', ')})`;
}

/**
 * Every statement needed to materialise the schema, in execution order.
 * All of them are guarded with IF NOT EXISTS.
 */
export function renderCreateStatements(schema: SchemaDefinition, dialect: DatabaseType): string[] {
  const statements: string[] = [];

  if (dialect === 'postgres') {
    statements.push(`CREATE SCHEMA IF NOT EXISTS ${schema.namespace}`);
  }

  for (const table of schema.tables) {
    statements.push(renderCreateTable(schema, table, dialect));
    for (const index of table.indexes) {
      statements.push(renderCreateIndex(schema, table, index, dialect));
    }
  }

  return statements;
}

export function renderDropStatements(schema: SchemaDefinition, dialect: DatabaseType): string[] {
  const statements = [...schema.tables]
    .reverse()
    .map(table => `DROP TABLE IF EXISTS ${qualifiedName(schema, table.name, dialect)}`);

  if (dialect === 'postgres') {
    statements.push(`DROP SCHEMA IF EXISTS ${schema.namespace}`);
  }

  return statements;
}

/**
 * The create statements as one executable script
 */
export function renderSchemaScript(schema: SchemaDefinition, dialect: DatabaseType): string {
  return renderCreateStatements(schema, dialect).map(statement => `${statement};`).join('\n\n') + '\n';
}
