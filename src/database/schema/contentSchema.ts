import { ContentTableName } from '../../types/content.js';
import { ValidationError } from '../../errors/index.js';

/**
 * Logical column types; the DDL renderer maps them per dialect.
 */
export type ColumnType = 'uuid' | 'text' | 'date' | 'float' | 'timestamptz';

export interface ForeignKeyReference {
  table: ContentTableName;
  column: string;
  onDelete: 'CASCADE';
}

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
  nullable: boolean;
  primaryKey?: boolean;
  unique?: boolean;
  /** SQL literal used as the column default */
  defaultSql?: string;
  references?: ForeignKeyReference;
}

export interface IndexDefinition {
  name: string;
  columns: readonly string[];
  unique: boolean;
}

export interface TableDefinition {
  name: ContentTableName;
  columns: readonly ColumnDefinition[];
  indexes: readonly IndexDefinition[];
}

export interface SchemaDefinition {
  namespace: string;
  tables: readonly TableDefinition[];
}

const id: ColumnDefinition = { name: 'id', type: 'uuid', nullable: false, primaryKey: true };
const created: ColumnDefinition = { name: 'created', type: 'timestamptz', nullable: true };
const modified: ColumnDefinition = { name: 'modified', type: 'timestamptz', nullable: true };

function foreignKey(name: string, table: ContentTableName): ColumnDefinition {
  return {
    name,
    type: 'uuid',
    nullable: false,
    references: { table, column: 'id', onDelete: 'CASCADE' },
  };
}

/**
 * Catalog schema. Tables are listed parents first, so creating them in
 * order satisfies every foreign key and dropping them in reverse order
 * never hits a dependent table.
 */
export const contentSchema: SchemaDefinition = {
  namespace: 'content',
  tables: [
    {
      name: 'film_work',
      columns: [
        id,
        { name: 'title', type: 'text', nullable: false },
        { name: 'description', type: 'text', nullable: true },
        { name: 'creation_date', type: 'date', nullable: true },
        { name: 'rating', type: 'float', nullable: true, defaultSql: '0.0' },
        { name: 'type', type: 'text', nullable: false },
        created,
        modified,
      ],
      indexes: [
        {
          name: 'film_work_title_description_creation_date_idx',
          columns: ['title', 'description', 'creation_date'],
          unique: false,
        },
      ],
    },
    {
      name: 'person',
      columns: [
        id,
        { name: 'full_name', type: 'text', nullable: false },
        created,
        modified,
      ],
      indexes: [
        { name: 'person_full_name_idx', columns: ['full_name'], unique: false },
      ],
    },
    {
      name: 'person_film_work',
      columns: [
        id,
        foreignKey('film_work_id', 'film_work'),
        foreignKey('person_id', 'person'),
        { name: 'role', type: 'text', nullable: false },
        created,
      ],
      indexes: [
        {
          name: 'film_work_person_role_idx',
          columns: ['film_work_id', 'person_id', 'role'],
          unique: true,
        },
      ],
    },
    {
      name: 'genre',
      columns: [
        id,
        { name: 'name', type: 'text', nullable: false, unique: true },
        { name: 'description', type: 'text', nullable: true },
        created,
        modified,
      ],
      indexes: [],
    },
    {
      name: 'genre_film_work',
      columns: [
        id,
        foreignKey('genre_id', 'genre'),
        foreignKey('film_work_id', 'film_work'),
        created,
      ],
      indexes: [
        {
          name: 'film_work_genre_idx',
          columns: ['film_work_id', 'genre_id'],
          unique: true,
        },
      ],
    },
  ],
};

export function getTable(name: string, schema: SchemaDefinition = contentSchema): TableDefinition {
  const table = schema.tables.find(t => t.name === name);
  if (!table) {
    throw new ValidationError(`Unknown table '${name}' in schema '${schema.namespace}'`, {
      service: 'contentSchema',
      operation: 'getTable',
      metadata: { name, known: schema.tables.map(t => t.name) },
    });
  }
  return table;
}
