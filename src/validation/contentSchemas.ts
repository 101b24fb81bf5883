import { z } from 'zod';
import {
  ContentRecordMap,
  ContentTableName,
  FILM_WORK_TYPES,
  FilmWorkRecord,
  GenreFilmWorkRecord,
  GenreRecord,
  PersonFilmWorkRecord,
  PersonRecord,
} from '../types/content.js';
import { SchemaValidationError } from '../errors/index.js';

/**
 * Legacy Row Schemas
 *
 * Zod schemas for rows read from the legacy SQLite catalog. Legacy tables
 * name their timestamps `created_at` / `updated_at` and may carry extra
 * columns (such as `file_path`), which are stripped.
 */

export const MAX_RATING = 100;

// PostgreSQL reads uuid columns back in lower case
const idSchema = z
  .string()
  .uuid('Must be a valid UUID')
  .transform(value => value.toLowerCase());

const requiredText = z.string().min(1, 'Must not be empty');

const optionalText = z
  .string()
  .nullish()
  .transform(value => value ?? null);

const timestampSchema = z
  .string()
  .nullish()
  .transform(value => (value ? value : null));

/**
 * Film work row
 */
export const legacyFilmWorkSchema = z
  .object({
    id: idSchema,
    title: requiredText,
    description: optionalText,
    creation_date: optionalText,
    rating: z
      .number()
      .min(0, 'Rating must be at least 0')
      .max(MAX_RATING, `Rating must be at most ${MAX_RATING}`)
      .nullish()
      .transform(value => value ?? null),
    type: z.enum(FILM_WORK_TYPES),
    created_at: timestampSchema,
    updated_at: timestampSchema,
  })
  .transform(
    (row): FilmWorkRecord => ({
      id: row.id,
      title: row.title,
      description: row.description,
      creationDate: row.creation_date,
      rating: row.rating,
      type: row.type,
      created: row.created_at,
      modified: row.updated_at,
    })
  );

export const legacyPersonSchema = z
  .object({
    id: idSchema,
    full_name: requiredText,
    created_at: timestampSchema,
    updated_at: timestampSchema,
  })
  .transform(
    (row): PersonRecord => ({
      id: row.id,
      fullName: row.full_name,
      created: row.created_at,
      modified: row.updated_at,
    })
  );

export const legacyGenreSchema = z
  .object({
    id: idSchema,
    name: requiredText,
    description: optionalText,
    created_at: timestampSchema,
    updated_at: timestampSchema,
  })
  .transform(
    (row): GenreRecord => ({
      id: row.id,
      name: row.name,
      description: row.description,
      created: row.created_at,
      modified: row.updated_at,
    })
  );

export const legacyPersonFilmWorkSchema = z
  .object({
    id: idSchema,
    film_work_id: idSchema,
    person_id: idSchema,
    role: requiredText,
    created_at: timestampSchema,
  })
  .transform(
    (row): PersonFilmWorkRecord => ({
      id: row.id,
      filmWorkId: row.film_work_id,
      personId: row.person_id,
      role: row.role,
      created: row.created_at,
    })
  );

export const legacyGenreFilmWorkSchema = z
  .object({
    id: idSchema,
    genre_id: idSchema,
    film_work_id: idSchema,
    created_at: timestampSchema,
  })
  .transform(
    (row): GenreFilmWorkRecord => ({
      id: row.id,
      genreId: row.genre_id,
      filmWorkId: row.film_work_id,
      created: row.created_at,
    })
  );

type LegacyRowSchemas = {
  [K in keyof ContentRecordMap]: z.ZodType<ContentRecordMap[K], z.ZodTypeDef, unknown>;
};

export const legacyRowSchemas: LegacyRowSchemas = {
  film_work: legacyFilmWorkSchema,
  person: legacyPersonSchema,
  person_film_work: legacyPersonFilmWorkSchema,
  genre: legacyGenreSchema,
  genre_film_work: legacyGenreFilmWorkSchema,
};

/**
 * Validate one legacy row and map it to its record
 *
 * @throws SchemaValidationError naming the table and the row id
 */
export function parseLegacyRow<T extends ContentTableName>(
  table: T,
  row: Record<string, unknown>
): ContentRecordMap[T] {
  const schema: z.ZodType<ContentRecordMap[T], z.ZodTypeDef, unknown> = legacyRowSchemas[table];
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  const rowId = typeof row.id === 'string' ? row.id : String(row.id);
  const errors = result.error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));

  throw new SchemaValidationError(
    errors,
    `Invalid ${table} row ${rowId}: ${errors.map(e => `${e.path}: ${e.message}`).join('; ')}`,
    {
      service: 'contentSchemas',
      operation: 'parseLegacyRow',
      entityType: table,
      entityId: rowId,
    }
  );
}
