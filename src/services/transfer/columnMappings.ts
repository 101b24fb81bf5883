import { ContentRecordMap } from '../../types/content.js';
import { SqlParam } from '../../types/database.js';

export interface ColumnMapping<R> {
  column: string;
  value: (record: R) => SqlParam;
  /** Timestamps default to the current time and are not verified */
  timestamp?: boolean;
}

export type ContentColumnMappings = {
  [K in keyof ContentRecordMap]: ReadonlyArray<ColumnMapping<ContentRecordMap[K]>>;
};

/**
 * Target columns per table, in insert order
 */
export const contentColumnMappings: ContentColumnMappings = {
  film_work: [
    { column: 'id', value: r => r.id },
    { column: 'title', value: r => r.title },
    { column: 'description', value: r => r.description },
    { column: 'creation_date', value: r => r.creationDate },
    { column: 'rating', value: r => r.rating },
    { column: 'type', value: r => r.type },
    { column: 'created', value: r => r.created, timestamp: true },
    { column: 'modified', value: r => r.modified, timestamp: true },
  ],
  person: [
    { column: 'id', value: r => r.id },
    { column: 'full_name', value: r => r.fullName },
    { column: 'created', value: r => r.created, timestamp: true },
    { column: 'modified', value: r => r.modified, timestamp: true },
  ],
  person_film_work: [
    { column: 'id', value: r => r.id },
    { column: 'film_work_id', value: r => r.filmWorkId },
    { column: 'person_id', value: r => r.personId },
    { column: 'role', value: r => r.role },
    { column: 'created', value: r => r.created, timestamp: true },
  ],
  genre: [
    { column: 'id', value: r => r.id },
    { column: 'name', value: r => r.name },
    { column: 'description', value: r => r.description },
    { column: 'created', value: r => r.created, timestamp: true },
    { column: 'modified', value: r => r.modified, timestamp: true },
  ],
  genre_film_work: [
    { column: 'id', value: r => r.id },
    { column: 'genre_id', value: r => r.genreId },
    { column: 'film_work_id', value: r => r.filmWorkId },
    { column: 'created', value: r => r.created, timestamp: true },
  ],
};
