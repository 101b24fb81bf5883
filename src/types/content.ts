/**
 * Catalog record types
 *
 * One interface per table in the `content` schema. Property names are the
 * camelCase form of the column names; timestamps are kept as the strings the
 * source database produced so they round-trip without precision loss.
 */

export const FILM_WORK_TYPES = ['movie', 'tv_show'] as const;

export type FilmWorkType = (typeof FILM_WORK_TYPES)[number];

export type ContentTableName = keyof ContentRecordMap;

export interface FilmWorkRecord {
  id: string;
  title: string;
  description: string | null;
  creationDate: string | null;
  rating: number | null;
  type: FilmWorkType;
  created: string | null;
  modified: string | null;
}

export interface PersonRecord {
  id: string;
  fullName: string;
  created: string | null;
  modified: string | null;
}

export interface GenreRecord {
  id: string;
  name: string;
  description: string | null;
  created: string | null;
  modified: string | null;
}

export interface PersonFilmWorkRecord {
  id: string;
  filmWorkId: string;
  personId: string;
  role: string;
  created: string | null;
}

export interface GenreFilmWorkRecord {
  id: string;
  genreId: string;
  filmWorkId: string;
  created: string | null;
}

/**
 * Record type stored in each table
 */
export interface ContentRecordMap {
  film_work: FilmWorkRecord;
  person: PersonRecord;
  person_film_work: PersonFilmWorkRecord;
  genre: GenreRecord;
  genre_film_work: GenreFilmWorkRecord;
}
