import { Database, RunResult } from 'sqlite3';
import path from 'path';
import fs from 'fs';
import {
  DatabaseConfig,
  DatabaseConnection,
  DatabaseType,
  ExecuteResult,
  SqlParam,
} from '../../types/database.js';
import {
  DatabaseError,
  DuplicateKeyError,
  ForeignKeyViolationError,
  NotNullViolationError,
  FileSystemError,
  ErrorCode,
} from '../../errors/index.js';

const IN_MEMORY = ':memory:';

export class SqliteConnection implements DatabaseConnection {
  readonly type: DatabaseType = 'sqlite3';
  private db: Database | null = null;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  async connect(): Promise<void> {
    const dbPath = this.config.filename || './data/movies.sqlite';

    if (dbPath !== IN_MEMORY) {
      const dir = path.dirname(dbPath);
      try {
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      } catch (err) {
        throw new FileSystemError(
          `Failed to create database directory: ${dir}`,
          ErrorCode.FS_PERMISSION_DENIED,
          dir,
          false,
          { service: 'SqliteConnection', operation: 'connect' },
          err instanceof Error ? err : undefined
        );
      }
    }

    this.db = await new Promise<Database>((resolve, reject) => {
      const db = new Database(dbPath, err => {
        if (err) {
          reject(new DatabaseError(
            `Failed to connect to SQLite database: ${err.message}`,
            ErrorCode.DATABASE_CONNECTION_FAILED,
            true,
            {
              service: 'SqliteConnection',
              operation: 'connect',
              metadata: { dbPath },
            },
            err
          ));
        } else {
          resolve(db);
        }
      });
    });

    // Cascades and FK checks are off by default in SQLite
    await this.execute('PRAGMA foreign_keys = ON');
  }

  private requireDb(operation: string): Database {
    if (!this.db) {
      throw new DatabaseError(
        'Database not connected',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        { service: 'SqliteConnection', operation }
      );
    }
    return this.db;
  }

  async query<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const db = this.requireDb('query');

    return new Promise((resolve, reject) => {
      db.all(sql, params, (err: Error | null, rows: T[]) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'query'));
        } else {
          resolve(rows);
        }
      });
    });
  }

  async get<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    const db = this.requireDb('get');

    return new Promise((resolve, reject) => {
      db.get(sql, params, (err: Error | null, row: T | undefined) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'get'));
        } else {
          resolve(row);
        }
      });
    });
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    const db = this.requireDb('execute');

    return new Promise((resolve, reject) => {
      const convert = (err: Error): Error => this.convertDatabaseError(err, sql, 'execute');
      db.run(sql, params, function (this: RunResult, err: Error | null) {
        if (err) {
          reject(convert(err));
        } else {
          // 'this' is the statement context, providing changes and lastID
          resolve({
            affectedRows: this.changes,
            insertId: this.lastID,
          });
        }
      });
    });
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) {
      return;
    }

    return new Promise((resolve, reject) => {
      db.close(err => {
        if (err) {
          reject(new DatabaseError(
            `Failed to close database: ${err.message}`,
            ErrorCode.DATABASE_CONNECTION_FAILED,
            false,
            { service: 'SqliteConnection', operation: 'close' },
            err
          ));
        } else {
          this.db = null;
          resolve();
        }
      });
    });
  }

  async beginTransaction(): Promise<void> {
    await this.execute('BEGIN TRANSACTION');
  }

  async commit(): Promise<void> {
    await this.execute('COMMIT');
  }

  async rollback(): Promise<void> {
    await this.execute('ROLLBACK');
  }

  /**
   * Convert SQLite errors to ApplicationError types
   *
   * Constraint messages look like
   * `SQLITE_CONSTRAINT: UNIQUE constraint failed: genre_film_work.film_work_id, genre_film_work.genre_id`
   */
  private convertDatabaseError(error: Error, sql: string, operation: string): Error {
    const errorMessage = error.message.toLowerCase();
    const context = {
      service: 'SqliteConnection',
      operation,
      metadata: { sql, sqliteError: error.message },
    };

    if (errorMessage.includes('unique constraint failed')) {
      const { table, columns } = parseConstraintColumns(errorMessage, 'unique constraint failed:');
      return new DuplicateKeyError(table, columns, error.message, context);
    }

    if (errorMessage.includes('not null constraint failed')) {
      const { table, columns } = parseConstraintColumns(errorMessage, 'not null constraint failed:');
      return new NotNullViolationError(table, columns, error.message, context);
    }

    if (errorMessage.includes('foreign key constraint')) {
      return new ForeignKeyViolationError(
        'unknown', // SQLite doesn't name the table in FK errors
        'foreign_key',
        error.message,
        context
      );
    }

    return new DatabaseError(
      `Database ${operation} failed: ${error.message}`,
      ErrorCode.DATABASE_QUERY_FAILED,
      true,
      context,
      error
    );
  }
}

/**
 * Split `<marker> t.a, t.b` into table `t` and columns `a, b`
 */
function parseConstraintColumns(
  message: string,
  marker: string
): { table: string; columns: string } {
  const start = message.indexOf(marker);
  const qualified = message
    .slice(start + marker.length)
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0);

  const first = qualified[0];
  if (first === undefined || !first.includes('.')) {
    return { table: 'unknown', columns: 'unknown' };
  }

  const table = first.slice(0, first.indexOf('.'));
  const columns = qualified.map(part => part.slice(part.indexOf('.') + 1)).join(', ');
  return { table, columns };
}
