import { Pool, PoolClient, QueryResult } from 'pg';
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
  ErrorCode,
} from '../../errors/index.js';
import { toPostgresPlaceholders } from '../../utils/sqlBuilder.js';
import { getErrorMessage, getStringProperty, hasCode, toError } from '../../utils/errorHandling.js';
import { logger } from '../../utils/logging.js';

/**
 * The part of `Pool` and `PoolClient` used to run statements
 */
interface Queryable {
  query(text: string, values?: SqlParam[]): Promise<QueryResult>;
}

export class PostgresConnection implements DatabaseConnection {
  readonly type: DatabaseType = 'postgres';
  private pool: Pool | null = null;
  private client: PoolClient | null = null;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  async connect(): Promise<void> {
    this.pool = new Pool({
      host: this.config.host || 'localhost',
      port: this.config.port || 5432,
      database: this.config.database,
      user: this.config.username,
      password: this.config.password,
      ssl: this.config.ssl || false,
      min: this.config.pool?.min || 2,
      max: this.config.pool?.max || 10,
    });

    // Test connection
    try {
      const client = await this.pool.connect();
      client.release();
    } catch (error) {
      throw new DatabaseError(
        `Failed to connect to PostgreSQL database: ${toError(error).message}`,
        ErrorCode.DATABASE_CONNECTION_FAILED,
        true,
        {
          service: 'PostgresConnection',
          operation: 'connect',
          metadata: {
            host: this.config.host,
            database: this.config.database,
          },
        },
        toError(error)
      );
    }
  }

  /**
   * Statements run on the transaction client while a transaction is open,
   * otherwise on any pooled connection.
   */
  private executor(operation: string): Queryable {
    if (this.client) {
      return this.client;
    }
    if (!this.pool) {
      throw new DatabaseError(
        'Database not connected',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        { service: 'PostgresConnection', operation }
      );
    }
    return this.pool;
  }

  async query<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const executor = this.executor('query');

    try {
      const result = await executor.query(toPostgresPlaceholders(sql), params);
      return result.rows;
    } catch (error) {
      throw this.convertDatabaseError(error, sql, 'query');
    }
  }

  async get<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    const rows = await this.query<T>(sql, params);
    return rows[0];
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    const executor = this.executor('execute');

    try {
      const result = await executor.query(toPostgresPlaceholders(sql), params);
      return { affectedRows: result.rowCount ?? 0 };
    } catch (error) {
      throw this.convertDatabaseError(error, sql, 'execute');
    }
  }

  async close(): Promise<void> {
    if (this.client) {
      this.client.release();
      this.client = null;
    }
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }

  async beginTransaction(): Promise<void> {
    if (!this.pool) {
      throw new DatabaseError(
        'Database not connected',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        { service: 'PostgresConnection', operation: 'beginTransaction' }
      );
    }

    if (this.client) {
      throw new DatabaseError(
        'Transaction already in progress',
        ErrorCode.DATABASE_TRANSACTION_FAILED,
        false,
        { service: 'PostgresConnection', operation: 'beginTransaction' }
      );
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
    } catch (error) {
      client.release();
      throw this.convertDatabaseError(error, 'BEGIN', 'beginTransaction');
    }
    this.client = client;
  }

  /**
   * A failed COMMIT is rolled back on the same client before the client
   * goes back to the pool; the transaction is closed either way.
   */
  async commit(): Promise<void> {
    const client = this.requireTransaction('commit');

    try {
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        logger.warn('[PostgresConnection] Rollback after failed commit failed', {
          error: getErrorMessage(rollbackError),
        });
      });
      throw this.convertDatabaseError(error, 'COMMIT', 'commit');
    } finally {
      client.release();
      this.client = null;
    }
  }

  async rollback(): Promise<void> {
    const client = this.requireTransaction('rollback');

    try {
      await client.query('ROLLBACK');
    } finally {
      client.release();
      this.client = null;
    }
  }

  private requireTransaction(operation: string): PoolClient {
    if (!this.client) {
      throw new DatabaseError(
        'No transaction in progress',
        ErrorCode.DATABASE_TRANSACTION_FAILED,
        false,
        { service: 'PostgresConnection', operation }
      );
    }
    return this.client;
  }

  /**
   * Convert PostgreSQL errors to ApplicationError types
   * PostgreSQL error codes: https://www.postgresql.org/docs/current/errcodes-appendix.html
   */
  private convertDatabaseError(error: unknown, sql: string, operation: string): Error {
    const cause = toError(error);
    const pgCode = hasCode(error) ? error.code : undefined;
    const table = getStringProperty(error, 'table') || 'unknown';
    const context = {
      service: 'PostgresConnection',
      operation,
      metadata: {
        sql,
        pgError: cause.message,
        pgCode,
      },
    };

    switch (pgCode) {
      case '23505': // unique_violation
        return new DuplicateKeyError(
          table,
          getStringProperty(error, 'constraint') || 'unknown',
          cause.message,
          context
        );

      case '23503': // foreign_key_violation
        return new ForeignKeyViolationError(
          table,
          getStringProperty(error, 'constraint') || 'unknown',
          cause.message,
          context
        );

      case '23502': // not_null_violation
        return new NotNullViolationError(
          table,
          getStringProperty(error, 'column') || 'unknown',
          cause.message,
          context
        );

      case '23514': // check_violation
      case '23P01': // exclusion_violation
        return new DatabaseError(
          `Constraint violation: ${cause.message}`,
          ErrorCode.DATABASE_QUERY_FAILED,
          false,
          context,
          cause
        );

      case '40001': // serialization_failure
      case '40P01': // deadlock_detected
        return new DatabaseError(
          `Transaction conflict: ${cause.message}`,
          ErrorCode.DATABASE_TRANSACTION_FAILED,
          true,
          context,
          cause
        );
    }

    return new DatabaseError(
      `Database ${operation} failed: ${cause.message}`,
      ErrorCode.DATABASE_QUERY_FAILED,
      true,
      context,
      cause
    );
  }
}
