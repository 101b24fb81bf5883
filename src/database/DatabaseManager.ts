import {
  DatabaseConfig,
  DatabaseConnection,
  DatabaseType,
  ExecuteResult,
  SqlParam,
} from '../types/database.js';
import { SqliteConnection } from './connections/SqliteConnection.js';
import { PostgresConnection } from './connections/PostgresConnection.js';
import { logger } from '../utils/logging.js';
import { getErrorMessage } from '../utils/errorHandling.js';
import { DatabaseError, ErrorCode } from '../errors/index.js';

/**
 * Roll back after a failed statement or commit. A rollback failure is
 * logged so the caller can rethrow the error that caused it.
 */
export async function rollbackAfterError(connection: DatabaseConnection, service: string): Promise<void> {
  try {
    await connection.rollback();
  } catch (error) {
    logger.warn(`[${service}] Rollback failed`, { error: getErrorMessage(error) });
  }
}

export class DatabaseManager {
  private connection: DatabaseConnection | null = null;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  async connect(): Promise<void> {
    if (this.connection) {
      return;
    }

    const connection = this.createConnection();
    await connection.connect?.();
    this.connection = connection;

    logger.info('[DatabaseManager] Connected', { type: this.config.type });
  }

  private createConnection(): DatabaseConnection {
    const type: DatabaseType = this.config.type;
    switch (type) {
      case 'sqlite3':
        return new SqliteConnection(this.config);
      case 'postgres':
        return new PostgresConnection(this.config);
      default: {
        const unsupported: never = type;
        throw new DatabaseError(
          `Unsupported database type: ${String(unsupported)}`,
          ErrorCode.DATABASE_CONNECTION_FAILED,
          false,
          {
            service: 'DatabaseManager',
            operation: 'connect',
            metadata: { requestedType: unsupported },
          }
        );
      }
    }
  }

  async disconnect(): Promise<void> {
    if (this.connection) {
      await this.connection.close();
      this.connection = null;
    }
  }

  /**
   * Validate database connection by running a simple query
   */
  async validateConnection(): Promise<boolean> {
    if (!this.connection) {
      return false;
    }

    try {
      await this.connection.query('SELECT 1 as ping', []);
      return true;
    } catch (error) {
      logger.warn('[DatabaseManager] Connection validation failed', {
        error: getErrorMessage(error),
      });
      return false;
    }
  }

  getConnection(): DatabaseConnection {
    if (!this.connection) {
      throw new DatabaseError(
        'Database not connected. Call connect() first.',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        {
          service: 'DatabaseManager',
          operation: 'getConnection',
        }
      );
    }
    return this.connection;
  }

  async query<T = Record<string, unknown>>(sql: string, params?: SqlParam[]): Promise<T[]> {
    return this.getConnection().query<T>(sql, params);
  }

  async execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult> {
    return this.getConnection().execute(sql, params);
  }

  async transaction<T>(callback: (connection: DatabaseConnection) => Promise<T>): Promise<T> {
    const connection = this.getConnection();

    await connection.beginTransaction();
    try {
      const result = await callback(connection);
      await connection.commit();
      return result;
    } catch (error) {
      await rollbackAfterError(connection, 'DatabaseManager');
      throw error;
    }
  }

  getDatabaseType(): DatabaseType {
    return this.config.type;
  }

  isConnected(): boolean {
    return this.connection !== null;
  }
}
