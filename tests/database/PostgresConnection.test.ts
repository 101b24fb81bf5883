/**
 * PostgresConnection Tests
 *
 * pg is replaced by an in-process pool so statement text, parameter
 * routing and error mapping can be checked without a server.
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { PostgresConnection } from '../../src/database/connections/PostgresConnection.js';
import {
  DatabaseError,
  DuplicateKeyError,
  ErrorCode,
  ForeignKeyViolationError,
  NotNullViolationError,
} from '../../src/errors/index.js';

interface MockResult {
  rows: Array<Record<string, unknown>>;
  rowCount: number | null;
}

type QueryFn = (text: string, values?: unknown[]) => Promise<MockResult>;

const mockClient = {
  query: jest.fn<QueryFn>(),
  release: jest.fn<() => void>(),
};

const mockPool = {
  connect: jest.fn<() => Promise<typeof mockClient>>(),
  query: jest.fn<QueryFn>(),
  end: jest.fn<() => Promise<void>>(),
};

jest.mock('pg', () => ({
  Pool: function () {
    return mockPool;
  },
}));

function pgError(code: string, details: Record<string, string> = {}): Error {
  return Object.assign(new Error(`pg error ${code}`), { code, ...details });
}

function result(rows: Array<Record<string, unknown>>, rowCount: number | null = rows.length): MockResult {
  return { rows, rowCount };
}

describe('PostgresConnection', () => {
  let connection: PostgresConnection;

  beforeEach(async () => {
    mockClient.query.mockReset();
    mockClient.release.mockReset();
    mockPool.connect.mockReset();
    mockPool.query.mockReset();
    mockPool.end.mockReset();

    mockPool.connect.mockResolvedValue(mockClient);
    mockPool.end.mockResolvedValue(undefined);
    mockClient.query.mockResolvedValue(result([]));
    mockPool.query.mockResolvedValue(result([]));

    connection = new PostgresConnection({
      type: 'postgres',
      host: 'localhost',
      database: 'movies_database',
      username: 'app',
      password: 'test-secret',
    });
    await connection.connect();
  });

  describe('connect', () => {
    it('should check out and release one client', () => {
      expect(mockPool.connect).toHaveBeenCalledTimes(1);
      expect(mockClient.release).toHaveBeenCalledTimes(1);
    });

    it('should raise a connection error when the server is unreachable', async () => {
      mockPool.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));
      const fresh = new PostgresConnection({ type: 'postgres', database: 'movies_database' });

      const error = await fresh.connect().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DatabaseError);
      if (error instanceof DatabaseError) {
        expect(error.code).toBe(ErrorCode.DATABASE_CONNECTION_FAILED);
        expect(error.message).toBe('Failed to connect to PostgreSQL database: ECONNREFUSED');
      }
    });
  });

  describe('statements', () => {
    it('should rewrite placeholders for pg', async () => {
      mockPool.query.mockResolvedValueOnce(result([{ id: 'a', name: 'Drama' }]));

      const rows = await connection.query('SELECT id, name FROM content.genre WHERE id = ? AND name = ?', [
        'a',
        'Drama',
      ]);

      expect(rows).toEqual([{ id: 'a', name: 'Drama' }]);
      expect(mockPool.query).toHaveBeenCalledWith(
        'SELECT id, name FROM content.genre WHERE id = $1 AND name = $2',
        ['a', 'Drama']
      );
    });

    it('should return the first row from get', async () => {
      mockPool.query.mockResolvedValueOnce(result([{ count: 2 }, { count: 3 }]));

      expect(await connection.get('SELECT 1')).toEqual({ count: 2 });
    });

    it('should report rowCount as affected rows', async () => {
      mockPool.query.mockResolvedValueOnce(result([], 3));
      expect(await connection.execute('DELETE FROM content.genre')).toEqual({ affectedRows: 3 });

      mockPool.query.mockResolvedValueOnce(result([], null));
      expect(await connection.execute('CREATE SCHEMA IF NOT EXISTS content')).toEqual({
        affectedRows: 0,
      });
    });
  });

  describe('transactions', () => {
    it('should run statements on the transaction client until commit', async () => {
      await connection.beginTransaction();
      await connection.execute('INSERT INTO content.genre (id, name) VALUES (?, ?)', ['a', 'Drama']);
      await connection.commit();

      expect(mockClient.query.mock.calls.map(call => call[0])).toEqual([
        'BEGIN',
        'INSERT INTO content.genre (id, name) VALUES ($1, $2)',
        'COMMIT',
      ]);
      expect(mockPool.query).not.toHaveBeenCalled();
      // once for connect, once for the transaction
      expect(mockClient.release).toHaveBeenCalledTimes(2);

      await connection.execute('DELETE FROM content.genre');
      expect(mockPool.query).toHaveBeenCalledWith('DELETE FROM content.genre', []);
    });

    it('should release the client on rollback', async () => {
      await connection.beginTransaction();
      await connection.rollback();

      expect(mockClient.query.mock.calls.map(call => call[0])).toEqual(['BEGIN', 'ROLLBACK']);
      expect(mockClient.release).toHaveBeenCalledTimes(2);
    });

    it('should roll back and map the error when commit fails', async () => {
      mockClient.query.mockImplementation(async text => {
        if (text === 'COMMIT') {
          throw pgError('40001');
        }
        return result([]);
      });
      await connection.beginTransaction();

      const error = await connection.commit().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DatabaseError);
      if (error instanceof DatabaseError) {
        expect(error.code).toBe(ErrorCode.DATABASE_TRANSACTION_FAILED);
        expect(error.retryable).toBe(true);
        expect(error.message).toBe('Transaction conflict: pg error 40001');
      }
      expect(mockClient.query.mock.calls.map(call => call[0])).toEqual(['BEGIN', 'COMMIT', 'ROLLBACK']);
      expect(mockClient.release).toHaveBeenCalledTimes(2);
      await expect(connection.rollback()).rejects.toThrow('No transaction in progress');
    });

    it('should keep the commit error when the rollback after it fails', async () => {
      mockClient.query.mockImplementation(async text => {
        if (text === 'COMMIT') {
          throw pgError('40P01');
        }
        if (text === 'ROLLBACK') {
          throw new Error('connection terminated');
        }
        return result([]);
      });
      await connection.beginTransaction();

      await expect(connection.commit()).rejects.toThrow('Transaction conflict: pg error 40P01');
      expect(mockClient.release).toHaveBeenCalledTimes(2);
    });

    it('should refuse a nested transaction', async () => {
      await connection.beginTransaction();

      await expect(connection.beginTransaction()).rejects.toThrow('Transaction already in progress');
    });

    it('should refuse commit without a transaction', async () => {
      await expect(connection.commit()).rejects.toThrow('No transaction in progress');
    });
  });

  describe('error mapping', () => {
    it('should map unique violations to DuplicateKeyError', async () => {
      mockPool.query.mockRejectedValueOnce(
        pgError('23505', { table: 'genre', constraint: 'genre_name_key' })
      );

      const error = await connection.execute('INSERT ...').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DuplicateKeyError);
      if (error instanceof DuplicateKeyError) {
        expect(error.table).toBe('genre');
        expect(error.key).toBe('genre_name_key');
        expect(error.retryable).toBe(false);
      }
    });

    it('should map foreign key violations', async () => {
      mockPool.query.mockRejectedValueOnce(
        pgError('23503', { table: 'genre_film_work', constraint: 'genre_film_work_genre_id_fkey' })
      );

      await expect(connection.execute('INSERT ...')).rejects.toThrow(ForeignKeyViolationError);
    });

    it('should map not-null violations with the column', async () => {
      mockPool.query.mockRejectedValueOnce(pgError('23502', { table: 'film_work', column: 'title' }));

      const error = await connection.execute('INSERT ...').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotNullViolationError);
      if (error instanceof NotNullViolationError) {
        expect(error.column).toBe('title');
      }
    });

    it('should mark serialization failures as retryable transaction errors', async () => {
      mockPool.query.mockRejectedValueOnce(pgError('40001'));

      const error = await connection.query('SELECT 1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DatabaseError);
      if (error instanceof DatabaseError) {
        expect(error.code).toBe(ErrorCode.DATABASE_TRANSACTION_FAILED);
        expect(error.retryable).toBe(true);
      }
    });

    it('should wrap anything else as a query failure', async () => {
      mockPool.query.mockRejectedValueOnce(new Error('syntax error at or near "SELEC"'));

      const error = await connection.query('SELEC 1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DatabaseError);
      if (error instanceof DatabaseError) {
        expect(error.code).toBe(ErrorCode.DATABASE_QUERY_FAILED);
        expect(error.message).toBe('Database query failed: syntax error at or near "SELEC"');
      }
    });
  });

  describe('close', () => {
    it('should end the pool and refuse further statements', async () => {
      await connection.close();

      expect(mockPool.end).toHaveBeenCalledTimes(1);
      await expect(connection.query('SELECT 1')).rejects.toThrow('Database not connected');
    });
  });
});
