import sqlite3 from 'sqlite3';
import path from 'path';
import { logger } from '../utils/logger';

const IN_MEMORY_PATH = ':memory:';
const ENABLE_FOREIGN_KEYS_PRAGMA = 'PRAGMA foreign_keys = ON';
const HEALTH_CHECK_QUERY = 'SELECT 1 as result';
const HEALTH_CHECK_EXPECTED_VALUE = 1;

let db: sqlite3.Database | null = null;

export interface DatabaseConfig {
  path: string;
  verbose?: boolean;
}

/**
 * Opens the database and resolves once it is usable. A failed open rejects
 * and leaves no handle behind, so getDatabase() keeps throwing.
 */
export function initDatabase(config: DatabaseConfig): Promise<sqlite3.Database> {
  if (db) {
    return Promise.resolve(db);
  }

  const sqlite = config.verbose ? sqlite3.verbose() : sqlite3;
  const dbPath = config.path === IN_MEMORY_PATH ? IN_MEMORY_PATH : path.resolve(config.path);

  return new Promise((resolve, reject) => {
    const database = new sqlite.Database(dbPath, (err) => {
      if (err) {
        logger.error('Failed to connect to database:', err);
        if (db === database) {
          db = null;
        }
        reject(err);
        return;
      }
      logger.debug(`Connected to SQLite database at ${dbPath}`);

      database.run(ENABLE_FOREIGN_KEYS_PRAGMA, (pragmaErr) => {
        if (pragmaErr) {
          reject(pragmaErr);
        } else {
          resolve(database);
        }
      });
    });
    db = database;
  });
}

export function getDatabase(): sqlite3.Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

export function closeDatabase(): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!db) {
      resolve();
      return;
    }

    db.close((err) => {
      if (err) {
        reject(err);
      } else {
        db = null;
        logger.debug('Database connection closed');
        resolve();
      }
    });
  });
}

export function run(
  sql: string,
  params: unknown[] = []
): Promise<{ lastID: number; changes: number }> {
  return new Promise((resolve, reject) => {
    getDatabase().run(sql, params, function (err) {
      if (err) {
        reject(err);
      } else {
        resolve({ lastID: this.lastID, changes: this.changes });
      }
    });
  });
}

export function get<T>(sql: string, params: unknown[] = []): Promise<T | undefined> {
  return new Promise((resolve, reject) => {
    const database = getDatabase();
    database.get(sql, params, (err, row) => {
      if (err) {
        reject(err);
      } else {
        resolve(row as T);
      }
    });
  });
}

export function all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
  return new Promise((resolve, reject) => {
    const database = getDatabase();
    database.all(sql, params, (err, rows) => {
      if (err) {
        reject(err);
      } else {
        resolve(rows as T[]);
      }
    });
  });
}

export async function healthCheck(): Promise<boolean> {
  try {
    const result = await get<{ result: number }>(HEALTH_CHECK_QUERY);
    return result?.result === HEALTH_CHECK_EXPECTED_VALUE;
  } catch (err) {
    logger.error('Database health check failed:', err);
    return false;
  }
}
