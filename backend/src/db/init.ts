import fs from 'fs';
import path from 'path';
import { run, get } from './connection';
import { logger } from '../utils/logger';

const SCHEMA_FILE_NAME = 'schema.sql';
const SQL_COMMENT_PREFIX = '--';
const SQL_STATEMENT_SEPARATOR = ';';
const UTF8_ENCODING = 'utf8';
const SQL_STATEMENT_PREVIEW_LENGTH = 100;
const SCHEMA_CHECK_QUERY =
  "SELECT name FROM sqlite_master WHERE type='table' AND name='configuration_options'";

export function parseSqlStatements(schemaSql: string): string[] {
  return schemaSql
    .split('\n')
    .filter((line) => !line.trim().startsWith(SQL_COMMENT_PREFIX))
    .join('\n')
    .split(SQL_STATEMENT_SEPARATOR)
    .map((stmt) => stmt.trim())
    .filter((stmt) => stmt.length > 0);
}

export async function initSchema(): Promise<void> {
  const schemaPath = path.join(__dirname, SCHEMA_FILE_NAME);
  const schemaSql = fs.readFileSync(schemaPath, UTF8_ENCODING);

  for (const statement of parseSqlStatements(schemaSql)) {
    try {
      await run(statement);
    } catch (err) {
      logger.error(
        'Failed to execute SQL statement:',
        statement.substring(0, SQL_STATEMENT_PREVIEW_LENGTH) + '...'
      );
      throw err;
    }
  }

  logger.info('Database schema initialized successfully');
}

export async function checkSchema(): Promise<boolean> {
  const result = await get<{ name: string }>(SCHEMA_CHECK_QUERY);
  return result !== undefined;
}

/**
 * Statements in schema.sql are idempotent, so they run on every start to
 * pick up tables added since the database was created.
 */
export async function ensureSchema(): Promise<void> {
  if (!(await checkSchema())) {
    logger.info('Database schema not found. Initializing...');
  }
  await initSchema();
}
