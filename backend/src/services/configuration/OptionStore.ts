import { get, run } from '../../db/connection';

const SELECT_OPTION_QUERY = 'SELECT value FROM configuration_options WHERE key = ?';
const UPSERT_OPTION_QUERY = `
  INSERT INTO configuration_options (key, value)
  VALUES (?, ?)
  ON CONFLICT(key) DO UPDATE SET value = excluded.value
`;

/**
 * Durable key/value table holding per-instance configuration overrides.
 * Values are stored string-encoded.
 */
export interface OptionStore {
  read(key: string): Promise<string | null>;
  write(key: string, value: string): Promise<void>;
}

export class SqliteOptionStore implements OptionStore {
  async read(key: string): Promise<string | null> {
    const row = await get<{ value: string | null }>(SELECT_OPTION_QUERY, [key]);
    return row?.value ?? null;
  }

  async write(key: string, value: string): Promise<void> {
    await run(UPSERT_OPTION_QUERY, [key, value]);
  }
}
