import { describe, it, expect, afterEach } from 'vitest';
import os from 'os';
import path from 'path';
import { initDatabase, getDatabase, closeDatabase, healthCheck } from '../connection';

describe('initDatabase', () => {
  afterEach(async () => {
    await closeDatabase();
  });

  it('should open an in-memory database', async () => {
    await initDatabase({ path: ':memory:' });

    expect(await healthCheck()).toBe(true);
  });

  it('should reuse the open handle', async () => {
    const first = await initDatabase({ path: ':memory:' });
    const second = await initDatabase({ path: ':memory:' });

    expect(second).toBe(first);
  });

  it('should reject and keep no handle when the file cannot be opened', async () => {
    const unreachable = path.join(os.tmpdir(), 'docshelf-missing-dir', 'nested', 'db.sqlite');

    await expect(initDatabase({ path: unreachable })).rejects.toThrow(/SQLITE_CANTOPEN/);
    expect(() => getDatabase()).toThrow('Database not initialized. Call initDatabase() first.');
  });
});
