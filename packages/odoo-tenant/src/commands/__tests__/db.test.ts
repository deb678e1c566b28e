/**
 * Tests for the db commands, with pg_dump and psql mocked
 */

import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import { dbBackup } from '../db/backup.js';
import { dbRestore } from '../db/restore.js';
import { ConfigManager } from '../../managers/config-manager.js';
import { DatabaseConfig } from '../../configs/database-config.js';
import { SetupNotFoundError, UserError } from '../../errors.js';

const execaMock = vi.hoisted(() => vi.fn());

vi.mock('execa', () => ({ execa: execaMock }));

describe('db commands', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'db-test-'));

    await ConfigManager.create({
      version: '18.0',
      hosts: ['example.test'],
      db: new DatabaseConfig('postgres', 'postgres', 'test-secret'),
      configPath: path.join(testDir, 'setup.yml'),
    });

    execaMock.mockReset();
    execaMock.mockResolvedValue({ stdout: '', stderr: '' });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    await fs.remove(testDir);
  });

  test('backup writes a timestamped dump under backups/ by default', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date(2024, 0, 31, 23, 59, 1));

    await dbBackup(testDir, undefined, { dbHost: 'db.internal', dbPort: '6432' });

    const target = path.join(testDir, 'backups', 'postgres_20240131_235901.sql');
    expect(execaMock).toHaveBeenCalledWith(
      'pg_dump',
      [
        '--host=db.internal',
        '--port=6432',
        '--username=postgres',
        '--dbname=postgres',
        '--format=p',
        `--file=${target}`,
      ],
      { env: { PGPASSWORD: 'test-secret' }, stdio: 'inherit' }
    );
    expect(await fs.pathExists(path.join(testDir, 'backups'))).toBe(true);
  });

  test('backup keeps an explicit .sql path', async () => {
    const target = path.join(testDir, 'dumps', 'nightly.sql');

    await dbBackup(testDir, target, { dbHost: 'db.internal', dbPort: '6432' });

    expect(execaMock).toHaveBeenCalledWith(
      'pg_dump',
      expect.arrayContaining([`--file=${target}`]),
      expect.anything()
    );
  });

  test('restore refuses a missing file before connecting', async () => {
    await expect(
      dbRestore(testDir, path.join(testDir, 'missing.sql'), {})
    ).rejects.toThrow(UserError);
    expect(execaMock).not.toHaveBeenCalled();
  });

  test('restore runs psql on the file', async () => {
    const file = path.join(testDir, 'dump.sql');
    await fs.writeFile(file, 'SELECT 1;\n');

    await dbRestore(testDir, file, { dbHost: 'db.internal', dbPort: '6432' });

    expect(execaMock).toHaveBeenCalledWith(
      'psql',
      ['--host=db.internal', '--port=6432', '--username=postgres', '--dbname=postgres', '-f', file],
      { env: { PGPASSWORD: 'test-secret' }, stdio: 'inherit' }
    );
  });

  test('needs an initialized directory', async () => {
    const emptyDir = await fs.mkdtemp(path.join(os.tmpdir(), 'db-empty-'));
    try {
      await expect(dbBackup(emptyDir, undefined, {})).rejects.toThrow(SetupNotFoundError);
    } finally {
      await fs.remove(emptyDir);
    }
  });
});
