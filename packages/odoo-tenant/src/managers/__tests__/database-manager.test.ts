import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { DatabaseManager } from '../database-manager.js';
import { DatabaseCommandError } from '../../errors.js';

const { execaMock, FakeClient } = vi.hoisted(() => {
  interface QueryConfig {
    text: string;
    values?: unknown[];
    rowMode?: string;
  }

  class FakeClient {
    static instances: FakeClient[] = [];
    static nextResult: { rows: unknown[][]; fields: unknown[] } = { rows: [], fields: [] };
    static queryError: Error | undefined;
    static endError: Error | undefined;

    readonly queries: Array<{ text: string; values?: unknown[] }> = [];
    connected = false;
    ended = false;

    constructor(readonly options: Record<string, unknown>) {
      FakeClient.instances.push(this);
    }

    async connect(): Promise<void> {
      this.connected = true;
    }

    async query(
      query: string | QueryConfig,
      values?: unknown[]
    ): Promise<{ rows: unknown[][]; fields: unknown[] }> {
      if (typeof query === 'string') {
        this.queries.push({ text: query, values });
      } else {
        this.queries.push({ text: query.text, values: query.values });
      }
      if (FakeClient.queryError) {
        throw FakeClient.queryError;
      }
      return FakeClient.nextResult;
    }

    escapeLiteral(value: string): string {
      return `'${value.replace(/'/g, "''")}'`;
    }

    async end(): Promise<void> {
      this.ended = true;
      if (FakeClient.endError) {
        throw FakeClient.endError;
      }
    }
  }

  return { execaMock: vi.fn(), FakeClient };
});

vi.mock('execa', () => ({ execa: execaMock }));
vi.mock('pg', () => ({ default: { Client: FakeClient } }));

describe('DatabaseManager', () => {
  const manager = new DatabaseManager({
    host: 'db.internal',
    port: 6432,
    user: 'postgres',
    password: 'test-secret',
    database: 'postgres',
  });

  beforeEach(() => {
    FakeClient.instances = [];
    FakeClient.nextResult = { rows: [], fields: [] };
    FakeClient.queryError = undefined;
    FakeClient.endError = undefined;
    execaMock.mockReset();
    execaMock.mockResolvedValue({ stdout: '', stderr: '' });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('applies connection defaults', () => {
    const defaults = new DatabaseManager({ password: 'test-secret' });

    expect(defaults.host).toBe('localhost');
    expect(defaults.port).toBe(5432);
    expect(defaults.user).toBe('postgres');
    expect(defaults.database).toBe('postgres');
  });

  describe('executeSql', () => {
    test('returns rows and closes the connection', async () => {
      FakeClient.nextResult = { rows: [['postgres'], ['live']], fields: [{ name: 'datname' }] };

      const rows = await manager.executeSql('SELECT datname FROM pg_database WHERE datname = $1', ['live']);

      expect(rows).toEqual([['postgres'], ['live']]);
      const [client] = FakeClient.instances;
      expect(client?.options).toEqual({
        host: 'db.internal',
        port: 6432,
        user: 'postgres',
        password: 'test-secret',
        database: 'postgres',
      });
      expect(client?.queries).toEqual([
        { text: 'SELECT datname FROM pg_database WHERE datname = $1', values: ['live'] },
      ]);
      expect(client?.ended).toBe(true);
    });

    test('returns no rows for statements without a result set', async () => {
      FakeClient.nextResult = { rows: [], fields: [] };

      await expect(manager.executeSql('CREATE TABLE t (id int)')).resolves.toEqual([]);
    });

    test('reports the query error when closing the connection also fails', async () => {
      FakeClient.queryError = new Error('relation "missing" does not exist');
      FakeClient.endError = new Error('Connection terminated unexpectedly');

      await expect(manager.executeSql('SELECT * FROM missing')).rejects.toThrow(
        'relation "missing" does not exist'
      );
      expect(FakeClient.instances[0]?.ended).toBe(true);
    });

    test('reports a failure to close after a successful query', async () => {
      FakeClient.endError = new Error('Connection terminated unexpectedly');

      await expect(manager.executeSql('SELECT 1')).rejects.toThrow(
        'Connection terminated unexpectedly'
      );
    });
  });

  test('listDatabases flattens the names', async () => {
    FakeClient.nextResult = { rows: [['postgres'], ['live']], fields: [{ name: 'datname' }] };

    await expect(manager.listDatabases()).resolves.toEqual(['postgres', 'live']);
    expect(FakeClient.instances[0]?.queries[0]?.text).toBe(
      'SELECT datname FROM pg_database WHERE datistemplate = false'
    );
  });

  test('duplicateDatabase terminates, drops and recreates on the maintenance database', async () => {
    await manager.duplicateDatabase('live', 'staging');

    const [client] = FakeClient.instances;
    expect(client?.options.database).toBe('postgres');
    expect(client?.queries.map((q) => q.values)).toEqual([['staging'], undefined, undefined]);
    expect(client?.queries[1]?.text).toBe('DROP DATABASE IF EXISTS staging');
    expect(client?.queries[2]?.text).toBe('CREATE DATABASE staging WITH TEMPLATE live');
    expect(client?.ended).toBe(true);
  });

  test('createUser quotes the password and optionally grants superuser', async () => {
    await manager.createUser('odoo_live', "it's-secret", true);

    expect(FakeClient.instances[0]?.queries.map((q) => q.text)).toEqual([
      "CREATE USER odoo_live WITH PASSWORD 'it''s-secret'",
      'ALTER USER odoo_live WITH SUPERUSER',
    ]);
  });

  describe('createBackup', () => {
    test('keeps a path ending in .sql', async () => {
      const written = await manager.createBackup('/backups/live.sql');

      expect(written).toBe('/backups/live.sql');
      expect(execaMock).toHaveBeenCalledWith(
        'pg_dump',
        [
          '--host=db.internal',
          '--port=6432',
          '--username=postgres',
          '--dbname=postgres',
          '--format=p',
          '--file=/backups/live.sql',
        ],
        { env: { PGPASSWORD: 'test-secret' }, stdio: 'inherit' }
      );
    });

    test('adds a timestamp to other paths', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date(2024, 2, 5, 14, 7, 9));

      await expect(manager.createBackup('/backups/live')).resolves.toBe(
        '/backups/live_20240305_140709.sql'
      );
    });

    test('wraps a failing pg_dump', async () => {
      execaMock.mockRejectedValueOnce(new Error('pg_dump: connection refused'));

      const error = await manager.createBackup('/backups/live.sql').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DatabaseCommandError);
      expect(error).toHaveProperty('errorMessage', 'pg_dump: connection refused');
    });
  });

  test('restoreBackup feeds the file to psql', async () => {
    await manager.restoreBackup('/backups/live.sql');

    expect(execaMock).toHaveBeenCalledWith(
      'psql',
      [
        '--host=db.internal',
        '--port=6432',
        '--username=postgres',
        '--dbname=postgres',
        '-f',
        '/backups/live.sql',
      ],
      { env: { PGPASSWORD: 'test-secret' }, stdio: 'inherit' }
    );
  });
});
