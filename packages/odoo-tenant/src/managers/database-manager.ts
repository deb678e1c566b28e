/**
 * PostgreSQL administration
 *
 * Works directly against the shared server, independently of the compose and
 * setup files. Every call opens its own connection and closes it again.
 */

import { execa } from 'execa';
import pg from 'pg';
import type { Client } from 'pg';
import { format } from 'date-fns';
import { DatabaseCommandError } from '../errors.js';

export interface DatabaseConnectionOptions {
  host?: string;
  port?: number;
  user?: string;
  password: string;
  database?: string;
}

export class DatabaseManager {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly database: string;
  private readonly password: string;

  constructor(options: DatabaseConnectionOptions) {
    this.host = options.host ?? 'localhost';
    this.port = options.port ?? 5432;
    this.user = options.user ?? 'postgres';
    this.password = options.password;
    this.database = options.database ?? 'postgres';
  }

  /**
   * Run one statement in autocommit mode.
   *
   * @returns the rows in array form, or [] for statements without a result set
   */
  async executeSql(sql: string, params: unknown[] = []): Promise<unknown[][]> {
    return this.withClient(this.database, async (client) => {
      const result = await client.query<unknown[]>({ text: sql, values: params, rowMode: 'array' });
      return result.fields.length > 0 ? result.rows : [];
    });
  }

  /**
   * Dump the database as plain SQL.
   *
   * @param outputFile target path; without a .sql suffix a timestamp and the suffix are appended
   * @returns the path written
   */
  async createBackup(outputFile: string): Promise<string> {
    const target = outputFile.endsWith('.sql')
      ? outputFile
      : `${outputFile}_${format(new Date(), 'yyyyMMdd_HHmmss')}.sql`;

    await this.runTool('pg_dump', [
      ...this.connectionFlags(),
      '--format=p',
      `--file=${target}`,
    ]);

    return target;
  }

  async restoreBackup(backupFile: string): Promise<void> {
    await this.runTool('psql', [...this.connectionFlags(), '-f', backupFile]);
  }

  /**
   * Replace `target` with a copy of `source`.
   *
   * Three independent statements on the maintenance database; a failure part
   * way leaves whatever the earlier statements did.
   */
  async duplicateDatabase(source: string, target: string): Promise<void> {
    await this.withClient('postgres', async (client) => {
      await client.query(
        `SELECT pg_terminate_backend(pid)
         FROM pg_stat_activity
         WHERE datname = $1 AND pid != pg_backend_pid()`,
        [target]
      );
      await client.query(`DROP DATABASE IF EXISTS ${target}`);
      await client.query(`CREATE DATABASE ${target} WITH TEMPLATE ${source}`);
    });
  }

  // TODO: quote role and database names with client.escapeIdentifier once they can come from untrusted input
  async createUser(username: string, password: string, superuser = false): Promise<void> {
    await this.withClient(this.database, async (client) => {
      await client.query(`CREATE USER ${username} WITH PASSWORD ${client.escapeLiteral(password)}`);
      if (superuser) {
        await client.query(`ALTER USER ${username} WITH SUPERUSER`);
      }
    });
  }

  async listDatabases(): Promise<string[]> {
    const rows = await this.executeSql('SELECT datname FROM pg_database WHERE datistemplate = false');
    return rows.map((row) => String(row[0]));
  }

  private async withClient<T>(database: string, work: (client: Client) => Promise<T>): Promise<T> {
    const client = new pg.Client({
      host: this.host,
      port: this.port,
      user: this.user,
      password: this.password,
      database,
    });

    await client.connect();
    let result: T;
    try {
      result = await work(client);
    } catch (error) {
      // the query error wins over a failed disconnect
      await client.end().catch(() => undefined);
      throw error;
    }
    await client.end();
    return result;
  }

  private connectionFlags(): string[] {
    return [
      `--host=${this.host}`,
      `--port=${this.port}`,
      `--username=${this.user}`,
      `--dbname=${this.database}`,
    ];
  }

  private async runTool(command: string, args: string[]): Promise<void> {
    try {
      await execa(command, args, {
        env: { PGPASSWORD: this.password },
        stdio: 'inherit',
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DatabaseCommandError([command, ...args].join(' '), message);
    }
  }
}
