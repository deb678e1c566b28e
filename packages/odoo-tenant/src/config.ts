/**
 * Resolution of project files and database connection settings
 */

import path from 'path';
import { COMPOSE_FILE, SETUP_FILE } from './constants.js';
import { ValidationError } from './errors.js';
import type { DbOptions, ProjectPaths } from './types.js';

export function resolveProjectPaths(directory: string): ProjectPaths {
  const dir = path.resolve(process.cwd(), directory);
  return {
    dir,
    composeFile: path.join(dir, COMPOSE_FILE),
    setupFile: path.join(dir, SETUP_FILE),
  };
}

export interface DatabaseEndpoint {
  host: string;
  port: number;
}

/**
 * Where the shared PostgreSQL server listens: command options first, then
 * PGHOST/PGPORT, then the port the db service publishes on this machine.
 */
export function resolveDatabaseEndpoint(
  options: DbOptions,
  env: NodeJS.ProcessEnv = process.env
): DatabaseEndpoint {
  const host = options.dbHost ?? env.PGHOST ?? 'localhost';
  const rawPort = options.dbPort ?? env.PGPORT ?? '5432';
  const port = parseInt(rawPort, 10);

  if (isNaN(port) || port <= 0 || port > 65535) {
    throw new ValidationError(`Invalid database port '${rawPort}'`);
  }

  return { host, port };
}
