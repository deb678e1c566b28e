/**
 * Opening the managers of a project directory, shared across CLI commands
 */

import fs from 'fs-extra';
import { resolveDatabaseEndpoint, resolveProjectPaths } from '../config.js';
import { ComposeManager } from '../managers/compose-manager.js';
import { ConfigManager } from '../managers/config-manager.js';
import { DatabaseManager } from '../managers/database-manager.js';
import type { DbOptions, ProjectPaths } from '../types.js';

export interface Project {
  paths: ProjectPaths;
  config: ConfigManager;
  compose: ComposeManager;
}

/**
 * Check if a directory already holds a setup
 */
export function isInitialized(paths: ProjectPaths): boolean {
  return fs.existsSync(paths.setupFile);
}

/**
 * Load setup.yml and docker-compose.yml of an initialized project
 *
 * @throws SetupNotFoundError if init has not been run in `directory`
 */
export async function openProject(directory: string): Promise<Project> {
  const paths = resolveProjectPaths(directory);
  const config = await ConfigManager.load(paths.setupFile);
  const compose = await ComposeManager.open(paths.composeFile);
  return { paths, config, compose };
}

/**
 * Connect as the master user recorded in setup.yml
 */
export async function openDatabase(
  directory: string,
  options: DbOptions
): Promise<{ config: ConfigManager; database: DatabaseManager }> {
  const paths = resolveProjectPaths(directory);
  const config = await ConfigManager.load(paths.setupFile);
  const db = config.getDb();
  const { host, port } = resolveDatabaseEndpoint(options);

  const database = new DatabaseManager({
    host,
    port,
    user: db.user,
    password: db.password,
    database: db.name,
  });

  return { config, database };
}

export function environmentUrl(name: string, host: string): string {
  return `http://${name}.${host}`;
}
