/**
 * Shared types for the odoo-tenant CLI
 */

import type { VALID_RESTART_POLICIES, VALID_SERVICE_KEYS } from './constants.js';

export type ServiceConfigKey = (typeof VALID_SERVICE_KEYS)[number];

export type RestartPolicy = (typeof VALID_RESTART_POLICIES)[number];

export interface HealthcheckConfig {
  test: string[];
  interval: string;
  timeout: string;
  retries: number;
  start_period?: string;
}

/**
 * One service entry of the compose file.
 *
 * Keys whose value kind is checked on load are typed; the rest of the allowed
 * keys are carried through as they were read. The setters write
 * `RestartPolicy` and `HealthcheckConfig` values.
 */
export type ServiceConfig = {
  image?: string;
  command?: string | unknown[];
  ports?: unknown[];
  environment?: Record<string, unknown>;
  volumes?: unknown[];
  depends_on?: unknown[];
  /** List of `key=value` strings or a mapping */
  labels?: unknown;
  restart?: unknown;
  healthcheck?: unknown;
  build?: unknown;
  container_name?: unknown;
  networks?: unknown;
  expose?: unknown;
  env_file?: unknown;
  entrypoint?: unknown;
  user?: unknown;
  working_dir?: unknown;
};

/** `{ <service name>: <config> }`, the shape a service takes in the compose file */
export type ServiceDefinition = Record<string, ServiceConfig>;

export interface ComposeDocument {
  /** Entries as stored; they are validated when read back through `BaseService.fromDict` */
  services: Record<string, Record<string, unknown>>;
  [key: string]: unknown;
}

export interface DatabaseConfigDict {
  name: string;
  user: string;
  password: string;
}

export interface OdooConfigDict {
  name: string;
  db_password: string;
}

/** Logical setup stored in setup.yml */
export interface SetupDocument {
  version: string;
  hosts: string[];
  db: DatabaseConfigDict;
  services: OdooConfigDict[];
}

export interface ProjectPaths {
  /** Absolute path to the project directory */
  dir: string;
  composeFile: string;
  setupFile: string;
}

// ============================================================================
// Command options
// ============================================================================

/** Options from the program, read through `optsWithGlobals` */
export type GlobalOptions = {
  dir: string;
};

export interface InitOptions {
  host: string[];
  version: string;
  skipHostCheck?: boolean;
}

export interface EnvCreateOptions {
  start?: boolean;
}

export interface EnvDeleteOptions {
  force?: boolean;
}

export interface HostAddOptions {
  skipHostCheck?: boolean;
}

export type DbOptions = {
  dbHost?: string;
  dbPort?: string;
};

export interface UpOptions {
  attach?: boolean;
}

export interface Prerequisites {
  compose: {
    installed: boolean;
    command?: string[];
  };
  pgDump: {
    installed: boolean;
    version?: string;
  };
  psql: {
    installed: boolean;
    version?: string;
  };
  node: {
    version: string;
    satisfies: boolean;
  };
}
