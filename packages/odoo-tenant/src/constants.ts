/**
 * Fixed values shared across the CLI
 */

/** Keys a compose service entry may carry */
export const VALID_SERVICE_KEYS = [
  'image',
  'command',
  'ports',
  'environment',
  'volumes',
  'depends_on',
  'build',
  'container_name',
  'restart',
  'networks',
  'labels',
  'expose',
  'env_file',
  'entrypoint',
  'user',
  'working_dir',
  'healthcheck',
] as const;

export const VALID_RESTART_POLICIES = ['no', 'always', 'on-failure', 'unless-stopped'] as const;

/**
 * Infrastructure services that are never created or removed as environments,
 * and never removed from the compose file.
 */
export const PROTECTED_SERVICES: ReadonlySet<string> = new Set(['db', 'traefik']);

export const VALID_VERSIONS = ['18.0'] as const;
export const DEFAULT_VERSION = '18.0';

export const COMPOSE_FILE = 'docker-compose.yml';
export const SETUP_FILE = 'setup.yml';

export const DB_SERVICE_NAME = 'db';
export const PROXY_SERVICE_NAME = 'traefik';
export const DB_MASTER_DEFAULT_NAME = 'postgres';

export const INITIAL_ENVIRONMENT = 'live';
export const ENVIRONMENT_PORT = 8069;

/** Environment names double as sub-domains and compose service names */
export const ENVIRONMENT_NAME_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

export const PUBLIC_IP_URL = 'https://api.ipify.org';
