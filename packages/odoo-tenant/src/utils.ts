/**
 * Utility functions for the odoo-tenant CLI
 */

import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';
import crypto from 'crypto';
import type { Prerequisites } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Generate a URL-safe random secret from `bytes` random bytes
 */
export function generateSecret(bytes = 32): string {
  return crypto.randomBytes(bytes).toString('base64url');
}

/**
 * Read package.json version
 */
export function getCliVersion(): string {
  const packagePath = path.join(__dirname, '../package.json');
  const packageJson: unknown = JSON.parse(fs.readFileSync(packagePath, 'utf-8'));
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

/**
 * Run `<command> --version` and return the first line of its output, or
 * undefined if the tool is missing.
 */
async function toolVersion(command: string): Promise<string | undefined> {
  try {
    const { stdout } = await execa(command, ['--version']);
    return stdout.split('\n')[0];
  } catch (e) {
    return undefined;
  }
}

/**
 * Check the external tools the CLI drives
 */
export async function checkPrerequisites(composeCommand?: string[]): Promise<Prerequisites> {
  const nodeVersion = process.version.replace('v', '');
  const majorVersion = parseInt(nodeVersion.split('.')[0] ?? '0', 10);

  const pgDumpVersion = await toolVersion('pg_dump');
  const psqlVersion = await toolVersion('psql');

  return {
    compose: {
      installed: composeCommand !== undefined,
      command: composeCommand,
    },
    pgDump: { installed: pgDumpVersion !== undefined, version: pgDumpVersion },
    psql: { installed: psqlVersion !== undefined, version: psqlVersion },
    node: { version: nodeVersion, satisfies: majorVersion >= 20 },
  };
}
