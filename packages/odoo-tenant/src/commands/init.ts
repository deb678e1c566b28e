/**
 * init command - Create the base stack: database, proxy and the first environment
 */

import path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { resolveProjectPaths } from '../config.js';
import {
  DB_MASTER_DEFAULT_NAME,
  DB_SERVICE_NAME,
  INITIAL_ENVIRONMENT,
  PROXY_SERVICE_NAME,
} from '../constants.js';
import { DatabaseConfig } from '../configs/database-config.js';
import { OdooConfig } from '../configs/odoo-config.js';
import { ConfigFileExistsError, SetupAlreadyExistsError } from '../errors.js';
import { ComposeManager } from '../managers/compose-manager.js';
import { ConfigManager } from '../managers/config-manager.js';
import { PostgresService } from '../services/postgres-service.js';
import { TraefikService } from '../services/traefik-service.js';
import { createEnvironmentService } from '../services/whoami-service.js';
import type { InitOptions } from '../types.js';
import { validateHosts } from '../utils/host-validation.js';
import { environmentUrl, isInitialized } from '../utils/project.js';
import { generateSecret } from '../utils.js';

export async function init(directory: string, options: InitOptions): Promise<void> {
  console.log(chalk.blue.bold('\n🐘 Initializing Odoo setup\n'));

  const paths = resolveProjectPaths(directory);
  if (isInitialized(paths)) {
    throw new ConfigFileExistsError(paths.setupFile);
  }

  if (!options.skipHostCheck) {
    const spinner = ora('Validating hosts...').start();
    try {
      await validateHosts(options.host);
      spinner.succeed(`Hosts OK: ${options.host.join(', ')}`);
    } catch (error) {
      spinner.fail('Host validation failed');
      throw error;
    }
  }

  const compose = await ComposeManager.open(paths.composeFile);
  if (Object.keys(compose.config.services).length > 0) {
    throw new SetupAlreadyExistsError(paths.composeFile);
  }

  const config = await ConfigManager.create({
    version: options.version,
    hosts: options.host,
    db: new DatabaseConfig(DB_MASTER_DEFAULT_NAME, DB_MASTER_DEFAULT_NAME, generateSecret()),
    configPath: paths.setupFile,
  });

  await compose.addService(new PostgresService(DB_SERVICE_NAME, config.getDb()));
  await compose.addService(new TraefikService(PROXY_SERVICE_NAME, { apiInsecure: true }));

  const [host] = config.getHosts();
  await config.addOdoo(new OdooConfig(INITIAL_ENVIRONMENT, generateSecret()));
  await compose.addService(createEnvironmentService(INITIAL_ENVIRONMENT, host));

  console.log(chalk.green('✅ Created'), chalk.cyan(path.basename(paths.composeFile)), chalk.green('and'), chalk.cyan(path.basename(paths.setupFile)));
  console.log(chalk.gray('   Odoo version:'), options.version);
  console.log(chalk.gray('   Services:'), compose.listServices().join(', '));
  console.log(chalk.gray('   First environment:'), chalk.cyan(environmentUrl(INITIAL_ENVIRONMENT, host)));
  console.log(chalk.gray('\n   Run'), chalk.cyan('odoo-tenant up'), chalk.gray('to start the stack.\n'));
}
