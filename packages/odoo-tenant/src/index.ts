#!/usr/bin/env node

/**
 * odoo-tenant CLI
 *
 * Provisions a shared PostgreSQL server and a reverse proxy with Docker
 * Compose, and manages the Odoo environments routed through them.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';

import { init } from './commands/init.js';
import { envCreate } from './commands/env/create.js';
import { envDelete } from './commands/env/delete.js';
import { envList } from './commands/env/list.js';
import { hostList } from './commands/host/list.js';
import { hostAdd } from './commands/host/add.js';
import { hostRemove } from './commands/host/remove.js';
import { dbList } from './commands/db/list.js';
import { dbBackup } from './commands/db/backup.js';
import { dbRestore } from './commands/db/restore.js';
import { dbDuplicate } from './commands/db/duplicate.js';
import { up } from './commands/up.js';
import { down } from './commands/down.js';
import { restart } from './commands/restart.js';
import { logs } from './commands/logs.js';
import { status } from './commands/status.js';
import { doctor } from './commands/doctor.js';
import { DEFAULT_VERSION, VALID_VERSIONS } from './constants.js';
import { SystemError } from './errors.js';
import type {
  DbOptions,
  EnvCreateOptions,
  EnvDeleteOptions,
  GlobalOptions,
  HostAddOptions,
  InitOptions,
  UpOptions,
} from './types.js';
import { getCliVersion } from './utils.js';

/** Project directory from the global --dir option */
function projectDir(command: Command): string {
  return command.optsWithGlobals<GlobalOptions>().dir;
}

const program = new Command();

program
  .name('odoo-tenant')
  .description('Provision and manage multi-tenant Odoo deployments on Docker Compose')
  // --version is init's Odoo release option
  .version(getCliVersion(), '-v, --cli-version', 'Output the current version')
  .option('-d, --dir <directory>', 'Directory holding docker-compose.yml and setup.yml', '.');

// init command
program
  .command('init')
  .description('Create the database, proxy and first environment')
  .requiredOption('--host <hosts...>', 'Host name(s) the environments are served under')
  .addOption(
    new Option('--version <version>', 'Odoo version to install')
      .choices(VALID_VERSIONS)
      .default(DEFAULT_VERSION)
  )
  .option('--skip-host-check', 'Accept hosts without checking their DNS records')
  .action(async (options: InitOptions, command: Command) => {
    await init(projectDir(command), options);
  });

// ============================================================================
// Environment commands
// ============================================================================

const envCommand = program.command('env').description('Manage Odoo environments');

envCommand
  .command('create')
  .description('Create one or more environments')
  .argument('<names...>', 'environment names')
  .option('--start', 'Start the new containers')
  .action(async (names: string[], options: EnvCreateOptions, command: Command) => {
    await envCreate(projectDir(command), names, options);
  });

envCommand
  .command('delete')
  .description('Delete one or more environments')
  .argument('<names...>', 'environment names')
  .option('-f, --force', 'Skip the confirmation prompt')
  .action(async (names: string[], options: EnvDeleteOptions, command: Command) => {
    await envDelete(projectDir(command), names, options);
  });

envCommand
  .command('list')
  .description('List environments')
  .action(async (_options: unknown, command: Command) => {
    await envList(projectDir(command));
  });

// ============================================================================
// Host commands
// ============================================================================

const hostCommand = program.command('host').description('Manage the host names of the setup');

hostCommand
  .command('list')
  .description('List host names')
  .action(async (_options: unknown, command: Command) => {
    await hostList(projectDir(command));
  });

hostCommand
  .command('add')
  .description('Add a host name')
  .argument('<host>', 'host name')
  .option('--skip-host-check', 'Accept the host without checking its DNS record')
  .action(async (host: string, options: HostAddOptions, command: Command) => {
    await hostAdd(projectDir(command), host, options);
  });

hostCommand
  .command('remove')
  .description('Remove a host name')
  .argument('<host>', 'host name')
  .action(async (host: string, _options: unknown, command: Command) => {
    await hostRemove(projectDir(command), host);
  });

// ============================================================================
// Database commands
// ============================================================================

const dbCommand = program
  .command('db')
  .description('Administer the shared PostgreSQL server')
  .option('--db-host <host>', 'PostgreSQL host (default: $PGHOST or localhost)')
  .option('--db-port <port>', 'PostgreSQL port (default: $PGPORT or 5432)');

dbCommand
  .command('list')
  .description('List databases')
  .action(async (_options: unknown, command: Command) => {
    await dbList(projectDir(command), command.optsWithGlobals<DbOptions>());
  });

dbCommand
  .command('backup')
  .description('Dump the master database to a SQL file')
  .argument('[path]', 'output file (a timestamp is added unless it ends in .sql)')
  .action(async (output: string | undefined, _options: unknown, command: Command) => {
    await dbBackup(projectDir(command), output, command.optsWithGlobals<DbOptions>());
  });

dbCommand
  .command('restore')
  .description('Restore the master database from a SQL file')
  .argument('<file>', 'SQL dump to restore')
  .action(async (file: string, _options: unknown, command: Command) => {
    await dbRestore(projectDir(command), file, command.optsWithGlobals<DbOptions>());
  });

dbCommand
  .command('duplicate')
  .description('Replace a database with a copy of another')
  .argument('<source>', 'database to copy')
  .argument('<target>', 'database to replace')
  .action(async (source: string, target: string, _options: unknown, command: Command) => {
    await dbDuplicate(projectDir(command), source, target, command.optsWithGlobals<DbOptions>());
  });

// ============================================================================
// Lifecycle commands
// ============================================================================

program
  .command('up')
  .description('Start services')
  .argument('[service]', 'only this service')
  .option('--attach', 'Attach to logs (runs in foreground)')
  .action(async (service: string | undefined, options: UpOptions, command: Command) => {
    await up(projectDir(command), service, options);
  });

program
  .command('down')
  .description('Stop and remove all containers')
  .action(async (_options: unknown, command: Command) => {
    await down(projectDir(command));
  });

program
  .command('restart')
  .description('Restart services')
  .argument('[service]', 'only this service')
  .action(async (service: string | undefined, _options: unknown, command: Command) => {
    await restart(projectDir(command), service);
  });

program
  .command('logs')
  .description('Print service logs')
  .argument('[service]', 'only this service')
  .action(async (service: string | undefined, _options: unknown, command: Command) => {
    await logs(projectDir(command), service);
  });

program
  .command('status')
  .description('Show status of services')
  .argument('[service]', 'only this service')
  .action(async (service: string | undefined, _options: unknown, command: Command) => {
    await status(projectDir(command), service);
  });

program
  .command('doctor')
  .description('Run diagnostics and show system info')
  .action(async (_options: unknown, command: Command) => {
    await doctor(projectDir(command));
  });

try {
  await program.parseAsync(process.argv);
} catch (error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red('\n❌ Error:'), message);

  if (error instanceof SystemError && error.stderr) {
    console.error(chalk.gray('\nDetails:'));
    console.error(chalk.gray(error.stderr));
  }

  console.error(chalk.yellow('\n💡 Try running:'), chalk.cyan('odoo-tenant doctor'));

  process.exit(1);
}
