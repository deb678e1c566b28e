/**
 * doctor command - Run diagnostics
 */

import fs from 'fs-extra';
import chalk from 'chalk';
import { resolveProjectPaths } from '../config.js';
import { DockerNotFoundError } from '../errors.js';
import { ConfigManager } from '../managers/config-manager.js';
import { detectComposeCommand } from '../managers/compose-manager.js';
import type { ComposeCommand } from '../managers/compose-manager.js';
import { checkPrerequisites, getCliVersion } from '../utils.js';
import { isInitialized } from '../utils/project.js';

export async function doctor(directory: string): Promise<void> {
  const paths = resolveProjectPaths(directory);

  console.log(chalk.blue.bold('\n🩺 odoo-tenant Diagnostics\n'));

  console.log(chalk.cyan('CLI Version:'), getCliVersion());

  // Prerequisites
  console.log(chalk.cyan('\n📋 Prerequisites:'));

  let composeCommand: ComposeCommand | undefined;
  try {
    composeCommand = await detectComposeCommand();
  } catch (error) {
    if (!(error instanceof DockerNotFoundError)) {
      throw error;
    }
  }
  const prereqs = await checkPrerequisites(composeCommand);

  console.log(
    chalk.gray('  Node.js:'),
    prereqs.node.satisfies
      ? chalk.green(`✓ v${prereqs.node.version}`)
      : chalk.yellow(`⚠️  v${prereqs.node.version} (need v20+)`)
  );
  console.log(
    chalk.gray('  Docker Compose:'),
    prereqs.compose.command
      ? chalk.green(`✓ ${prereqs.compose.command.join(' ')}`)
      : chalk.red('✗ Not available')
  );
  console.log(
    chalk.gray('  pg_dump:'),
    prereqs.pgDump.version ? chalk.green(`✓ ${prereqs.pgDump.version}`) : chalk.yellow('✗ Not installed')
  );
  console.log(
    chalk.gray('  psql:'),
    prereqs.psql.version ? chalk.green(`✓ ${prereqs.psql.version}`) : chalk.yellow('✗ Not installed')
  );

  // Project info
  console.log(chalk.cyan('\n📂 Project:'));
  console.log(chalk.gray('  Directory:'), paths.dir);

  const initialized = isInitialized(paths);
  console.log(
    chalk.gray('  Setup file:'),
    initialized ? chalk.green('✓') : chalk.yellow('✗ Missing')
  );
  console.log(
    chalk.gray('  Compose file:'),
    fs.existsSync(paths.composeFile) ? chalk.green('✓') : chalk.yellow('✗ Missing')
  );

  if (initialized) {
    const config = await ConfigManager.load(paths.setupFile);
    console.log(chalk.gray('  Odoo version:'), config.getVersion());
    console.log(chalk.gray('  Hosts:'), config.getHosts().join(', '));
    console.log(chalk.gray('  Environments:'), config.getOdoos().map((odoo) => odoo.name).join(', ') || '-');
  }

  // Recommendations
  console.log(chalk.cyan('\n💡 Recommendations:'));
  const recommendations: string[] = [];

  if (!prereqs.node.satisfies) {
    recommendations.push('Upgrade Node.js to v20 or higher');
  }
  if (!prereqs.compose.installed) {
    recommendations.push('Install Docker with the Compose plugin: https://docs.docker.com/compose/install/');
  }
  if (!prereqs.pgDump.installed || !prereqs.psql.installed) {
    recommendations.push('Install the PostgreSQL client tools to use ' + chalk.cyan('odoo-tenant db backup/restore'));
  }
  if (!initialized) {
    recommendations.push('Run ' + chalk.cyan('odoo-tenant init --host <host>') + ' to create a setup');
  }

  if (recommendations.length === 0) {
    console.log(chalk.green('  ✓ Everything looks good!'));
  } else {
    recommendations.forEach((rec) => console.log(chalk.yellow('  •'), rec));
  }

  console.log();
}
