/**
 * env list command - Show Odoo environments
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import { environmentUrl, openProject } from '../../utils/project.js';

export async function envList(directory: string): Promise<void> {
  const { config, compose } = await openProject(directory);
  const odoos = config.getOdoos();
  const [host] = config.getHosts();

  if (odoos.length === 0) {
    console.log(chalk.dim('No environments found. Create one with: odoo-tenant env create <name>'));
    return;
  }

  const table = new Table({
    head: ['Name', 'URL', 'Service'],
    style: {
      head: [],
      border: ['gray'],
    },
  });

  for (const odoo of odoos) {
    table.push([
      chalk.bold(odoo.name),
      environmentUrl(odoo.name, host),
      compose.hasService(odoo.name) ? chalk.green('✓') : chalk.yellow('✗ missing'),
    ]);
  }

  console.log();
  console.log(table.toString());
  console.log();
}
