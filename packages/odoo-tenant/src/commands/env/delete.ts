/**
 * env delete command - Remove Odoo environments
 */

import chalk from 'chalk';
import prompts from 'prompts';
import type { EnvDeleteOptions } from '../../types.js';
import { openProject } from '../../utils/project.js';

export async function envDelete(
  directory: string,
  names: string[],
  options: EnvDeleteOptions
): Promise<void> {
  const { config, compose } = await openProject(directory);

  if (!options.force) {
    console.log(chalk.yellow('\n⚠️  WARNING: This will remove from the setup:'));
    names.forEach((name) => console.log(chalk.yellow(`   • ${name}`)));

    const response = await prompts({
      type: 'confirm',
      name: 'confirmed',
      message: 'Are you sure?',
      initial: false,
    });

    if (!response.confirmed) {
      console.log(chalk.gray('\nCancelled'));
      return;
    }
  }

  for (const name of names) {
    await config.removeOdoo(name);
    if (compose.hasService(name)) {
      await compose.removeService(name);
    }
    console.log(chalk.green('✅ Deleted environment'), chalk.bold(name));
  }

  console.log(chalk.gray('\n   Run'), chalk.cyan('odoo-tenant up'), chalk.gray('to apply the change to running containers.\n'));
}
