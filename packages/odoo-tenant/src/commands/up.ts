/**
 * up command - Start services
 */

import chalk from 'chalk';
import type { UpOptions } from '../types.js';
import { openProject } from '../utils/project.js';

export async function up(directory: string, service: string | undefined, options: UpOptions): Promise<void> {
  const { compose } = await openProject(directory);

  console.log(chalk.gray(`\n🚀 Starting ${service ?? 'all services'}...\n`));
  await compose.up(service, !options.attach);

  if (!options.attach) {
    console.log(chalk.green(`\n✅ Started ${service ?? 'all services'}`));
  }
}
