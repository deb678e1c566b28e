/**
 * down command - Stop and remove all containers
 */

import chalk from 'chalk';
import { openProject } from '../utils/project.js';

export async function down(directory: string): Promise<void> {
  const { compose } = await openProject(directory);

  console.log(chalk.gray('\n⏸️  Stopping services...\n'));
  await compose.down();
  console.log(chalk.green('\n✅ Services stopped'));
}
