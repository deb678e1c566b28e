/**
 * status command - Show container status
 */

import chalk from 'chalk';
import { openProject } from '../utils/project.js';

export async function status(directory: string, service?: string): Promise<void> {
  const { compose } = await openProject(directory);

  console.log(chalk.blue.bold('\n📊 Service Status\n'));

  try {
    await compose.ps(service);
  } catch (error) {
    console.error(chalk.red('\n❌ Failed to get status'));
    throw error;
  }
}
