/**
 * restart command - Restart services
 */

import chalk from 'chalk';
import { openProject } from '../utils/project.js';

export async function restart(directory: string, service?: string): Promise<void> {
  const { compose } = await openProject(directory);

  await compose.restart(service);
  console.log(chalk.green(`\n✅ Restarted ${service ?? 'all services'}`));
}
