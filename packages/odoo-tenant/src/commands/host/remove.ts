/**
 * host remove command
 */

import chalk from 'chalk';
import { resolveProjectPaths } from '../../config.js';
import { ConfigManager } from '../../managers/config-manager.js';

export async function hostRemove(directory: string, host: string): Promise<void> {
  const config = await ConfigManager.load(resolveProjectPaths(directory).setupFile);

  await config.removeHost(host);
  console.log(chalk.green('✅ Hosts:'), config.listHosts().join(', '));
}
