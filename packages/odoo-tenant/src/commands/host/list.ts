/**
 * host list command
 */

import chalk from 'chalk';
import { resolveProjectPaths } from '../../config.js';
import { ConfigManager } from '../../managers/config-manager.js';

export async function hostList(directory: string): Promise<void> {
  const config = await ConfigManager.load(resolveProjectPaths(directory).setupFile);
  const [primary, ...others] = config.listHosts();

  console.log(chalk.bold(primary), chalk.gray('(routes environments)'));
  others.forEach((host) => console.log(host));
}
