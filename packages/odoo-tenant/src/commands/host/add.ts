/**
 * host add command
 */

import chalk from 'chalk';
import ora from 'ora';
import { resolveProjectPaths } from '../../config.js';
import { ConfigManager } from '../../managers/config-manager.js';
import type { HostAddOptions } from '../../types.js';
import { validateHosts } from '../../utils/host-validation.js';

export async function hostAdd(directory: string, host: string, options: HostAddOptions): Promise<void> {
  const config = await ConfigManager.load(resolveProjectPaths(directory).setupFile);

  if (!options.skipHostCheck) {
    const spinner = ora(`Validating ${host}...`).start();
    try {
      await validateHosts([host]);
      spinner.succeed(`${host} points at this machine`);
    } catch (error) {
      spinner.fail('Host validation failed');
      throw error;
    }
  }

  await config.addHost(host);
  console.log(chalk.green('✅ Hosts:'), config.listHosts().join(', '));
}
