/**
 * db duplicate command - Copy one database over another
 */

import chalk from 'chalk';
import ora from 'ora';
import type { DbOptions } from '../../types.js';
import { openDatabase } from '../../utils/project.js';

export async function dbDuplicate(
  directory: string,
  source: string,
  target: string,
  options: DbOptions
): Promise<void> {
  const { database } = await openDatabase(directory, options);

  const spinner = ora(`Copying ${source} to ${target}...`).start();
  try {
    await database.duplicateDatabase(source, target);
    spinner.succeed(`Copied ${chalk.bold(source)} to ${chalk.bold(target)}`);
  } catch (error) {
    spinner.fail(`Failed to copy ${source}`);
    throw error;
  }
}
