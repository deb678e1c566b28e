/**
 * db list command - Show databases on the shared server
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import ora from 'ora';
import type { DbOptions } from '../../types.js';
import { openDatabase } from '../../utils/project.js';

export async function dbList(directory: string, options: DbOptions): Promise<void> {
  const { database } = await openDatabase(directory, options);

  const spinner = ora(`Connecting to ${database.host}:${database.port}...`).start();
  let names: string[];
  try {
    names = await database.listDatabases();
    spinner.stop();
  } catch (error) {
    spinner.fail('Failed to list databases');
    throw error;
  }

  const table = new Table({
    head: ['Database'],
    style: {
      head: [],
      border: ['gray'],
    },
  });
  names.forEach((name) => table.push([chalk.bold(name)]));

  console.log();
  console.log(table.toString());
  console.log();
}
