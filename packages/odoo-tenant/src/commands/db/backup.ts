/**
 * db backup command - Dump the master database to a SQL file
 */

import path from 'path';
import fs from 'fs-extra';
import chalk from 'chalk';
import type { DbOptions } from '../../types.js';
import { openDatabase } from '../../utils/project.js';

export async function dbBackup(directory: string, output: string | undefined, options: DbOptions): Promise<void> {
  const { database } = await openDatabase(directory, options);

  const target = path.resolve(process.cwd(), output ?? path.join(directory, 'backups', database.database));
  await fs.ensureDir(path.dirname(target));

  console.log(chalk.gray(`\n💾 Dumping ${database.database}...`));
  const written = await database.createBackup(target);
  console.log(chalk.green('✅ Backup written to'), chalk.cyan(written));
}
