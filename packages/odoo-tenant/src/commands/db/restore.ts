/**
 * db restore command - Feed a SQL dump into the master database
 */

import path from 'path';
import fs from 'fs-extra';
import chalk from 'chalk';
import { UserError } from '../../errors.js';
import type { DbOptions } from '../../types.js';
import { openDatabase } from '../../utils/project.js';

export async function dbRestore(directory: string, file: string, options: DbOptions): Promise<void> {
  const backupFile = path.resolve(process.cwd(), file);
  if (!(await fs.pathExists(backupFile))) {
    throw new UserError(`Backup file ${backupFile} does not exist`);
  }

  const { database } = await openDatabase(directory, options);

  console.log(chalk.gray(`\n♻️  Restoring ${path.basename(backupFile)} into ${database.database}...`));
  await database.restoreBackup(backupFile);
  console.log(chalk.green('✅ Restore complete'));
}
