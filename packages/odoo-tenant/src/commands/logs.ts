/**
 * logs command - Print service logs
 */

import { openProject } from '../utils/project.js';

export async function logs(directory: string, service?: string): Promise<void> {
  const { compose } = await openProject(directory);

  const output = await compose.logs(service);
  process.stdout.write(output);
}
