/**
 * env create command - Add Odoo environments
 */

import chalk from 'chalk';
import { ENVIRONMENT_NAME_PATTERN, PROTECTED_SERVICES } from '../../constants.js';
import { OdooConfig } from '../../configs/odoo-config.js';
import { OdooAlreadyExistsError, ServiceAlreadyExistsError, ValidationError } from '../../errors.js';
import { createEnvironmentService } from '../../services/whoami-service.js';
import type { EnvCreateOptions } from '../../types.js';
import { environmentUrl, openProject } from '../../utils/project.js';
import { generateSecret } from '../../utils.js';

export async function envCreate(
  directory: string,
  names: string[],
  options: EnvCreateOptions
): Promise<void> {
  const { config, compose } = await openProject(directory);
  const [host] = config.getHosts();

  for (const name of names) {
    if (PROTECTED_SERVICES.has(name)) {
      throw new ValidationError(`Cannot add ${name} service.`);
    }
    if (!ENVIRONMENT_NAME_PATTERN.test(name)) {
      throw new ValidationError(
        `Invalid environment name '${name}': use lowercase letters, digits and dashes, starting with a letter or digit`
      );
    }
    if (config.hasOdoo(name)) {
      throw new OdooAlreadyExistsError(name);
    }
    if (compose.hasService(name)) {
      throw new ServiceAlreadyExistsError(name);
    }

    await config.addOdoo(new OdooConfig(name, generateSecret()));
    await compose.addService(createEnvironmentService(name, host));

    console.log(chalk.green('✅ Created environment'), chalk.bold(name), chalk.gray(environmentUrl(name, host)));

    if (options.start) {
      console.log(chalk.gray(`🚀 Starting ${name}...`));
      await compose.up(name);
    }
  }
}
