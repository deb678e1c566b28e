/**
 * Setup file manager
 *
 * Sole reader and writer of setup.yml: the Odoo version, the host names the
 * proxy answers for, the master database credentials and the environments.
 */

import fs from 'fs-extra';
import YAML from 'yaml';
import { z } from 'zod';
import { PROTECTED_SERVICES, SETUP_FILE } from '../constants.js';
import { DatabaseConfig } from '../configs/database-config.js';
import { OdooConfig } from '../configs/odoo-config.js';
import {
  ConfigFileExistsError,
  ConfigFilePermissionError,
  OdooAlreadyExistsError,
  OdooNotFoundError,
  SetupNotFoundError,
  ValidationError,
  isPermissionError,
} from '../errors.js';
import type { SetupDocument } from '../types.js';

const SetupDocumentSchema = z.object({
  version: z.string(),
  hosts: z.array(z.string()).min(1),
  db: z.object({
    name: z.string().min(1),
    user: z.string().min(1),
    password: z.string().min(1),
  }),
  services: z
    .array(
      z.object({
        name: z.string(),
        db_password: z.string(),
      })
    )
    .default([]),
});

export interface CreateSetupOptions {
  version: string;
  hosts: string[];
  db: DatabaseConfig;
  configPath?: string;
}

export class ConfigManager {
  private constructor(
    readonly configPath: string,
    private document: SetupDocument
  ) {}

  /**
   * Write a fresh setup file and open it.
   *
   * @throws ConfigFileExistsError if a file is already at the path; it is left untouched
   */
  static async create(options: CreateSetupOptions): Promise<ConfigManager> {
    const { version, hosts, db, configPath = SETUP_FILE } = options;

    if (await fs.pathExists(configPath)) {
      throw new ConfigFileExistsError(configPath);
    }
    assertHosts(hosts);

    const document: SetupDocument = {
      version,
      hosts: [...hosts],
      db: db.toDict(),
      services: [],
    };
    await writeDocument(configPath, document);

    return ConfigManager.load(configPath);
  }

  /**
   * @throws SetupNotFoundError if there is no file at the path
   */
  static async load(configPath: string = SETUP_FILE): Promise<ConfigManager> {
    if (!(await fs.pathExists(configPath))) {
      throw new SetupNotFoundError(configPath);
    }

    let text: string;
    try {
      text = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
      if (isPermissionError(error)) {
        throw new ConfigFilePermissionError(configPath, 'read');
      }
      throw error;
    }

    const parsed = SetupDocumentSchema.safeParse(YAML.parse(text) ?? {});
    if (!parsed.success) {
      throw new ValidationError(`Invalid setup file ${configPath}: ${parsed.error.message}`);
    }

    return new ConfigManager(configPath, parsed.data);
  }

  getVersion(): string {
    return this.document.version;
  }

  getDb(): DatabaseConfig {
    return DatabaseConfig.fromDict(this.document.db);
  }

  // ==========================================================================
  // Hosts
  // ==========================================================================

  getHosts(): string[] {
    return [...this.document.hosts];
  }

  listHosts(): string[] {
    return this.getHosts();
  }

  async setHosts(hosts: string[]): Promise<void> {
    assertHosts(hosts);
    await this.commit({ ...this.document, hosts: [...hosts] });
  }

  async addHost(host: string): Promise<void> {
    if (this.document.hosts.includes(host)) {
      return;
    }
    await this.commit({ ...this.document, hosts: [...this.document.hosts, host] });
  }

  /**
   * @throws ValidationError when `host` is the only one left
   */
  async removeHost(host: string): Promise<void> {
    if (!this.document.hosts.includes(host)) {
      return;
    }
    if (this.document.hosts.length <= 1) {
      throw new ValidationError('Cannot remove the only remaining host.');
    }
    await this.commit({ ...this.document, hosts: this.document.hosts.filter((h) => h !== host) });
  }

  // ==========================================================================
  // Odoo environments
  // ==========================================================================

  getOdoos(): OdooConfig[] {
    return this.document.services.map((service) => OdooConfig.fromDict(service));
  }

  hasOdoo(name: string): boolean {
    return this.document.services.some((service) => service.name === name);
  }

  /**
   * @throws OdooAlreadyExistsError
   * @throws ValidationError for infrastructure service names
   */
  async addOdoo(odoo: OdooConfig): Promise<void> {
    if (this.hasOdoo(odoo.name)) {
      throw new OdooAlreadyExistsError(odoo.name);
    }
    if (PROTECTED_SERVICES.has(odoo.name)) {
      throw new ValidationError(`Cannot add ${odoo.name} service.`);
    }

    await this.commit({ ...this.document, services: [...this.document.services, odoo.toDict()] });
  }

  /**
   * @throws ValidationError for infrastructure service names
   * @throws OdooNotFoundError
   */
  async removeOdoo(name: string): Promise<void> {
    if (PROTECTED_SERVICES.has(name)) {
      throw new ValidationError(`Cannot remove ${name} service.`);
    }
    if (!this.hasOdoo(name)) {
      throw new OdooNotFoundError(name);
    }

    await this.commit({
      ...this.document,
      services: this.document.services.filter((service) => service.name !== name),
    });
  }

  /** Write `document`, and only then make it the current state */
  private async commit(document: SetupDocument): Promise<void> {
    await writeDocument(this.configPath, document);
    this.document = document;
  }
}

function assertHosts(hosts: string[]): void {
  if (hosts.length === 0) {
    throw new ValidationError('There must be at least one host.');
  }
}

async function writeDocument(filePath: string, document: SetupDocument): Promise<void> {
  try {
    await fs.writeFile(filePath, YAML.stringify(document), 'utf-8');
  } catch (error) {
    if (isPermissionError(error)) {
      throw new ConfigFilePermissionError(filePath, 'write');
    }
    throw error;
  }
}
