/**
 * Compose file manager
 *
 * Sole reader and writer of docker-compose.yml, and the only place that runs
 * the Docker Compose CLI. Every change rewrites the whole file.
 */

import { execa } from 'execa';
import fs from 'fs-extra';
import YAML from 'yaml';
import { z } from 'zod';
import { PROTECTED_SERVICES } from '../constants.js';
import {
  ComposeFilePermissionError,
  DockerCommandExecutionError,
  DockerNotFoundError,
  ServiceAlreadyExistsError,
  ServiceNotFoundError,
  ValidationError,
  isPermissionError,
} from '../errors.js';
import { BaseService } from '../services/base-service.js';
import type { ComposeDocument, ServiceConfig } from '../types.js';

/** Executable followed by its fixed leading arguments */
export type ComposeCommand = [string, ...string[]];

const ComposeDocumentSchema = z
  .object({
    services: z.record(z.record(z.unknown())).nullish(),
  })
  .passthrough();

/**
 * Detect whether to use `docker compose` or the standalone `docker-compose`
 *
 * @throws DockerNotFoundError if neither answers
 */
export async function detectComposeCommand(): Promise<ComposeCommand> {
  try {
    await execa('docker', ['compose', 'version']);
    return ['docker', 'compose'];
  } catch (e) {
    try {
      await execa('docker-compose', ['--version']);
      return ['docker-compose'];
    } catch (fallbackError) {
      throw new DockerNotFoundError();
    }
  }
}

export class ComposeManager {
  private constructor(
    readonly composeFilePath: string,
    readonly composeCommand: ComposeCommand,
    private document: ComposeDocument
  ) {}

  /**
   * Open the compose file at `composeFilePath`, creating an empty one first if
   * it does not exist.
   */
  static async open(composeFilePath: string): Promise<ComposeManager> {
    if (!(await fs.pathExists(composeFilePath))) {
      await writeDocument(composeFilePath, { services: {} });
    }

    const composeCommand = await detectComposeCommand();
    const document = await readDocument(composeFilePath);

    return new ComposeManager(composeFilePath, composeCommand, document);
  }

  get config(): Readonly<ComposeDocument> {
    return this.document;
  }

  /**
   * @throws ServiceAlreadyExistsError
   */
  async addService(service: BaseService): Promise<void> {
    const [name, config] = entryOf(service);

    if (name in this.document.services) {
      throw new ServiceAlreadyExistsError(name);
    }

    await this.commit({ ...this.document, services: { ...this.document.services, [name]: config } });
  }

  /**
   * @throws ServiceNotFoundError
   */
  async updateService(service: BaseService): Promise<void> {
    const [name, config] = entryOf(service);

    if (!(name in this.document.services)) {
      throw new ServiceNotFoundError(name);
    }

    await this.commit({ ...this.document, services: { ...this.document.services, [name]: config } });
  }

  /**
   * @throws ServiceNotFoundError
   * @throws ValidationError for infrastructure services
   */
  async removeService(name: string): Promise<void> {
    if (!(name in this.document.services)) {
      throw new ServiceNotFoundError(name);
    }

    if (PROTECTED_SERVICES.has(name)) {
      throw new ValidationError(`Cannot remove ${name} service.`);
    }

    const services = Object.fromEntries(
      Object.entries(this.document.services).filter(([key]) => key !== name)
    );
    await this.commit({ ...this.document, services });
  }

  hasService(name: string): boolean {
    return name in this.document.services;
  }

  /**
   * @throws ServiceNotFoundError
   */
  getService(name: string): BaseService {
    const config = this.document.services[name];
    if (config === undefined) {
      throw new ServiceNotFoundError(name);
    }
    return BaseService.fromDict(name, { ...config });
  }

  listServices(): string[] {
    return Object.keys(this.document.services);
  }

  // ==========================================================================
  // Docker Compose CLI
  // ==========================================================================

  async up(service?: string, detach = true): Promise<void> {
    await this.runCompose(detach ? ['up', '-d'] : ['up'], service);
  }

  async down(): Promise<void> {
    await this.runCompose(['down']);
  }

  async restart(service?: string): Promise<void> {
    await this.runCompose(['restart'], service);
  }

  async build(service?: string): Promise<void> {
    await this.runCompose(['build'], service);
  }

  async ps(service?: string): Promise<void> {
    await this.runCompose(['ps'], service);
  }

  async run(service: string): Promise<void> {
    await this.runCompose(['run'], service);
  }

  async exec(service: string, command: string): Promise<void> {
    await this.runCompose(['exec', service, command]);
  }

  /**
   * Container logs, exactly as the compose CLI printed them
   */
  async logs(service?: string): Promise<string> {
    const [file, args] = this.commandLine(['logs'], service);

    try {
      const { stdout } = await execa(file, args, { stripFinalNewline: false });
      return stdout;
    } catch (error) {
      throw commandError([file, ...args], error);
    }
  }

  private async runCompose(command: string[], service?: string): Promise<void> {
    const [file, args] = this.commandLine(command, service);

    try {
      await execa(file, args, { stdio: 'inherit' });
    } catch (error) {
      throw commandError([file, ...args], error);
    }
  }

  private commandLine(command: string[], service?: string): [string, string[]] {
    const [file, ...prefix] = this.composeCommand;
    const args = [...prefix, '-f', this.composeFilePath, ...command];
    if (service) {
      args.push(service);
    }
    return [file, args];
  }

  /** Write `document`, and only then make it the current state */
  private async commit(document: ComposeDocument): Promise<void> {
    await writeDocument(this.composeFilePath, document);
    this.document = document;
  }
}

function entryOf(service: BaseService): [string, ServiceConfig] {
  return [service.name, service.toConfig()];
}

function commandError(args: string[], error: unknown): DockerCommandExecutionError {
  const message = error instanceof Error ? error.message : String(error);
  const stderr =
    error instanceof Error && 'stderr' in error && typeof error.stderr === 'string'
      ? error.stderr
      : undefined;
  return new DockerCommandExecutionError(args.join(' '), message, stderr);
}

async function readDocument(filePath: string): Promise<ComposeDocument> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isPermissionError(error)) {
      throw new ComposeFilePermissionError(filePath, 'read');
    }
    throw error;
  }

  const parsed = ComposeDocumentSchema.safeParse(YAML.parse(text) ?? {});
  if (!parsed.success) {
    throw new ValidationError(`Invalid compose file ${filePath}: ${parsed.error.message}`);
  }

  const { services, ...rest } = parsed.data;
  return { ...rest, services: services ?? {} };
}

async function writeDocument(filePath: string, document: ComposeDocument): Promise<void> {
  try {
    await fs.writeFile(filePath, YAML.stringify(document), 'utf-8');
  } catch (error) {
    if (isPermissionError(error)) {
      throw new ComposeFilePermissionError(filePath, 'write');
    }
    throw error;
  }
}
