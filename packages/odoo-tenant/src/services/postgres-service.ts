import type { DatabaseConfig } from '../configs/database-config.js';
import { BaseService } from './base-service.js';

export interface PostgresServiceOptions {
  /** Host port published for 5432 */
  port?: number;
  /** Major version used as the image tag */
  version?: string;
}

/**
 * Shared PostgreSQL server for every environment
 */
export class PostgresService extends BaseService {
  constructor(name: string, dbConfig: DatabaseConfig, options: PostgresServiceOptions = {}) {
    const { port = 5432, version = '15' } = options;

    const preset = new BaseService(name)
      .setImage(`postgres:${version}`)
      .setEnvironment({
        POSTGRES_PASSWORD: dbConfig.password,
        POSTGRES_USER: dbConfig.user,
        POSTGRES_DB: dbConfig.name,
      })
      .setPorts([`${port}:5432`])
      .setVolumes([`./${name}/data:/var/lib/postgresql/data`])
      .setHealthcheck({
        test: `pg_isready -U ${dbConfig.user}`,
        interval: '10s',
        timeout: '5s',
        retries: 5,
      })
      .setRestartPolicy('unless-stopped');

    super(name, preset.toConfig());
  }
}
