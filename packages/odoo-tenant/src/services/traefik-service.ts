import { BaseService } from './base-service.js';

export interface TraefikServiceOptions {
  dashboardPort?: number;
  /** Serve the API and dashboard without authentication */
  apiInsecure?: boolean;
  /** Expose Prometheus metrics */
  metrics?: boolean;
}

/**
 * Reverse proxy routing each environment by host name
 */
export class TraefikService extends BaseService {
  constructor(name: string, options: TraefikServiceOptions = {}) {
    const { dashboardPort = 8080, apiInsecure = false, metrics = false } = options;

    const command = [
      '--providers.docker=true',
      '--providers.docker.exposedbydefault=false',
      '--entrypoints.web.address=:80',
      '--entrypoints.websecure.address=:443',
    ];

    if (metrics) {
      command.push('--metrics.prometheus=true');
    }

    if (apiInsecure) {
      command.push('--api.insecure=true', '--api.dashboard=true');
    }

    const preset = new BaseService(name)
      .setImage('traefik:v3')
      .setPorts(['80:80', '443:443', `${dashboardPort}:8080`])
      .setCommand(command)
      .setVolumes(['/var/run/docker.sock:/var/run/docker.sock:ro', `./${name}/config:/etc/traefik`])
      .setRestartPolicy('unless-stopped');

    super(name, preset.toConfig());
  }
}
