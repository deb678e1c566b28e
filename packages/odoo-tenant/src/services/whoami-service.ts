import { ENVIRONMENT_PORT } from '../constants.js';
import { BaseService } from './base-service.js';

export interface WhoamiServiceOptions {
  port?: number;
  /** Publish the port on the host; proxied services leave this off */
  publish?: boolean;
}

/**
 * Diagnostic HTTP service answering with its own request details
 */
export class WhoamiService extends BaseService {
  constructor(name: string, options: WhoamiServiceOptions = {}) {
    const { port = 2001, publish = true } = options;

    let preset = new BaseService(name)
      .setImage('traefik/whoami')
      .setCommand([`--port=${port}`, `--name=${name}`]);

    if (publish) {
      preset = preset.setPorts([`${port}:${port}`]);
    }

    super(name, preset.toConfig());
  }
}

/**
 * Compose service of an Odoo environment, reachable at `<name>.<host>`.
 *
 * The container is a whoami placeholder listening on the Odoo port.
 */
export function createEnvironmentService(name: string, host: string): BaseService {
  return new WhoamiService(name, { port: ENVIRONMENT_PORT, publish: false }).addTraefik(
    `${name}.${host}`,
    ENVIRONMENT_PORT
  );
}
