/**
 * Compose service builders
 *
 * A `BaseService` is an immutable value: every setter returns a new service
 * with the merged descriptor and leaves the receiver as it was.
 */

import { VALID_RESTART_POLICIES, VALID_SERVICE_KEYS } from '../constants.js';
import {
  InvalidKeyError,
  InvalidRestartPolicyError,
  InvalidValueTypeError,
} from '../errors.js';
import type {
  HealthcheckConfig,
  RestartPolicy,
  ServiceConfig,
  ServiceConfigKey,
  ServiceDefinition,
} from '../types.js';

export interface HealthcheckOptions {
  /** Shell string (wrapped in CMD-SHELL) or exec form */
  test?: string | string[];
  interval?: string;
  timeout?: string;
  retries?: number;
  startPeriod?: string;
  disable?: boolean;
}

export class BaseService {
  constructor(
    readonly name: string,
    private readonly config: Readonly<ServiceConfig> = {}
  ) {}

  setImage(image: string): BaseService {
    return this.with({ image });
  }

  setCommand(command: string | string[]): BaseService {
    return this.with({ command });
  }

  setPorts(ports: string[]): BaseService {
    return this.with({ ports });
  }

  setEnvironment(environment: Record<string, string>): BaseService {
    return this.with({ environment });
  }

  setVolumes(volumes: string[]): BaseService {
    return this.with({ volumes });
  }

  setDependsOn(services: string[]): BaseService {
    return this.with({ depends_on: services });
  }

  setLabels(labels: string[]): BaseService {
    return this.with({ labels });
  }

  /**
   * Append `key=value` labels; a mapping read from a compose file stays a mapping.
   */
  addLabels(labels: string[]): BaseService {
    const current = this.config.labels;
    if (isRecord(current)) {
      return this.with({ labels: { ...current, ...labelsToMapping(labels) } });
    }
    return this.with({ labels: [...(Array.isArray(current) ? current : []), ...labels] });
  }

  /**
   * @throws InvalidRestartPolicyError for anything but no, always, on-failure or unless-stopped
   */
  setRestartPolicy(policy: string): BaseService {
    return this.with({ restart: parseRestartPolicy(policy) });
  }

  setHealthcheck(options: HealthcheckOptions): BaseService {
    if (options.disable) {
      return this.with({ healthcheck: { disable: true } });
    }

    const { test = [], interval = '30s', timeout = '30s', retries = 3, startPeriod } = options;
    const healthcheck: HealthcheckConfig = {
      test: typeof test === 'string' ? ['CMD-SHELL', test] : test,
      interval,
      timeout,
      retries,
    };

    if (startPeriod) {
      healthcheck.start_period = startPeriod;
    }

    return this.with({ healthcheck });
  }

  /**
   * Route HTTP traffic for `host` through the proxy to this service.
   */
  addTraefik(host: string, portMapping: string | number): BaseService {
    return this.addLabels([
      'traefik.enable=true',
      `traefik.http.routers.${this.name}.rule=Host(\`${host}\`)`,
      `traefik.http.routers.${this.name}.entrypoints=web`,
      `traefik.http.services.${this.name}.loadbalancer.server.port=${portMapping}`,
    ]);
  }

  toConfig(): ServiceConfig {
    return structuredClone(this.config);
  }

  toDict(): ServiceDefinition {
    return { [this.name]: this.toConfig() };
  }

  /**
   * Rebuild a service from its compose file entry.
   *
   * Only `image`, `command`, `ports`, `volumes`, `depends_on` and
   * `environment` are kind-checked; other allowed keys pass through as read.
   *
   * @throws InvalidKeyError listing every key outside the allow-list
   * @throws InvalidValueTypeError for the first value of the wrong kind
   */
  static fromDict(name: string, config: Record<string, unknown>): BaseService {
    const invalidKeys = Object.keys(config).filter((key) => !isServiceConfigKey(key));
    if (invalidKeys.length > 0) {
      throw new InvalidKeyError(invalidKeys);
    }

    const validated: ServiceConfig = {};

    for (const key of Object.keys(config)) {
      if (!isServiceConfigKey(key)) continue;
      const value = config[key];

      switch (key) {
        case 'image':
          if (typeof value !== 'string') {
            throw new InvalidValueTypeError(key, 'string', kindOf(value));
          }
          validated.image = value;
          break;
        case 'command':
          if (typeof value !== 'string' && !Array.isArray(value)) {
            throw new InvalidValueTypeError(key, 'string or list', kindOf(value));
          }
          validated.command = value;
          break;
        case 'ports':
        case 'volumes':
        case 'depends_on':
          if (!Array.isArray(value)) {
            throw new InvalidValueTypeError(key, 'list', kindOf(value));
          }
          validated[key] = value;
          break;
        case 'environment':
          if (!isRecord(value)) {
            throw new InvalidValueTypeError(key, 'mapping', kindOf(value));
          }
          validated.environment = value;
          break;
        default:
          validated[key] = value;
      }
    }

    return new BaseService(name, structuredClone(validated));
  }

  private with(patch: ServiceConfig): BaseService {
    return new BaseService(this.name, { ...this.config, ...patch });
  }
}

function parseRestartPolicy(policy: string): RestartPolicy {
  const match = VALID_RESTART_POLICIES.find((valid) => valid === policy);
  if (match === undefined) {
    throw new InvalidRestartPolicyError(policy, VALID_RESTART_POLICIES);
  }
  return match;
}

function labelsToMapping(labels: string[]): Record<string, string> {
  const mapping: Record<string, string> = {};
  for (const label of labels) {
    const separator = label.indexOf('=');
    if (separator === -1) {
      mapping[label] = '';
    } else {
      mapping[label.slice(0, separator)] = label.slice(separator + 1);
    }
  }
  return mapping;
}

function isServiceConfigKey(key: string): key is ServiceConfigKey {
  return VALID_SERVICE_KEYS.some((valid) => valid === key);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function kindOf(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  if (typeof value === 'object') return 'mapping';
  return typeof value;
}
