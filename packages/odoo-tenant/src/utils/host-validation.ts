/**
 * Host name checks
 *
 * A host is accepted when its A record points at this machine's public
 * address, so the proxy started here is the one answering for it.
 */

import { lookup } from 'dns/promises';
import { PUBLIC_IP_URL } from '../constants.js';
import { HostValidationError } from '../errors.js';

export interface HostValidationOptions {
  /** Timeout for the public address lookup in milliseconds (default: 10000) */
  timeout?: number;
}

/**
 * Public IPv4 address of this machine as seen from the internet
 */
export async function getPublicIp(timeout = 10000): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(PUBLIC_IP_URL, { signal: controller.signal });
    if (!response.ok) {
      throw new Error(`Failed to look up public IP: ${response.status} ${response.statusText}`);
    }
    return (await response.text()).trim();
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new Error(`Timeout looking up public IP from ${PUBLIC_IP_URL}`);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * IPv4 address `host` resolves to, or null if it does not resolve
 */
export async function resolveHost(host: string): Promise<string | null> {
  try {
    const { address } = await lookup(host, { family: 4 });
    return address;
  } catch (error) {
    return null;
  }
}

/**
 * Check every host and return them unchanged.
 *
 * @throws HostValidationError for the first host that does not resolve to this machine
 */
export async function validateHosts(
  hosts: string[],
  options: HostValidationOptions = {}
): Promise<string[]> {
  let publicIp: string | undefined;

  for (const host of hosts) {
    if (host === 'localhost') continue;

    const address = await resolveHost(host);
    if (address === null) {
      throw new HostValidationError(host, 'host does not exist');
    }

    if (publicIp === undefined) {
      publicIp = await getPublicIp(options.timeout);
    }
    if (address !== publicIp) {
      throw new HostValidationError(
        host,
        `resolves to ${address}, which does not match the public IP address ${publicIp}`
      );
    }
  }

  return hosts;
}
