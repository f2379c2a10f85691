/**
 * Host environment lookups used to identify the collecting agent
 */

import * as os from 'node:os';

/**
 * Identity of the machine running a collection
 */
export interface HostIdentity {
  hostname: string;
  username: string;
  ipAddress: string;
  osInfo: string;
}

const LOOPBACK_ADDRESS = '127.0.0.1';

/**
 * Login name of the current user, from the environment first
 */
export function getUsername(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.USERNAME || env.USER;
  if (fromEnv) {
    return fromEnv;
  }
  try {
    return os.userInfo().username || 'unknown';
  } catch {
    // userInfo() throws when the uid has no passwd entry
    return 'unknown';
  }
}

/**
 * First external IPv4 address of this host, or 127.0.0.1
 */
export function getIpAddress(): string {
  for (const addresses of Object.values(os.networkInterfaces())) {
    for (const address of addresses ?? []) {
      if (address.family === 'IPv4' && !address.internal) {
        return address.address;
      }
    }
  }
  return LOOPBACK_ADDRESS;
}

/**
 * Operating system name and release, e.g. "Linux 6.8.0"
 */
export function getOsInfo(): string {
  return `${os.type()} ${os.release()}`;
}

/**
 * Resolve the full identity of the current host
 */
export function getHostIdentity(): HostIdentity {
  return {
    hostname: os.hostname(),
    username: getUsername(),
    ipAddress: getIpAddress(),
    osInfo: getOsInfo(),
  };
}
