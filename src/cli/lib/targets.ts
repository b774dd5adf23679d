/**
 * Argument parsing shared by the commands
 */

import type { RemoteNode } from '../../association/AssociationService.js';

/**
 * Parse host:port into a remote node with the given AE title
 */
export function parseHostPort(hostPort: string, aeTitle: string): RemoteNode {
  const parts = hostPort.split(':');
  const [host, portText] = parts;
  if (parts.length !== 2 || !host || !portText) {
    throw new Error(`Invalid host:port format: ${hostPort}`);
  }

  const port = parseInt(portText, 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port: ${portText}`);
  }

  return { host, port, aeTitle };
}

/**
 * Parse a non-negative integer option, or undefined when absent
 */
export function parseIntegerOption(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer (got "${value}")`);
  }
  return parsed;
}
