import net from 'net';
import { ServerDefinition } from '../../core/entities/Server.js';
import { IReachabilityProbe } from '../../core/interfaces/IOllamaClient.js';

/**
 * Host/port of a server URL, with the scheme's default port when none is given
 */
export function resolveEndpoint(url: string): { host: string; port: number } {
  const parsed = new URL(url);
  const port = parsed.port
    ? parseInt(parsed.port, 10)
    : parsed.protocol === 'https:'
      ? 443
      : 80;
  return { host: parsed.hostname, port };
}

/**
 * Reachability by opening (and immediately closing) a TCP connection
 */
export class TcpReachabilityProbe implements IReachabilityProbe {
  isReachable(server: ServerDefinition, timeoutMs: number): Promise<boolean> {
    const { host, port } = resolveEndpoint(server.url);

    return new Promise((resolve) => {
      const socket = net.createConnection({ host, port });
      let settled = false;

      const finish = (reachable: boolean) => {
        if (settled) return;
        settled = true;
        socket.destroy();
        resolve(reachable);
      };

      socket.setTimeout(timeoutMs);
      socket.once('connect', () => finish(true));
      socket.once('timeout', () => finish(false));
      socket.once('error', () => finish(false));
    });
  }
}
