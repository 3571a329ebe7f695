/**
 * Debugging port probe.
 *
 * Tells the launcher whether something already listens on the remote-debugging
 * port, typically a browser left running by an earlier `launch`.
 */

import * as net from 'net';

import { PORT_PROBE_TIMEOUT_MS } from '@/constants.js';
import { createLogger } from '@/ui/logging/index.js';

const log = createLogger('launcher');

/**
 * Check whether a TCP listener accepts connections on host:port.
 *
 * Never throws: refused, unreachable and timed-out connections all report
 * `false`. The socket is destroyed before the promise settles.
 *
 * @returns true when the port is bound
 */
export function probePort(
  host: string,
  port: number,
  timeoutMs: number = PORT_PROBE_TIMEOUT_MS
): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = new net.Socket();
    let settled = false;

    const finish = (bound: boolean, reason: string): void => {
      if (settled) return;
      settled = true;
      socket.destroy();
      log.debug(`Probe ${host}:${port} -> ${bound ? 'bound' : 'free'} (${reason})`);
      resolve(bound);
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true, 'connected'));
    socket.once('timeout', () => finish(false, `no answer within ${timeoutMs}ms`));
    socket.once('error', (error: NodeJS.ErrnoException) => finish(false, error.code ?? error.message));

    socket.connect(port, host);
  });
}
