import net from 'node:net';

import { TimeoutError } from './errors.js';

export interface ConnectOptions {
  timeoutMs: number;
  /** Keep the socket writable after the remote end sends FIN */
  allowHalfOpen?: boolean;
}

/**
 * Open a TCP connection, rejecting with `TimeoutError` if it is not
 * established within `timeoutMs`.
 */
export function connectTcp(host: string, port: number, options: ConnectOptions): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host, port, allowHalfOpen: options.allowHalfOpen ?? false });

    const timer = setTimeout(() => {
      socket.off('error', onError);
      socket.destroy();
      reject(new TimeoutError(`Connection to ${host}:${port} timed out after ${options.timeoutMs} ms`));
    }, options.timeoutMs);

    const onError = (err: Error) => {
      clearTimeout(timer);
      socket.destroy();
      reject(err);
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.off('error', onError);
      socket.setNoDelay(true);
      resolve(socket);
    });
  });
}
