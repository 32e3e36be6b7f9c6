// Promise wrappers over node:http server lifecycle

import type { Server } from 'node:http';

/**
 * Bind the server. Rejects with the bind error (EADDRINUSE, EACCES)
 * instead of leaving it to an unhandled 'error' event.
 */
export function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
