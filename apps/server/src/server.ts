import type { Server } from 'node:http';
import type { Express } from 'express';

export interface ListenOptions {
  host: string;
  port: number;
}

/** Resolves once the socket is bound; port 0 picks a free port */
export function startServer(app: Express, { host, port }: ListenOptions): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
    server.closeIdleConnections();
  });
}
