import http from 'node:http';
import { findFreePort, startServer, type GraphConfig } from '../../backend/src/index.js';

export interface ServerInfo {
  server: http.Server;
  authToken: string;
  port: number;
}

export interface HeadlessServerOptions {
  port?: number;
  token?: string;
  dataDir?: string;
  logDir?: string;
}

export async function startHeadlessServer(options: HeadlessServerOptions = {}): Promise<ServerInfo> {
  const port = options.port ?? (await findFreePort(9100)); // Start above default 8000 to avoid conflicts
  const overrides: Partial<GraphConfig> = { port, host: '127.0.0.1' };
  if (options.token) overrides.authToken = options.token;
  if (options.dataDir) overrides.dataDir = options.dataDir;
  if (options.logDir) overrides.logDir = options.logDir;

  const { server, authToken } = await startServer(overrides);
  const addr = server.address();
  return { server, authToken, port: typeof addr === 'object' && addr ? addr.port : port };
}

export async function stopServer(server: http.Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}
