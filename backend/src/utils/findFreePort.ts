/** Scans for an available TCP port on the given host, starting from the given port number. */

import net from 'node:net';

export function findFreePort(startPort: number, host = '127.0.0.1'): Promise<number> {
  return new Promise((resolve, reject) => {
    let port = startPort;
    const tryNext = (): void => {
      if (port > 65535) {
        reject(new Error('No free port found'));
        return;
      }
      const server = net.createServer();
      server.listen(port, host, () => {
        const addr = server.address();
        const found = typeof addr === 'object' && addr ? addr.port : port;
        server.close(() => resolve(found));
      });
      server.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code === 'EADDRINUSE' || err.code === 'EACCES') {
          port++;
          tryNext();
        } else {
          reject(err);
        }
      });
    };
    tryNext();
  });
}
