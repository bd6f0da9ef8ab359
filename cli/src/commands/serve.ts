import { startHeadlessServer, stopServer, type HeadlessServerOptions } from '../server.js';
import type { GlobalOptions } from '../args.js';
import { print } from '../output.js';

/** Run the graph server in the foreground until SIGINT or SIGTERM. */
export async function runServe(options: HeadlessServerOptions, globals: GlobalOptions): Promise<void> {
  const { server, authToken, port } = await startHeadlessServer(options);
  const url = `http://127.0.0.1:${port}`;
  print(globals, { url, token: authToken }, `Serving on ${url}\nexport CGRAPH_URL=${url}\nexport CGRAPH_TOKEN=${authToken}`);

  await new Promise<void>((resolve) => {
    const shutdown = (): void => {
      process.stderr.write('Stopping...\n');
      resolve();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
  await stopServer(server);
}
