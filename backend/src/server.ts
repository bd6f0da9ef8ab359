/** Composability graph server: Express REST surface plus a WebSocket notification stream. */

import 'dotenv/config';
import http from 'node:http';
import { pathToFileURL } from 'node:url';
import express from 'express';
import { WebSocketServer, WebSocket } from 'ws';
import type { CompositionEvent, SendEvent } from './models/events.js';
import { CompositionService } from './services/compositionService.js';
import { LinkGraph } from './services/linkGraph.js';
import { AttachmentLedger } from './services/attachmentLedger.js';
import { InMemoryAssetRegistry } from './services/inMemoryAssets.js';
import { NodeRegistry } from './services/nodeRegistry.js';
import { RootOwnerPolicy, allowAllPolicy } from './services/authorizationPolicy.js';
import { createGraphRouter } from './routes/graph.js';
import { createComposeRouter } from './routes/compose.js';
import { createAssetsRouter } from './routes/assets.js';
import { loadConfig, type GraphConfig } from './utils/config.js';
import { GraphPersistence } from './utils/graphPersistence.js';
import { OperationLogger } from './utils/operationLogger.js';
import { stringify } from './utils/encoding.js';

export interface GraphRuntime {
  config: GraphConfig;
  service: CompositionService;
  assets: InMemoryAssetRegistry;
  graph: LinkGraph;
  ledger: AttachmentLedger;
  logger: OperationLogger;
}

export interface RunningServer {
  server: http.Server;
  authToken: string;
  runtime: GraphRuntime;
}

// -- Runtime --

/**
 * Build the graph, ledger, asset registry and composition service, restoring persisted
 * state when a data directory is configured. Nodes that the load-time audit finds on or
 * above a cycle start out quarantined.
 */
export function createRuntime(config: GraphConfig, send: SendEvent): GraphRuntime {
  const logger = new OperationLogger({ logDir: config.logDir, verbose: config.verboseLogs });
  const persistence = config.dataDir ? new GraphPersistence(config.dataDir) : undefined;
  const persisted = persistence?.load() ?? null;

  const graphOptions = { maxDepth: config.maxRootDepth };
  const graph = persisted ? LinkGraph.fromEdges(persisted.edges, graphOptions) : new LinkGraph(graphOptions);
  const ledger = persisted ? AttachmentLedger.fromEntries(persisted.attachments) : new AttachmentLedger();
  if (persisted) {
    logger.info('Graph state restored', {
      edges: persisted.edges.length,
      attachments: persisted.attachments.length,
      owners: persisted.assets?.owners.length ?? 0,
      savedAt: persisted.savedAt,
    });
  }

  const broken = graph.verify();
  if (broken.length > 0) {
    logger.error('Corrupted edges found while loading', { nodes: broken });
  }
  const quarantined = [...new Set([...(persisted?.quarantined ?? []), ...broken])];

  const assets = persisted?.assets
    ? InMemoryAssetRegistry.fromSnapshot(persisted.assets)
    : new InMemoryAssetRegistry();
  const authorization = config.authorization === 'root-owner'
    ? new RootOwnerPolicy(graph, new NodeRegistry(assets))
    : allowAllPolicy;

  const service = new CompositionService(
    {
      graph,
      ledger,
      nonFungible: assets,
      fungible: assets,
      counted: assets,
      send,
      logger,
      persistence,
      authorization,
      assetState: () => assets.snapshot(),
    },
    {
      custodian: config.custodian,
      custodyPolicy: config.custodyPolicy,
      acceptUnsolicited: config.acceptUnsolicited,
      quarantined,
    },
  );
  assets.registerReceiver(service);

  return { config, service, assets, graph, ledger, logger };
}

// -- WebSocket Connection Manager --

class ConnectionManager {
  private connections = new Set<WebSocket>();

  connect(ws: WebSocket): void {
    this.connections.add(ws);
  }

  disconnect(ws: WebSocket): void {
    this.connections.delete(ws);
  }

  get size(): number {
    return this.connections.size;
  }

  broadcast(event: CompositionEvent): void {
    const data = stringify(event);
    for (const ws of this.connections) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(data);
      }
    }
  }
}

// -- Express App --

export function createApp(runtime: GraphRuntime, authToken: string, manager?: { size: number }): express.Express {
  const app = express();
  app.use(express.json({ limit: '64kb' }));

  // Health (no auth)
  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ready',
      custodian: runtime.service.address,
      custody_policy: runtime.service.custodyPolicy,
      edges: runtime.graph.size,
      quarantined: runtime.service.quarantinedNodes().length,
      listeners: manager?.size ?? 0,
    });
  });

  // Bearer-token auth for everything else under /api
  app.use('/api', (req, res, next) => {
    if (req.method === 'OPTIONS') {
      next();
      return;
    }
    if (req.headers.authorization !== `Bearer ${authToken}`) {
      res.status(401).json({ detail: 'Unauthorized' });
      return;
    }
    next();
  });

  app.use('/api', createGraphRouter({ compositionService: runtime.service }));
  app.use('/api/compose', createComposeRouter({ compositionService: runtime.service }));
  app.use('/api/assets', createAssetsRouter({
    assets: runtime.assets,
    onChange: () => runtime.service.checkpoint(),
  }));

  // Malformed JSON bodies
  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ detail: 'Malformed JSON body' });
      return;
    }
    next(err);
  });

  return app;
}

// -- Server Startup --

/**
 * Start the Express + WebSocket server.
 * @param overrides - Values that take precedence over the environment configuration
 */
export function startServer(overrides: Partial<GraphConfig> = {}): Promise<RunningServer> {
  const config: GraphConfig = { ...loadConfig(), ...overrides };
  const manager = new ConnectionManager();
  const runtime = createRuntime(config, (event) => manager.broadcast(event));
  const app = createApp(runtime, config.authToken, manager);
  const server = http.createServer(app);
  const wss = new WebSocketServer({ noServer: true });

  // WebSocket upgrades on /ws/events?token=...
  server.on('upgrade', (request, socket, head) => {
    const url = new URL(request.url ?? '', `http://${request.headers.host ?? 'localhost'}`);
    if (url.pathname !== '/ws/events' || url.searchParams.get('token') !== config.authToken) {
      socket.write('HTTP/1.1 401 Unauthorized\r\n\r\n');
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => {
      manager.connect(ws);
      ws.on('close', () => manager.disconnect(ws));
    });
  });

  server.on('close', () => {
    wss.close();
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => {
      const addr = server.address();
      const port = typeof addr === 'object' && addr ? addr.port : config.port;
      runtime.logger.info('Composability graph listening', { host: config.host, port });
      resolve({ server, authToken: config.authToken, runtime });
    });
  });
}

// -- Direct execution --

const isDirectRun = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isDirectRun) {
  startServer()
    .then(({ authToken }) => {
      console.log(`Auth token: ${authToken}`);
    })
    .catch((err: Error) => {
      console.error('Failed to start server:', err.message);
      process.exit(1);
    });
}
