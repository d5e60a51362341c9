import express, { NextFunction, Request, Response } from 'express';
import { createServer, Server } from 'http';
import cors from 'cors';
import type { RulesEngine } from '../../src/game/rules';
import type { EngineSession } from '../../src/session/EngineSession';
import { createEngineRouter, sessionStatus } from './routes/engine';
import { initializeWebSocket } from './websocket/sessionSocket';
import type { SessionSocketServer } from './websocket/sessionSocket';
import type { HealthResponse } from './types';

export interface AnalysisServerOptions {
  session: EngineSession;
  allowedOrigins: string[];
  enginePath: string;
  /** Let clients choose the engine executable; off by default. */
  allowClientEnginePath?: boolean;
  analysisTimeSeconds: number;
  rules?: RulesEngine;
  /** Log each HTTP request; on by default. */
  logRequests?: boolean;
}

export interface RunningAnalysisServer {
  app: express.Express;
  server: Server;
  sockets: SessionSocketServer;
  url: string;
  /** Close client connections and the HTTP server. The session is left to its owner. */
  close: () => Promise<void>;
}

function isParseFailure(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

export function createAnalysisApp(options: AnalysisServerOptions): express.Express {
  const { session } = options;
  const app = express();

  // Middleware
  app.use(cors({
    origin: options.allowedOrigins,
    credentials: true,
  }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Request logging
  if (options.logRequests !== false) {
    app.use((req, res, next) => {
      console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
      next();
    });
  }

  // Health check endpoint
  app.get('/health', (req: Request, res: Response<HealthResponse>) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      session: sessionStatus(session),
    });
  });

  // API routes
  app.use('/api', createEngineRouter(session, {
    enginePath: options.enginePath,
    allowClientEnginePath: options.allowClientEnginePath ?? false,
    timeBudgetSeconds: options.analysisTimeSeconds,
    rules: options.rules,
  }));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (isParseFailure(err)) {
      res.status(400).json({ error: 'Request body is not valid JSON' });
      return;
    }
    console.error('[Server] Error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

function urlHost(host: string): string {
  if (host === '0.0.0.0' || host === '::') {
    return 'localhost';
  }
  return host.includes(':') ? `[${host}]` : host;
}

/**
 * Start the HTTP and WebSocket server; port 0 picks a free port.
 * Listens on 127.0.0.1 unless another host is given.
 */
export async function startAnalysisServer(
  options: AnalysisServerOptions & { port: number; host?: string }
): Promise<RunningAnalysisServer> {
  const host = options.host ?? '127.0.0.1';
  const app = createAnalysisApp(options);
  const server = createServer(app);
  const sockets = initializeWebSocket(server, options.session, {
    allowedOrigins: options.allowedOrigins,
    enginePath: options.enginePath,
    allowClientEnginePath: options.allowClientEnginePath ?? false,
    timeBudgetSeconds: options.analysisTimeSeconds,
    rules: options.rules,
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : options.port;

  return {
    app,
    server,
    sockets,
    url: `http://${urlHost(host)}:${port}`,
    close: () => sockets.close(),
  };
}
