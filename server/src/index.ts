import * as dotenv from 'dotenv';
import { EngineSession } from '../../src/session/EngineSession';
import { loadConfig, sessionOptionsFrom } from './config';
import { startAnalysisServer } from './app';
import type { RunningAnalysisServer } from './app';

// Load environment variables
dotenv.config();

async function initialize(): Promise<void> {
  console.log('[Server] Starting chess analyzer server...');
  const config = loadConfig();

  const session = new EngineSession(sessionOptionsFrom(config));
  let running: RunningAnalysisServer | null = null;
  let stopping = false;

  const stop = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`[Server] ${signal} received, shutting down gracefully...`);

    if (running) {
      await running.close();
      console.log('[Server] HTTP server closed');
    }
    await session.shutdown();
    console.log('[Server] Engine session closed');
    process.exit(0);
  };

  // Graceful shutdown
  process.on('SIGTERM', () => {
    void stop('SIGTERM');
  });
  process.on('SIGINT', () => {
    void stop('SIGINT');
  });

  running = await startAnalysisServer({
    session,
    port: config.port,
    host: config.host,
    allowedOrigins: config.allowedOrigins,
    enginePath: config.enginePath,
    allowClientEnginePath: config.allowClientEnginePath,
    analysisTimeSeconds: config.analysisTimeSeconds,
  });

  console.log(`[Server] Server is running on ${running.url}`);
  console.log(`[Server] Environment: ${process.env.NODE_ENV || 'development'}`);
  console.log(`[Server] Allowed origins: ${config.allowedOrigins.join(', ')}`);

  if (config.autoConnect) {
    console.log(`[Server] Connecting to ${config.enginePath}...`);
    session.connect(config.enginePath);
  }
}

// Start the server
initialize().catch((error: unknown) => {
  console.error('[Server] Failed to initialize:', error);
  process.exit(1);
});
