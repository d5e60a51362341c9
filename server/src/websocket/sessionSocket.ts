import { Server as SocketIOServer, Socket } from 'socket.io';
import { Server as HTTPServer } from 'http';
import { describeError } from '../../../src/engines/EngineError';
import type { EngineSession } from '../../../src/session/EngineSession';
import { connectEngine, errorMessageFor, requestAnalysis } from '../services/sessionCommands';
import type { CommandDefaults } from '../services/sessionCommands';
import type { ClientToServerEvents, CommandResponse, ServerToClientEvents } from '../types';

type SessionSocket = Socket<ClientToServerEvents, ServerToClientEvents>;

export interface SessionSocketServer {
  io: SocketIOServer<ClientToServerEvents, ServerToClientEvents>;
  /** Stop forwarding session events and close every client connection. */
  close: () => Promise<void>;
}

function reply(ack: (response: CommandResponse) => void, submit: () => string, action: string): void {
  if (typeof ack !== 'function') {
    console.warn(`[WebSocket] ${action} sent without an acknowledgement callback`);
    return;
  }
  try {
    ack({ requestId: submit() });
  } catch (error) {
    console.warn(`[WebSocket] Rejected ${action}: ${describeError(error)}`);
    ack({ error: errorMessageFor(error) });
  }
}

/**
 * Broadcast every session event to connected clients and accept engine
 * commands over the socket.
 */
export function initializeWebSocket(
  httpServer: HTTPServer,
  session: EngineSession,
  options: CommandDefaults & { allowedOrigins: string[] }
): SessionSocketServer {
  const io = new SocketIOServer<ClientToServerEvents, ServerToClientEvents>(httpServer, {
    cors: {
      origin: options.allowedOrigins,
      methods: ['GET', 'POST'],
    },
  });

  const unsubscribe = session.subscribe((event) => {
    io.emit('sessionEvent', event);
  });

  io.on('connection', (socket: SessionSocket) => {
    console.log(`[WebSocket] Client connected: ${socket.id}`);

    socket.on('connectEngine', (body, ack) => {
      reply(ack, () => connectEngine(session, body, options), 'connectEngine');
    });

    socket.on('disconnectEngine', (ack) => {
      reply(ack, () => session.disconnect(), 'disconnectEngine');
    });

    socket.on('requestAnalysis', (body, ack) => {
      reply(ack, () => requestAnalysis(session, body, options), 'requestAnalysis');
    });

    socket.on('disconnect', () => {
      console.log(`[WebSocket] Client disconnected: ${socket.id}`);
    });
  });

  console.log('[WebSocket] WebSocket server initialized');

  return {
    io,
    close: () =>
      new Promise<void>((resolve) => {
        unsubscribe();
        // Also closes the HTTP server it is attached to
        io.close(() => resolve());
      }),
  };
}
