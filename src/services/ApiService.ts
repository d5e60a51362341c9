import { io, Socket } from 'socket.io-client';
import type { SessionEvent } from '../session/types';
import type {
  AnalysisBody,
  ClientToServerEvents,
  CommandResponse,
  ConnectEngineBody,
  HealthResponse,
  LegalMovesResponse,
  ServerToClientEvents,
  SessionStatus,
} from '../../server/src/types';

type SessionEventCallback = (event: SessionEvent) => void;

// Events kept so waitForEvent finds answers that beat the HTTP response
const RECENT_EVENT_LIMIT = 100;

export class ApiRequestError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'ApiRequestError';
    this.status = status;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

const SESSION_STATES: readonly string[] = ['disconnected', 'connecting', 'idle', 'analyzing', 'closed'];

function isSessionStatus(value: unknown): value is SessionStatus {
  return (
    isRecord(value) &&
    typeof value.state === 'string' &&
    SESSION_STATES.includes(value.state) &&
    (value.engine === null || isRecord(value.engine))
  );
}

function requestIdOf(response: CommandResponse): string {
  if ('requestId' in response) {
    return response.requestId;
  }
  throw new Error(response.error);
}

/**
 * API Service for the chess analyzer server
 *
 * Submits engine requests over HTTP (or the socket) and hands the session
 * events the server broadcasts to registered callbacks.
 */
export class ApiService {
  private socket: Socket<ServerToClientEvents, ClientToServerEvents> | null = null;
  private baseUrl: string;
  private eventCallbacks: Set<SessionEventCallback> = new Set();
  private recentEvents: SessionEvent[] = [];

  constructor(baseUrl: string = process.env.ANALYZER_API_URL || 'http://localhost:3000') {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  /**
   * Open the WebSocket connection; resolves once connected
   */
  connect(): Promise<void> {
    if (this.socket?.connected) {
      return Promise.resolve();
    }

    const socket: Socket<ServerToClientEvents, ClientToServerEvents> = io(this.baseUrl, {
      transports: ['websocket', 'polling'],
    });
    this.socket = socket;

    socket.on('disconnect', () => {
      console.log('[API] Disconnected from server');
    });

    socket.on('sessionEvent', (event) => {
      this.recentEvents.push(event);
      if (this.recentEvents.length > RECENT_EVENT_LIMIT) {
        this.recentEvents.shift();
      }
      for (const callback of this.eventCallbacks) {
        callback(event);
      }
    });

    return new Promise<void>((resolve, reject) => {
      socket.once('connect', () => {
        console.log('[API] Connected to server');
        resolve();
      });
      socket.once('connect_error', (error) => {
        console.error('[API] Socket error:', error.message);
        // Stop the client from retrying in the background
        socket.disconnect();
        if (this.socket === socket) {
          this.socket = null;
        }
        reject(error);
      });
    });
  }

  /**
   * Disconnect from server
   */
  disconnect(): void {
    if (this.socket) {
      this.socket.disconnect();
      this.socket = null;
    }
  }

  isConnected(): boolean {
    return this.socket?.connected || false;
  }

  /**
   * Register a callback for session events
   * @returns a function that removes the callback
   */
  onSessionEvent(callback: SessionEventCallback): () => void {
    this.eventCallbacks.add(callback);
    return () => {
      this.eventCallbacks.delete(callback);
    };
  }

  /**
   * Wait for the event answering a request, including one that already arrived
   */
  waitForEvent(requestId: string, timeoutMs: number = 30000): Promise<SessionEvent> {
    const arrived = this.recentEvents.find((event) => event.requestId === requestId);
    if (arrived) {
      return Promise.resolve(arrived);
    }

    return new Promise<SessionEvent>((resolve, reject) => {
      const timer = setTimeout(() => {
        unsubscribe();
        reject(new Error(`No session event for request ${requestId} within ${timeoutMs} ms`));
      }, timeoutMs);
      const unsubscribe = this.onSessionEvent((event) => {
        if (event.requestId === requestId) {
          clearTimeout(timer);
          unsubscribe();
          resolve(event);
        }
      });
    });
  }

  // HTTP API Methods

  private async request(path: string, post?: { body: unknown }): Promise<unknown> {
    const response = post
      ? await fetch(`${this.baseUrl}${path}`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(post.body),
        })
      : await fetch(`${this.baseUrl}${path}`);

    const data: unknown = await response.json();
    if (!response.ok) {
      const message = isRecord(data) && typeof data.error === 'string' ? data.error : response.statusText;
      throw new ApiRequestError(response.status, message);
    }
    return data;
  }

  private async command(path: string, body?: unknown): Promise<string> {
    const data = await this.request(path, { body: body ?? {} });
    if (!isRecord(data) || typeof data.requestId !== 'string') {
      throw new Error(`Unexpected response from ${path}`);
    }
    return data.requestId;
  }

  /**
   * Ask the server to launch an engine; omit the path to use the server's default
   */
  connectEngine(path?: string): Promise<string> {
    const body: ConnectEngineBody = path === undefined ? {} : { path };
    return this.command('/api/engine/connect', body);
  }

  disconnectEngine(): Promise<string> {
    return this.command('/api/engine/disconnect');
  }

  /**
   * Queue an analysis of a FEN
   * @returns the request id of the analysisCompleted/operationFailed event to come
   */
  analyzeFen(fen: string, timeBudgetSeconds?: number): Promise<string> {
    const body: AnalysisBody = timeBudgetSeconds === undefined ? { fen } : { fen, timeBudgetSeconds };
    return this.command('/api/analysis', body);
  }

  async getStatus(): Promise<SessionStatus> {
    const data = await this.request('/api/engine/status');
    if (!isSessionStatus(data)) {
      throw new Error('Unexpected status response');
    }
    return data;
  }

  async getHealth(): Promise<HealthResponse> {
    const data = await this.request('/health');
    if (!isRecord(data) || data.status !== 'ok' || typeof data.timestamp !== 'string' || !isSessionStatus(data.session)) {
      throw new Error('Unexpected health response');
    }
    return { status: 'ok', timestamp: data.timestamp, session: data.session };
  }

  async getLegalMoves(fen: string): Promise<LegalMovesResponse> {
    const data = await this.request(`/api/analysis/legal-moves?fen=${encodeURIComponent(fen)}`);
    if (!isRecord(data) || (data.turn !== 'w' && data.turn !== 'b') || !isStringArray(data.moves)) {
      throw new Error('Unexpected legal moves response');
    }
    return { turn: data.turn, moves: data.moves };
  }

  // WebSocket Methods

  /**
   * Queue an analysis over the socket instead of HTTP
   */
  requestAnalysis(fen: string, timeBudgetSeconds?: number): Promise<string> {
    const socket = this.requireSocket();
    const body: AnalysisBody = timeBudgetSeconds === undefined ? { fen } : { fen, timeBudgetSeconds };
    return new Promise<string>((resolve, reject) => {
      socket.emit('requestAnalysis', body, (response) => {
        try {
          resolve(requestIdOf(response));
        } catch (error) {
          reject(error);
        }
      });
    });
  }

  private requireSocket(): Socket<ServerToClientEvents, ClientToServerEvents> {
    if (!this.socket) {
      throw new Error('Socket not connected. Call connect() first.');
    }
    return this.socket;
  }
}
