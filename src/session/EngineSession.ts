import { v4 as uuidv4 } from 'uuid';
import { EngineError, describeError, isEngineError } from '../engines/EngineError';
import type { EngineErrorCode } from '../engines/EngineError';
import type { EngineIdentity, IChessEngine } from '../engines/IChessEngine';
import { UciEngine } from '../engines/UciEngine';
import type { UciEngineOptions } from '../engines/UciEngine';
import { resolveExecutable } from '../engines/resolveExecutable';
import type { PositionSnapshot } from '../game/rules';
import { BoundedQueue } from './BoundedQueue';
import { EventChannel } from './EventChannel';
import { normalizeScore } from './score';
import type {
  AnalysisRequest,
  SessionEvent,
  SessionEventListener,
  SessionRequest,
  SessionState,
} from './types';

export interface EngineSessionOptions {
  /** Builds the engine for a resolved executable path. */
  createEngine: (executablePath: string) => IChessEngine;
  /** Turns user input into an executable path, or null to reject it. */
  resolveExecutable: (value: string) => Promise<string | null>;
  requestCapacity: number;
  eventCapacity: number;
  /** How long the worker waits on an empty request queue before re-checking. */
  pollIntervalMs: number;
  /** The bestmove wait is bounded by movetime * watchdogFactor + watchdogMarginMs. */
  watchdogFactor: number;
  watchdogMarginMs: number;
  /** Passed to the default UciEngine factory. */
  engineOptions: Partial<UciEngineOptions>;
}

export const DEFAULT_SESSION_OPTIONS = {
  requestCapacity: 64,
  eventCapacity: 256,
  pollIntervalMs: 100,
  watchdogFactor: 3,
  watchdogMarginMs: 5000,
};

/**
 * Engine Session
 *
 * Owns at most one engine process and serializes every exchange with it
 * through a single worker loop. Callers submit requests and get exactly one
 * event back per request, in submission order, through pollEvent() or
 * subscribe(). Engine failures never escape the worker; they become events.
 * An idle worker does not keep the process alive, a running engine does
 * until shutdown().
 */
export class EngineSession {
  private readonly options: EngineSessionOptions;
  private readonly requests: BoundedQueue<SessionRequest>;
  private readonly events: EventChannel;
  private state: SessionState = 'disconnected';
  private engine: IChessEngine | null = null;
  private engineIdentity: EngineIdentity | null = null;
  private worker: Promise<void> | null = null;
  private accepting: boolean = true;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: Partial<EngineSessionOptions> = {}) {
    const engineOptions = options.engineOptions ?? {};
    this.options = {
      createEngine: (executablePath) => new UciEngine(executablePath, engineOptions),
      resolveExecutable: (value) => resolveExecutable(value),
      ...DEFAULT_SESSION_OPTIONS,
      engineOptions,
      ...options,
    };
    this.requests = new BoundedQueue<SessionRequest>(this.options.requestCapacity);
    this.events = new EventChannel(this.options.eventCapacity);
  }

  getState(): SessionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.engine !== null && (this.state === 'idle' || this.state === 'analyzing');
  }

  getEngineIdentity(): EngineIdentity | null {
    return this.engineIdentity;
  }

  /**
   * Ask the session to launch the engine at executablePath, replacing any live engine
   * @returns the request id carried by the resulting connectSucceeded/connectFailed event
   */
  connect(executablePath: string): string {
    return this.submit({ type: 'connect', requestId: uuidv4(), executablePath });
  }

  /**
   * Ask for a best move and evaluation of a frozen position
   * @param timeBudgetSeconds - search time handed to the engine
   * @returns the request id carried by the resulting analysisCompleted/operationFailed event
   */
  analyze(position: PositionSnapshot, timeBudgetSeconds: number): string {
    if (!Number.isFinite(timeBudgetSeconds) || timeBudgetSeconds <= 0) {
      throw new RangeError(`Time budget must be a positive number of seconds, got ${timeBudgetSeconds}`);
    }
    const analysis: AnalysisRequest = Object.freeze({
      position: Object.isFrozen(position) ? position : Object.freeze({ ...position }),
      timeBudgetMs: Math.max(1, Math.round(timeBudgetSeconds * 1000)),
    });
    return this.submit({ type: 'analyze', requestId: uuidv4(), analysis });
  }

  /**
   * Release the live engine but keep the session usable
   */
  disconnect(): string {
    return this.submit({ type: 'disconnect', requestId: uuidv4() });
  }

  /**
   * Finish the queued requests, quit the engine and stop the worker.
   * Safe to call repeatedly and before anything was connected; never rejects.
   * Events produced from here on are queued past the event capacity.
   */
  shutdown(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.accepting = false;
    // Nobody may be polling any more; the worker must not wait for room
    this.events.close();
    const request: SessionRequest = { type: 'shutdown', requestId: uuidv4() };
    this.shutdownPromise = this.requests
      .put(request)
      .then(() => this.ensureWorker())
      .catch((error: unknown) => {
        console.error('[EngineSession] Shutdown failed:', describeError(error));
      });
    this.ensureWorker();
    return this.shutdownPromise;
  }

  pollEvent(): SessionEvent | undefined {
    return this.events.poll();
  }

  drainEvents(): SessionEvent[] {
    return this.events.drain();
  }

  /**
   * Receive events as they are produced instead of polling.
   * Events already queued are delivered first.
   */
  subscribe(listener: SessionEventListener): () => void {
    return this.events.subscribe(listener);
  }

  private submit(request: SessionRequest): string {
    if (!this.accepting) {
      throw new EngineError('SessionClosed', 'Engine session has been shut down');
    }
    if (!this.requests.offer(request)) {
      throw new EngineError('ChannelFull', `Request queue is full (${this.options.requestCapacity} pending)`);
    }
    this.ensureWorker();
    return request.requestId;
  }

  private ensureWorker(): Promise<void> {
    if (!this.worker) {
      this.worker = this.runWorker();
    }
    return this.worker;
  }

  private async runWorker(): Promise<void> {
    console.log('[EngineSession] Worker started');

    for (;;) {
      const request = await this.requests.take(this.options.pollIntervalMs);
      if (!request) {
        continue;
      }

      const event = await this.execute(request);

      if (request.type === 'shutdown') {
        this.state = 'closed';
      }

      await this.events.publish(event);

      if (request.type === 'shutdown') {
        break;
      }
    }

    console.log('[EngineSession] Worker stopped');
  }

  private async execute(request: SessionRequest): Promise<SessionEvent> {
    try {
      switch (request.type) {
        case 'connect':
          return await this.handleConnect(request.requestId, request.executablePath);
        case 'analyze':
          return await this.handleAnalyze(request.requestId, request.analysis);
        case 'disconnect':
          await this.releaseEngine();
          return { type: 'disconnected', requestId: request.requestId };
        case 'shutdown':
          await this.releaseEngine();
          return { type: 'shutdownCompleted', requestId: request.requestId };
      }
    } catch (error) {
      // Handlers report their own failures; this only catches bugs in them
      console.error(`[EngineSession] Unexpected error handling ${request.type}:`, error);
      return failureEvent(request, error);
    }
  }

  private async handleConnect(requestId: string, executablePath: string): Promise<SessionEvent> {
    const resolved = await this.options.resolveExecutable(executablePath);
    if (!resolved) {
      console.warn(`[EngineSession] Rejected engine path "${executablePath}"`);
      return {
        type: 'connectFailed',
        requestId,
        code: 'InvalidExecutable',
        reason: `Invalid engine executable "${executablePath}": not an executable file or a command on PATH`,
      };
    }

    await this.releaseEngine();

    this.state = 'connecting';
    console.log(`[EngineSession] Connecting to ${resolved}`);
    const engine = this.options.createEngine(resolved);

    try {
      const identity = await engine.initialize();
      this.engine = engine;
      this.engineIdentity = identity;
      this.state = 'idle';
      console.log(`[EngineSession] Connected to ${identity.name ?? resolved}`);
      return { type: 'connectSucceeded', requestId, engine: identity };
    } catch (error) {
      await engine.shutdown();
      this.state = 'disconnected';
      console.error('[EngineSession] Connection failed:', describeError(error));
      return {
        type: 'connectFailed',
        requestId,
        code: isEngineError(error) ? error.code : 'ProcessCrashed',
        reason: describeError(error),
      };
    }
  }

  private async handleAnalyze(requestId: string, analysis: AnalysisRequest): Promise<SessionEvent> {
    if (this.engine && !this.engine.isAlive()) {
      console.warn('[EngineSession] Engine process is gone, dropping handle');
      await this.releaseEngine();
    }

    const engine = this.engine;
    if (!engine || this.state !== 'idle') {
      return { type: 'operationFailed', requestId, code: 'NotConnected', reason: 'engine not connected' };
    }

    const { position, timeBudgetMs } = analysis;
    const watchdogMs = timeBudgetMs * this.options.watchdogFactor + this.options.watchdogMarginMs;

    this.state = 'analyzing';
    try {
      await engine.newGame();
      await engine.setPosition(position.fen);
      const report = await engine.search(timeBudgetMs, watchdogMs);
      this.state = 'idle';

      return {
        type: 'analysisCompleted',
        requestId,
        result: {
          bestMove: report.bestMove,
          ponder: report.ponder,
          score: normalizeScore(report.score),
          perspective: position.turn,
          pv: report.pv,
          depth: report.depth,
          fen: position.fen,
        },
      };
    } catch (error) {
      const code: EngineErrorCode = isEngineError(error) ? error.code : 'ProcessCrashed';
      let reason = `Analysis failed: ${describeError(error)}`;

      if (!engine.isAlive()) {
        await this.releaseEngine();
        reason += ' (engine process exited, reconnect required)';
      } else if (code === 'SearchTimeout' || code === 'HandshakeTimeout') {
        reason += (await this.restartEngine(engine))
          ? ' (engine restarted)'
          : ' (engine restart failed, reconnect required)';
      } else {
        this.state = 'idle';
      }

      console.error(`[EngineSession] ${reason}`);
      return { type: 'operationFailed', requestId, code, reason };
    }
  }

  /**
   * Replace an unresponsive engine with a fresh process from the same path
   */
  private async restartEngine(stale: IChessEngine): Promise<boolean> {
    console.warn(`[EngineSession] Restarting unresponsive engine ${stale.enginePath}`);
    await this.releaseEngine();

    this.state = 'connecting';
    const engine = this.options.createEngine(stale.enginePath);
    try {
      this.engineIdentity = await engine.initialize();
      this.engine = engine;
      this.state = 'idle';
      return true;
    } catch (error) {
      console.error('[EngineSession] Restart failed:', describeError(error));
      await engine.shutdown();
      this.state = 'disconnected';
      return false;
    }
  }

  private async releaseEngine(): Promise<void> {
    const engine = this.engine;
    this.engine = null;
    this.engineIdentity = null;
    this.state = 'disconnected';
    if (!engine) {
      return;
    }

    try {
      await engine.shutdown();
      console.log(`[EngineSession] Released engine ${engine.enginePath}`);
    } catch (error) {
      console.warn('[EngineSession] Error while releasing engine:', describeError(error));
    }
  }
}

function failureEvent(request: SessionRequest, error: unknown): SessionEvent {
  const code: EngineErrorCode = isEngineError(error) ? error.code : 'ProcessCrashed';
  const reason = describeError(error);
  if (request.type === 'connect') {
    return { type: 'connectFailed', requestId: request.requestId, code, reason };
  }
  return { type: 'operationFailed', requestId: request.requestId, code, reason };
}
