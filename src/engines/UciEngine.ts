import { spawn, ChildProcess } from 'child_process';
import { EngineError, describeError } from './EngineError';
import type { EngineIdentity, IChessEngine, SearchReport } from './IChessEngine';
import { parseBestMove, parseIdLine, parseInfoLine, parseOptionName } from './uciProtocol';

export interface UciEngineOptions {
  /** Bound on each handshake/synchronisation step (uciok, readyok). */
  handshakeTimeoutMs: number;
  /** How long a quitting engine gets before it is killed. */
  quitGraceMs: number;
  /** Log every command and response line. */
  logTraffic: boolean;
}

export const DEFAULT_UCI_ENGINE_OPTIONS: UciEngineOptions = {
  handshakeTimeoutMs: 10000,
  quitGraceMs: 1000,
  logTraffic: false,
};

interface PendingResponse {
  matches: (line: string) => boolean;
  resolve: (line: string) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * UCI Engine Adapter
 *
 * Owns one engine child process and implements the UCI exchanges on top of
 * its piped stdin/stdout. Every wait on the engine is bounded by a timeout and
 * fails fast once the process is gone.
 */
export class UciEngine implements IChessEngine {
  readonly enginePath: string;
  private readonly options: UciEngineOptions;
  private process: ChildProcess | null = null;
  private outputBuffer: string = '';
  private pendingResponses: PendingResponse[] = [];
  private lineListener: ((line: string) => void) | null = null;
  private exitPromise: Promise<void> | null = null;
  private exited: boolean = false;
  private closed: boolean = false;
  private failure: EngineError | null = null;

  constructor(enginePath: string, options: Partial<UciEngineOptions> = {}) {
    this.enginePath = enginePath;
    this.options = { ...DEFAULT_UCI_ENGINE_OPTIONS, ...options };
  }

  get pid(): number | undefined {
    return this.process?.pid;
  }

  async initialize(): Promise<EngineIdentity> {
    if (this.process) {
      throw new Error('Engine process already started');
    }

    const child = spawn(this.enginePath, [], { stdio: ['pipe', 'pipe', 'pipe'] });
    this.process = child;

    this.exitPromise = new Promise<void>((resolve) => {
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        this.exited = true;
        console.log(`[UciEngine] Engine process exited with code ${code}${signal ? ` (${signal})` : ''}`);
        if (!this.failure) {
          this.failure = new EngineError(
            'ProcessCrashed',
            `Engine process exited unexpectedly (code ${code}${signal ? `, signal ${signal}` : ''})`,
          );
        }
        resolve();
      });

      child.once('error', (error: Error) => {
        console.error(`[UciEngine] Failed to run ${this.enginePath}:`, error.message);
        if (child.pid === undefined) {
          // Never started: no exit or close event will follow
          this.exited = true;
          this.closed = true;
          this.failure = new EngineError(
            'InvalidExecutable',
            `Could not start engine "${this.enginePath}": ${error.message}`,
          );
          this.rejectPending(this.failure);
          resolve();
        }
      });
    });

    child.on('close', () => {
      this.closed = true;
      this.rejectPending(this.failure ?? new EngineError('ProcessCrashed', 'Engine output closed'));
    });

    if (!child.stdout || !child.stderr || !child.stdin) {
      throw new Error('Failed to create engine process streams');
    }

    child.stdout.setEncoding('utf8');
    child.stdout.on('data', (data: string) => {
      this.handleOutput(data);
    });

    child.stderr.on('data', (data: unknown) => {
      console.error('[UciEngine] stderr:', String(data).trim());
    });

    // Writes racing a dying process surface here as EPIPE
    child.stdin.on('error', (error: Error) => {
      console.warn('[UciEngine] stdin error:', error.message);
    });

    const identity: EngineIdentity = {
      name: null,
      author: null,
      path: this.enginePath,
      options: [],
    };

    // id and option lines arrive before uciok; anything else is skipped
    this.lineListener = (line) => {
      const id = parseIdLine(line);
      if (id) {
        identity[id.key] = id.value;
        return;
      }
      const option = parseOptionName(line);
      if (option) {
        identity.options.push(option);
      }
    };

    try {
      this.sendCommand('uci');
      await this.waitForResponse(
        (line) => line === 'uciok',
        this.options.handshakeTimeoutMs,
        () => new EngineError(
          'HandshakeTimeout',
          `Engine did not answer "uci" with "uciok" within ${this.options.handshakeTimeoutMs} ms`,
        ),
      );
    } finally {
      this.lineListener = null;
    }

    await this.isReady();

    console.log(`[UciEngine] Handshake complete: ${identity.name ?? 'unnamed engine'} (${identity.options.length} options)`);
    return identity;
  }

  async newGame(): Promise<void> {
    this.sendCommand('ucinewgame');
  }

  async setPosition(fen: string, moves: string[] = []): Promise<void> {
    const movesStr = moves.length > 0 ? ` moves ${moves.join(' ')}` : '';
    this.sendCommand(`position fen ${fen}${movesStr}`);
    await this.isReady();
  }

  async search(movetimeMs: number, timeoutMs: number): Promise<SearchReport> {
    const report: SearchReport = {
      bestMove: null,
      ponder: null,
      score: null,
      pv: [],
      depth: null,
    };

    // Keep the last scored line of the main PV; score, depth and pv come from that one line
    this.lineListener = (line) => {
      const info = parseInfoLine(line);
      if (!info || !info.score || (info.multipv !== null && info.multipv > 1)) {
        return;
      }
      report.score = info.score;
      report.depth = info.depth;
      report.pv = info.pv;
    };

    try {
      this.sendCommand(`go movetime ${movetimeMs}`);
      const line = await this.waitForResponse(
        (l) => l === 'bestmove' || l.startsWith('bestmove '),
        timeoutMs,
        () => new EngineError(
          'SearchTimeout',
          `Engine sent no bestmove within ${timeoutMs} ms (movetime ${movetimeMs} ms)`,
        ),
      );

      const parsed = parseBestMove(line);
      if (!parsed) {
        throw new EngineError('ProtocolViolation', `Expected bestmove, got "${line}"`);
      }
      report.bestMove = parsed.bestMove;
      report.ponder = parsed.ponder;
      return report;
    } finally {
      this.lineListener = null;
    }
  }

  async setOptions(options: Record<string, string | number>): Promise<void> {
    for (const [name, value] of Object.entries(options)) {
      this.sendCommand(`setoption name ${name} value ${value}`);
    }
    await this.isReady();
  }

  async isReady(): Promise<boolean> {
    this.sendCommand('isready');
    await this.waitForResponse(
      (line) => line === 'readyok',
      this.options.handshakeTimeoutMs,
      () => new EngineError(
        'HandshakeTimeout',
        `Engine did not answer "isready" within ${this.options.handshakeTimeoutMs} ms`,
      ),
    );
    return true;
  }

  sendCommand(command: string): void {
    const stdin = this.process?.stdin;
    if (!stdin || this.exited || !stdin.writable) {
      return;
    }
    if (this.options.logTraffic) {
      console.log('→ Engine:', command);
    }
    stdin.write(command + '\n');
  }

  isAlive(): boolean {
    const child = this.process;
    return child !== null && !this.exited && child.exitCode === null && child.signalCode === null;
  }

  async shutdown(): Promise<void> {
    const child = this.process;
    if (!child) {
      return;
    }

    try {
      if (this.isAlive()) {
        this.failure = new EngineError('ProcessCrashed', 'Engine was shut down');
        this.sendCommand('quit');

        if (!(await this.waitForExit(this.options.quitGraceMs))) {
          console.warn(`[UciEngine] Engine did not quit within ${this.options.quitGraceMs} ms, killing it`);
          child.kill('SIGKILL');
          if (!(await this.waitForExit(this.options.quitGraceMs))) {
            console.error(`[UciEngine] Engine process ${child.pid} did not exit after SIGKILL`);
          }
        }
      }
    } catch (error) {
      console.warn('[UciEngine] Error during shutdown:', describeError(error));
    } finally {
      child.stdin?.destroy();
    }
  }

  private waitForExit(timeoutMs: number): Promise<boolean> {
    const exitPromise = this.exitPromise;
    if (!exitPromise || this.exited) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      void exitPromise.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  private handleOutput(data: string): void {
    this.outputBuffer += data;
    const lines = this.outputBuffer.split('\n');

    this.outputBuffer = lines.pop() || '';

    for (const line of lines) {
      const trimmedLine = line.trim();
      if (trimmedLine) {
        if (this.options.logTraffic) {
          console.log('← Engine:', trimmedLine);
        }
        this.processLine(trimmedLine);
      }
    }
  }

  private processLine(line: string): void {
    this.lineListener?.(line);

    const index = this.pendingResponses.findIndex((pending) => pending.matches(line));
    if (index === -1) {
      return;
    }
    const [pending] = this.pendingResponses.splice(index, 1);
    clearTimeout(pending.timer);
    pending.resolve(line);
  }

  private waitForResponse(
    matches: (line: string) => boolean,
    timeoutMs: number,
    onTimeout: () => EngineError,
  ): Promise<string> {
    if (this.exited || this.closed) {
      return Promise.reject(this.failure ?? new EngineError('ProcessCrashed', 'Engine process is not running'));
    }

    return new Promise<string>((resolve, reject) => {
      const pending: PendingResponse = {
        matches,
        resolve,
        reject,
        timer: setTimeout(() => {
          this.pendingResponses = this.pendingResponses.filter((p) => p !== pending);
          reject(onTimeout());
        }, timeoutMs),
      };
      this.pendingResponses.push(pending);
    });
  }

  private rejectPending(error: EngineError): void {
    const pending = this.pendingResponses;
    this.pendingResponses = [];
    for (const p of pending) {
      clearTimeout(p.timer);
      p.reject(error);
    }
  }
}
