/**
 * Chess Engine Interface
 *
 * Unified contract for talking to a UCI-compatible chess engine process.
 * The session only ever sees this interface, which lets tests and alternative
 * transports stand in for the real child process.
 */

/**
 * Score exactly as the engine reported it, from the side to move's point of view.
 */
export interface RawScore {
  type: 'cp' | 'mate';
  value: number;
  bound?: 'lower' | 'upper';
}

export interface EngineInfo {
  depth: number | null;
  multipv: number | null;
  score: RawScore | null;
  pv: string[]; // Principal variation (best line)
  nodes: number | null;
  time: number | null;
}

/**
 * Outcome of one `go` command: the terminal bestmove plus the last scored info line.
 */
export interface SearchReport {
  bestMove: string | null; // null when the engine has no legal move
  ponder: string | null;
  score: RawScore | null;
  pv: string[];
  depth: number | null;
}

export interface EngineIdentity {
  name: string | null;
  author: string | null;
  path: string;
  options: string[];
}

export interface IChessEngine {
  readonly enginePath: string;

  /**
   * Start the process and run the uci/isready handshake
   */
  initialize(): Promise<EngineIdentity>;

  /**
   * Tell the engine the next position is unrelated to the previous one
   */
  newGame(): Promise<void>;

  /**
   * Set position using FEN string and optional move list
   * @param moves - Moves in UCI format played from the FEN
   */
  setPosition(fen: string, moves?: string[]): Promise<void>;

  /**
   * Run a timed search and wait for bestmove
   * @param movetimeMs - Search time handed to the engine
   * @param timeoutMs - Upper bound on the wait for bestmove
   */
  search(movetimeMs: number, timeoutMs: number): Promise<SearchReport>;

  /**
   * Set engine options (e.g., Threads, Hash)
   */
  setOptions(options: Record<string, string | number>): Promise<void>;

  isReady(): Promise<boolean>;

  /**
   * Send a raw UCI command to the engine
   */
  sendCommand(command: string): void;

  /**
   * Whether the child process is still running
   */
  isAlive(): boolean;

  /**
   * Quit the engine, killing it if it does not exit in time. Never rejects.
   */
  shutdown(): Promise<void>;
}
