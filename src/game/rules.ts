import { Chess } from 'chess.js';

export type Side = 'w' | 'b';

export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/**
 * A board position as the rules engine sees it: a validated FEN plus the side to move.
 */
export interface Position {
  readonly fen: string;
  readonly turn: Side;
}

/**
 * Frozen copy of a position taken for analysis. Never aliases a live board.
 */
export type PositionSnapshot = Readonly<Position>;

export class FenError extends Error {
  readonly fen: string;

  constructor(fen: string, reason: string) {
    super(`Invalid FEN "${fen}": ${reason}`);
    this.name = 'FenError';
    this.fen = fen;
  }
}

export class IllegalMoveError extends Error {
  readonly move: string;
  readonly fen: string;

  constructor(move: string, fen: string) {
    super(`Illegal move ${move} in position ${fen}`);
    this.name = 'IllegalMoveError';
    this.move = move;
    this.fen = fen;
  }
}

export type FenResult =
  | { ok: true; position: Position }
  | { ok: false; error: FenError };

/**
 * The narrow slice of chess rules the analyzer relies on.
 */
export interface RulesEngine {
  legalMoves(position: Position): string[];
  applyMove(position: Position, move: string): Position;
  parseFen(fen: string): FenResult;
  serializeFen(position: Position): string;
  turnOf(position: Position): Side;
}

export function toUciMove(move: { from: string; to: string; promotion?: string }): string {
  return `${move.from}${move.to}${move.promotion ?? ''}`;
}

/**
 * Split "e7e8q" into the object form chess.js expects
 */
export function fromUciMove(move: string): { from: string; to: string; promotion?: string } {
  const from = move.substring(0, 2);
  const to = move.substring(2, 4);
  const promotion = move.length > 4 ? move[4].toLowerCase() : undefined;
  return promotion ? { from, to, promotion } : { from, to };
}

function loadChess(fen: string): Chess {
  try {
    return new Chess(fen);
  } catch (error) {
    throw new FenError(fen, error instanceof Error ? error.message : String(error));
  }
}

function positionOf(chess: Chess): Position {
  return { fen: chess.fen(), turn: chess.turn() };
}

/**
 * Rules engine backed by chess.js.
 */
export const chessJsRules: RulesEngine = {
  legalMoves(position) {
    return loadChess(position.fen)
      .moves({ verbose: true })
      .map((move) => toUciMove(move));
  },

  applyMove(position, move) {
    const chess = loadChess(position.fen);
    try {
      chess.move(fromUciMove(move));
    } catch {
      throw new IllegalMoveError(move, position.fen);
    }
    return positionOf(chess);
  },

  parseFen(fen) {
    try {
      return { ok: true, position: positionOf(loadChess(fen.trim())) };
    } catch (error) {
      return {
        ok: false,
        error: error instanceof FenError ? error : new FenError(fen, String(error)),
      };
    }
  },

  serializeFen(position) {
    return position.fen;
  },

  turnOf(position) {
    return position.turn;
  },
};

/**
 * Validate a FEN and freeze it into a snapshot that can be handed to the engine session.
 * @throws FenError when the FEN is rejected by the rules engine
 */
export function snapshotPosition(fen: string, rules: RulesEngine = chessJsRules): PositionSnapshot {
  const parsed = rules.parseFen(fen);
  if (!parsed.ok) {
    throw parsed.error;
  }
  return Object.freeze({
    fen: rules.serializeFen(parsed.position),
    turn: rules.turnOf(parsed.position),
  });
}
