import { Chess } from 'chess.js';
import { FenError, STARTING_FEN, fromUciMove, snapshotPosition, toUciMove } from './rules';
import type { PositionSnapshot, Side } from './rules';

/**
 * Chess Board State
 *
 * The caller's live board. It keeps changing while analyses run in the
 * background, so anything sent to the engine goes through snapshot().
 */

export interface Move {
  from: string;
  to: string;
  piece: string;
  captured?: string;
  promotion?: string;
  san: string; // Standard Algebraic Notation
  uci: string;
  fen: string; // FEN after this move
}

export class Board {
  private chess: Chess;
  private moveHistory: Move[] = [];

  constructor(startFen: string = STARTING_FEN) {
    this.chess = Board.load(startFen);
  }

  private static load(fen: string): Chess {
    try {
      return new Chess(fen);
    } catch (error) {
      throw new FenError(fen, error instanceof Error ? error.message : String(error));
    }
  }

  /**
   * Get the current FEN position
   */
  getFen(): string {
    return this.chess.fen();
  }

  /**
   * Replace the position, clearing the move history
   * @throws FenError when the FEN is invalid; the board is left unchanged
   */
  setFen(fen: string): void {
    this.chess = Board.load(fen.trim());
    this.moveHistory = [];
  }

  getCurrentTurn(): Side {
    return this.chess.turn();
  }

  /**
   * Play a move if it is legal
   * @returns the recorded move, or null if the move is illegal
   */
  makeMove(from: string, to: string, promotion?: string): Move | null {
    try {
      const result = this.chess.move(promotion ? { from, to, promotion } : { from, to });
      const move: Move = {
        from: result.from,
        to: result.to,
        piece: result.piece,
        captured: result.captured,
        promotion: result.promotion,
        san: result.san,
        uci: toUciMove(result),
        fen: this.chess.fen(),
      };
      this.moveHistory.push(move);
      return move;
    } catch {
      return null;
    }
  }

  /**
   * Play a move given as a UCI string such as "e2e4" or "e7e8q"
   */
  moveUci(uci: string): boolean {
    const { from, to, promotion } = fromUciMove(uci);
    return this.makeMove(from, to, promotion) !== null;
  }

  undo(): Move | null {
    const undone = this.chess.undo();
    if (!undone) {
      return null;
    }
    return this.moveHistory.pop() ?? null;
  }

  /**
   * Legal moves in UCI form, optionally only those starting on one square
   */
  legalMoves(square?: string): string[] {
    return this.chess
      .moves({ verbose: true })
      .filter((move) => square === undefined || move.from === square)
      .map((move) => toUciMove(move));
  }

  getMoveHistory(): Move[] {
    return [...this.moveHistory];
  }

  getLastMove(): Move | null {
    return this.moveHistory.length > 0
      ? this.moveHistory[this.moveHistory.length - 1]
      : null;
  }

  /**
   * Reset the board to starting position
   */
  reset(): void {
    this.chess = new Chess(STARTING_FEN);
    this.moveHistory = [];
  }

  isGameOver(): boolean {
    return this.chess.isGameOver();
  }

  isCheckmate(): boolean {
    return this.chess.isCheckmate();
  }

  isStalemate(): boolean {
    return this.chess.isStalemate();
  }

  isCheck(): boolean {
    return this.chess.isCheck();
  }

  /**
   * Frozen copy of the current position for analysis
   */
  snapshot(): PositionSnapshot {
    return snapshotPosition(this.chess.fen());
  }
}
