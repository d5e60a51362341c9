// Game exports
export { Board } from './Board';
export type { Move } from './Board';
export {
  STARTING_FEN,
  FenError,
  IllegalMoveError,
  chessJsRules,
  snapshotPosition,
  toUciMove,
  fromUciMove,
} from './rules';
export type { Side, Position, PositionSnapshot, FenResult, RulesEngine } from './rules';
