import type { EngineErrorCode } from '../engines/EngineError';
import type { EngineIdentity } from '../engines/IChessEngine';
import type { PositionSnapshot, Side } from '../game/rules';

export type SessionState = 'disconnected' | 'connecting' | 'idle' | 'analyzing' | 'closed';

/**
 * Evaluation from the analysed side's point of view.
 * Mate moves are positive when that side mates, negative (or 0) when it is mated.
 */
export type ScoreValue =
  | { kind: 'cp'; value: number }
  | { kind: 'mate'; moves: number }
  | { kind: 'unavailable' };

export interface AnalysisRequest {
  readonly position: PositionSnapshot;
  readonly timeBudgetMs: number;
}

export interface AnalysisResult {
  bestMove: string | null; // null: no legal move in the analysed position
  ponder: string | null;
  score: ScoreValue;
  perspective: Side; // side to move in the analysed position
  pv: string[];
  depth: number | null;
  fen: string;
}

export type SessionRequest =
  | { type: 'connect'; requestId: string; executablePath: string }
  | { type: 'analyze'; requestId: string; analysis: AnalysisRequest }
  | { type: 'disconnect'; requestId: string }
  | { type: 'shutdown'; requestId: string };

export type SessionEvent =
  | { type: 'connectSucceeded'; requestId: string; engine: EngineIdentity }
  | { type: 'connectFailed'; requestId: string; code: EngineErrorCode; reason: string }
  | { type: 'analysisCompleted'; requestId: string; result: AnalysisResult }
  | { type: 'operationFailed'; requestId: string; code: EngineErrorCode; reason: string }
  | { type: 'disconnected'; requestId: string }
  | { type: 'shutdownCompleted'; requestId: string };

export type SessionEventListener = (event: SessionEvent) => void;
