import type { EngineIdentity } from '../../../src/engines/IChessEngine';
import type { Side } from '../../../src/game/rules';
import type { SessionEvent, SessionState } from '../../../src/session/types';

export interface ConnectEngineBody {
  path?: string;
}

export interface AnalysisBody {
  fen: string;
  timeBudgetSeconds?: number;
}

export interface RequestAccepted {
  requestId: string;
}

export interface ErrorResponse {
  error: string;
}

export type CommandResponse = RequestAccepted | ErrorResponse;

export interface SessionStatus {
  state: SessionState;
  engine: EngineIdentity | null;
}

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  session: SessionStatus;
}

export interface LegalMovesResponse {
  turn: Side;
  moves: string[];
}

export interface ServerToClientEvents {
  sessionEvent: (event: SessionEvent) => void;
}

export interface ClientToServerEvents {
  connectEngine: (body: ConnectEngineBody, ack: (response: CommandResponse) => void) => void;
  disconnectEngine: (ack: (response: CommandResponse) => void) => void;
  requestAnalysis: (body: AnalysisBody, ack: (response: CommandResponse) => void) => void;
}
