import { createStore } from 'zustand/vanilla';
import { describeError } from '../engines/EngineError';
import { Board } from '../game/Board';
import { STARTING_FEN } from '../game/rules';
import type { Side } from '../game/rules';
import type { EngineSession } from '../session/EngineSession';
import { formatScore } from '../session/score';
import type { FormattedScore } from '../session/score';
import type { AnalysisResult, SessionEvent } from '../session/types';
import { createSessionLogStore } from './sessionLogStore';
import type { SessionLogStore } from './sessionLogStore';

export type EngineStatus = 'disconnected' | 'connecting' | 'connected';

export type StatusKind = 'info' | 'success' | 'warning' | 'error';

export interface StatusLine {
  text: string;
  kind: StatusKind;
}

export interface AnalysisStoreOptions {
  startFen?: string;
  defaultTimeBudgetSeconds?: number;
  pollIntervalMs?: number;
  log?: SessionLogStore;
}

interface AnalysisState {
  board: Board;
  fen: string;
  turn: Side;
  engineStatus: EngineStatus;
  engineName: string | null;
  pendingAnalyses: string[];
  isAnalyzing: boolean;
  bestMove: string | null;
  evaluation: FormattedScore | null;
  lastResult: AnalysisResult | null;
  lastError: string | null;
  status: StatusLine;

  // Actions
  connect: (enginePath: string) => string | null;
  disconnect: () => string | null;
  analyze: (timeBudgetSeconds?: number) => string | null;
  makeMove: (from: string, to: string, promotion?: string) => boolean;
  undo: () => boolean;
  loadFen: (fen: string) => boolean;
  resetBoard: () => void;
  handleEvent: (event: SessionEvent) => void;
  pollEvents: () => number;
  startPolling: () => void;
  stopPolling: () => void;
  shutdown: () => Promise<void>;
}

/**
 * Analysis Controller Store
 *
 * Foreground side of the analyzer: owns the live board, submits requests to
 * the engine session and turns the events it polls back into display state.
 */
export const createAnalysisStore = (session: EngineSession, options: AnalysisStoreOptions = {}) => {
  const defaultTimeBudgetSeconds = options.defaultTimeBudgetSeconds ?? 2.0;
  const pollIntervalMs = options.pollIntervalMs ?? 100;
  const log = options.log ?? createSessionLogStore();
  let pollTimer: NodeJS.Timeout | null = null;

  if (log.getState().startTime === null) {
    log.getState().startLogging();
  }

  const board = new Board(options.startFen ?? STARTING_FEN);

  return createStore<AnalysisState>()((set, get) => {
    const syncBoard = () => {
      set({ fen: board.getFen(), turn: board.getCurrentTurn() });
    };

    const fail = (message: string) => {
      set({ status: { text: `Error: ${message}`, kind: 'error' }, lastError: message });
      log.getState().addLog('errors', message);
    };

    return {
      board,
      fen: board.getFen(),
      turn: board.getCurrentTurn(),
      engineStatus: 'disconnected',
      engineName: null,
      pendingAnalyses: [],
      isAnalyzing: false,
      bestMove: null,
      evaluation: null,
      lastResult: null,
      lastError: null,
      status: { text: 'Not connected', kind: 'info' },

      connect: (enginePath: string) => {
        const trimmed = enginePath.trim();
        if (!trimmed) {
          fail('Invalid engine executable. Enter a command on PATH (e.g. "stockfish") or a path to the binary.');
          return null;
        }

        try {
          const requestId = session.connect(trimmed);
          set({
            engineStatus: 'connecting',
            status: { text: 'Attempting to connect to engine...', kind: 'warning' },
          });
          log.getState().addLog('requests', `Connect ${trimmed}`, requestId);
          return requestId;
        } catch (error) {
          fail(describeError(error));
          return null;
        }
      },

      disconnect: () => {
        try {
          const requestId = session.disconnect();
          log.getState().addLog('requests', 'Disconnect', requestId);
          return requestId;
        } catch (error) {
          fail(describeError(error));
          return null;
        }
      },

      analyze: (timeBudgetSeconds: number = defaultTimeBudgetSeconds) => {
        try {
          // The snapshot is frozen here; later moves on the board do not reach it
          const requestId = session.analyze(board.snapshot(), timeBudgetSeconds);
          set((state) => ({
            pendingAnalyses: [...state.pendingAnalyses, requestId],
            isAnalyzing: true,
            bestMove: null,
            evaluation: null,
            status: { text: 'Analyzing position...', kind: 'warning' },
          }));
          log.getState().addLog('requests', `Analyze ${board.getFen()} for ${timeBudgetSeconds}s`, requestId);
          return requestId;
        } catch (error) {
          fail(describeError(error));
          return null;
        }
      },

      makeMove: (from: string, to: string, promotion?: string) => {
        const move = board.makeMove(from, to, promotion);
        if (!move) {
          return false;
        }
        syncBoard();
        return true;
      },

      undo: () => {
        const undone = board.undo();
        syncBoard();
        return undone !== null;
      },

      loadFen: (fen: string) => {
        try {
          board.setFen(fen);
        } catch (error) {
          fail(describeError(error));
          return false;
        }
        syncBoard();
        set({ status: { text: 'Position loaded.', kind: 'info' } });
        return true;
      },

      resetBoard: () => {
        board.reset();
        syncBoard();
      },

      handleEvent: (event: SessionEvent) => {
        const remaining = get().pendingAnalyses.filter((id) => id !== event.requestId);
        set({ pendingAnalyses: remaining, isAnalyzing: remaining.length > 0 });

        switch (event.type) {
          case 'connectSucceeded':
            set({
              engineStatus: 'connected',
              engineName: event.engine.name,
              lastError: null,
              status: { text: 'Engine connected. Ready to analyze.', kind: 'success' },
            });
            log.getState().addLog('connection', `Connected to ${event.engine.name ?? event.engine.path}`, event.requestId);
            break;

          case 'connectFailed':
            set({
              engineStatus: session.isConnected() ? 'connected' : 'disconnected',
              engineName: session.getEngineIdentity()?.name ?? null,
              lastError: event.reason,
              status: { text: 'Connection failed.', kind: 'error' },
            });
            log.getState().addLog('errors', `Could not connect: ${event.reason}`, event.requestId);
            break;

          case 'analysisCompleted': {
            const { result } = event;
            set({
              bestMove: result.bestMove,
              evaluation: formatScore(result.score),
              lastResult: result,
              status: { text: 'Analysis complete.', kind: 'success' },
            });
            log.getState().addLog('analysis', `Best move ${result.bestMove ?? 'N/A'}`, event.requestId);
            break;
          }

          case 'operationFailed':
            set({
              engineStatus: session.isConnected() ? 'connected' : 'disconnected',
              lastError: event.reason,
              status: { text: `Error: ${event.reason}`, kind: 'error' },
            });
            log.getState().addLog('errors', event.reason, event.requestId);
            break;

          case 'disconnected':
            set({
              engineStatus: 'disconnected',
              engineName: null,
              status: { text: 'Engine disconnected.', kind: 'info' },
            });
            log.getState().addLog('connection', 'Disconnected', event.requestId);
            break;

          case 'shutdownCompleted':
            set({
              engineStatus: 'disconnected',
              engineName: null,
              status: { text: 'Engine session closed.', kind: 'info' },
            });
            log.getState().addLog('connection', 'Session closed', event.requestId);
            break;
        }
      },

      pollEvents: () => {
        const events = session.drainEvents();
        for (const event of events) {
          get().handleEvent(event);
        }
        return events.length;
      },

      startPolling: () => {
        if (pollTimer) return;
        pollTimer = setInterval(() => {
          get().pollEvents();
        }, pollIntervalMs);
      },

      stopPolling: () => {
        if (pollTimer) {
          clearInterval(pollTimer);
          pollTimer = null;
        }
      },

      shutdown: async () => {
        get().stopPolling();
        await session.shutdown();
        get().pollEvents();
      },
    };
  });
};

export type AnalysisStore = ReturnType<typeof createAnalysisStore>;
