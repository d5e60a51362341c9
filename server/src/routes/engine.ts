import { Router, Request, Response } from 'express';
import { describeError } from '../../../src/engines/EngineError';
import { chessJsRules } from '../../../src/game/rules';
import type { EngineSession } from '../../../src/session/EngineSession';
import {
  connectEngine,
  errorMessageFor,
  requestAnalysis,
  statusCodeFor,
} from '../services/sessionCommands';
import type { CommandDefaults } from '../services/sessionCommands';
import type { ErrorResponse, LegalMovesResponse, RequestAccepted, SessionStatus } from '../types';

export function sessionStatus(session: EngineSession): SessionStatus {
  return {
    state: session.getState(),
    engine: session.getEngineIdentity(),
  };
}

function sendError(res: Response<ErrorResponse>, error: unknown, action: string): void {
  const status = statusCodeFor(error);
  if (status === 500) {
    console.error(`[API] Error ${action}:`, error);
  } else {
    console.warn(`[API] Rejected ${action}: ${describeError(error)}`);
  }
  res.status(status).json({ error: errorMessageFor(error) });
}

/**
 * Engine and analysis routes, mounted under /api
 */
export function createEngineRouter(session: EngineSession, defaults: CommandDefaults): Router {
  const router = Router();
  const rules = defaults.rules ?? chessJsRules;

  /**
   * POST /api/engine/connect
   * Launch the engine named in the body, or the configured one
   */
  router.post('/engine/connect', (req: Request, res: Response<RequestAccepted | ErrorResponse>) => {
    try {
      const requestId = connectEngine(session, req.body, defaults);
      res.status(202).json({ requestId });
    } catch (error) {
      sendError(res, error, 'connecting engine');
    }
  });

  /**
   * POST /api/engine/disconnect
   */
  router.post('/engine/disconnect', (req: Request, res: Response<RequestAccepted | ErrorResponse>) => {
    try {
      res.status(202).json({ requestId: session.disconnect() });
    } catch (error) {
      sendError(res, error, 'disconnecting engine');
    }
  });

  /**
   * GET /api/engine/status
   */
  router.get('/engine/status', (req: Request, res: Response<SessionStatus>) => {
    res.json(sessionStatus(session));
  });

  /**
   * POST /api/analysis
   * Queue an analysis; the result arrives as a sessionEvent on the socket
   */
  router.post('/analysis', (req: Request, res: Response<RequestAccepted | ErrorResponse>) => {
    try {
      const requestId = requestAnalysis(session, req.body, defaults);
      res.status(202).json({ requestId });
    } catch (error) {
      sendError(res, error, 'queueing analysis');
    }
  });

  /**
   * GET /api/analysis/legal-moves?fen=
   */
  router.get('/analysis/legal-moves', (req: Request, res: Response<LegalMovesResponse | ErrorResponse>) => {
    const { fen } = req.query;
    if (typeof fen !== 'string' || fen.trim() === '') {
      return res.status(400).json({ error: 'fen is required' });
    }

    const parsed = rules.parseFen(fen);
    if (!parsed.ok) {
      return res.status(400).json({ error: parsed.error.message });
    }

    res.json({
      turn: rules.turnOf(parsed.position),
      moves: rules.legalMoves(parsed.position),
    });
  });

  return router;
}
