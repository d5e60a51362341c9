import { describeError, isEngineError } from '../../../src/engines/EngineError';
import { FenError, chessJsRules, snapshotPosition } from '../../../src/game/rules';
import type { RulesEngine } from '../../../src/game/rules';
import type { EngineSession } from '../../../src/session/EngineSession';

export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

export class ForbiddenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ForbiddenError';
  }
}

export interface CommandDefaults {
  enginePath: string;
  /** When false, only enginePath is ever launched. */
  allowClientEnginePath: boolean;
  timeBudgetSeconds: number;
  rules?: RulesEngine;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Submit a connect request for the configured engine, or the one the body names where allowed
 * @throws ForbiddenError when the body names an engine and that is not allowed
 */
export function connectEngine(session: EngineSession, body: unknown, defaults: CommandDefaults): string {
  const requested = isRecord(body) ? body.path : undefined;
  if (requested !== undefined && typeof requested !== 'string') {
    throw new BadRequestError('path must be a string');
  }
  const named = requested?.trim();
  if (named && !defaults.allowClientEnginePath) {
    throw new ForbiddenError('Choosing the engine executable is disabled on this server');
  }
  const enginePath = named || defaults.enginePath;
  return session.connect(enginePath);
}

/**
 * Validate an analysis body, freeze its position and submit it
 * @throws BadRequestError or FenError for bad input, EngineError when the session refuses it
 */
export function requestAnalysis(session: EngineSession, body: unknown, defaults: CommandDefaults): string {
  if (!isRecord(body) || typeof body.fen !== 'string' || body.fen.trim() === '') {
    throw new BadRequestError('fen is required');
  }

  const budget = body.timeBudgetSeconds ?? defaults.timeBudgetSeconds;
  if (typeof budget !== 'number' || !Number.isFinite(budget) || budget <= 0) {
    throw new BadRequestError('timeBudgetSeconds must be a positive number');
  }

  const position = snapshotPosition(body.fen, defaults.rules ?? chessJsRules);
  return session.analyze(position, budget);
}

export function statusCodeFor(error: unknown): number {
  if (error instanceof BadRequestError || error instanceof FenError || error instanceof RangeError) {
    return 400;
  }
  if (error instanceof ForbiddenError) {
    return 403;
  }
  if (isEngineError(error)) {
    switch (error.code) {
      case 'SessionClosed':
        return 409;
      case 'ChannelFull':
        return 503;
      default:
        return 500;
    }
  }
  return 500;
}

export function errorMessageFor(error: unknown): string {
  return statusCodeFor(error) === 500 ? 'Internal server error' : describeError(error);
}
