import type { RawScore } from '../engines/IChessEngine';
import type { Side } from '../game/rules';
import type { ScoreValue } from './types';

/**
 * Centipawn value some engines and GUIs use to stand in for a forced mate.
 * A report of MATE_SCORE - n centipawns means mate in n moves.
 */
export const MATE_SCORE = 10000;

/**
 * Largest mate distance still read out of a conflated centipawn score.
 */
export const MAX_CONFLATED_MATE = 500;

/**
 * Turn the engine's raw report into a ScoreValue.
 *
 * UCI scores are already relative to the side to move, so the value keeps its
 * sign; the only work left is separating real centipawns from mates.
 */
export function normalizeScore(raw: RawScore | null): ScoreValue {
  if (raw === null) {
    return { kind: 'unavailable' };
  }

  if (raw.type === 'mate') {
    return { kind: 'mate', moves: raw.value };
  }

  const magnitude = Math.abs(raw.value);
  if (magnitude >= MATE_SCORE - MAX_CONFLATED_MATE) {
    const moves = Math.max(0, MATE_SCORE - magnitude);
    return { kind: 'mate', moves: raw.value > 0 ? moves : -moves };
  }

  return { kind: 'cp', value: raw.value };
}

/**
 * Re-express a score from the other side's point of view.
 */
export function flipScore(score: ScoreValue): ScoreValue {
  switch (score.kind) {
    case 'cp':
      return { kind: 'cp', value: -score.value };
    case 'mate':
      return { kind: 'mate', moves: -score.moves };
    case 'unavailable':
      return score;
  }
}

/**
 * Express a score from White's point of view, e.g. for an evaluation bar.
 */
export function toWhitePerspective(score: ScoreValue, perspective: Side): ScoreValue {
  return perspective === 'w' ? score : flipScore(score);
}

export type ScoreTone = 'success' | 'error' | 'neutral' | 'muted';

export interface FormattedScore {
  text: string;
  tone: ScoreTone;
}

/**
 * Display text for a score, as shown next to the best move.
 *
 * Centipawns are printed in pawns with two decimals; anything more than half a
 * pawn either way is coloured.
 */
export function formatScore(score: ScoreValue): FormattedScore {
  switch (score.kind) {
    case 'unavailable':
      return { text: '(Not available)', tone: 'muted' };

    case 'mate':
      if (score.moves > 0) {
        return { text: `Mate in ${score.moves}`, tone: 'success' };
      }
      if (score.moves === 0) {
        return { text: 'Checkmated', tone: 'error' };
      }
      return { text: `Mated in ${-score.moves}`, tone: 'error' };

    case 'cp': {
      const text = (score.value / 100).toFixed(2);
      if (score.value > 50) {
        return { text, tone: 'success' };
      }
      if (score.value < -50) {
        return { text, tone: 'error' };
      }
      return { text, tone: 'neutral' };
    }
  }
}
