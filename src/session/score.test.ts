import { describe, expect, it } from 'vitest';
import { MATE_SCORE, flipScore, formatScore, normalizeScore, toWhitePerspective } from './score';

describe('normalizeScore', () => {
  it('keeps centipawns as reported by the engine', () => {
    expect(normalizeScore({ type: 'cp', value: -35 })).toEqual({ kind: 'cp', value: -35 });
    expect(normalizeScore({ type: 'cp', value: 0 })).toEqual({ kind: 'cp', value: 0 });
  });

  it('keeps the sign of mate distances', () => {
    expect(normalizeScore({ type: 'mate', value: 3 })).toEqual({ kind: 'mate', moves: 3 });
    expect(normalizeScore({ type: 'mate', value: -2 })).toEqual({ kind: 'mate', moves: -2 });
  });

  it('reads mates out of centipawn scores near the sentinel', () => {
    expect(normalizeScore({ type: 'cp', value: MATE_SCORE - 4 })).toEqual({ kind: 'mate', moves: 4 });
    expect(normalizeScore({ type: 'cp', value: -(MATE_SCORE - 1) })).toEqual({ kind: 'mate', moves: -1 });
    expect(normalizeScore({ type: 'cp', value: 9000 })).toEqual({ kind: 'cp', value: 9000 });
  });

  it('marks a missing score as unavailable', () => {
    expect(normalizeScore(null)).toEqual({ kind: 'unavailable' });
  });
});

describe('perspective helpers', () => {
  it('flips scores to the other side', () => {
    expect(flipScore({ kind: 'cp', value: 40 })).toEqual({ kind: 'cp', value: -40 });
    expect(flipScore({ kind: 'mate', moves: -2 })).toEqual({ kind: 'mate', moves: 2 });
    expect(flipScore({ kind: 'unavailable' })).toEqual({ kind: 'unavailable' });
  });

  it('expresses scores from White', () => {
    expect(toWhitePerspective({ kind: 'cp', value: 40 }, 'w')).toEqual({ kind: 'cp', value: 40 });
    expect(toWhitePerspective({ kind: 'mate', moves: 3 }, 'b')).toEqual({ kind: 'mate', moves: -3 });
  });
});

describe('formatScore', () => {
  it('formats centipawns in pawns with a tone past half a pawn', () => {
    expect(formatScore({ kind: 'cp', value: 123 })).toEqual({ text: '1.23', tone: 'success' });
    expect(formatScore({ kind: 'cp', value: -35 })).toEqual({ text: '-0.35', tone: 'neutral' });
    expect(formatScore({ kind: 'cp', value: -51 })).toEqual({ text: '-0.51', tone: 'error' });
    expect(formatScore({ kind: 'cp', value: 50 })).toEqual({ text: '0.50', tone: 'neutral' });
  });

  it('formats mates', () => {
    expect(formatScore({ kind: 'mate', moves: 3 })).toEqual({ text: 'Mate in 3', tone: 'success' });
    expect(formatScore({ kind: 'mate', moves: -2 })).toEqual({ text: 'Mated in 2', tone: 'error' });
    expect(formatScore({ kind: 'mate', moves: 0 })).toEqual({ text: 'Checkmated', tone: 'error' });
  });

  it('formats a missing score', () => {
    expect(formatScore({ kind: 'unavailable' })).toEqual({ text: '(Not available)', tone: 'muted' });
  });
});
