import { EngineError } from './EngineError';
import type { EngineInfo, RawScore } from './IChessEngine';

/**
 * Tokens engines use in `bestmove` when the side to move has no legal move.
 */
const NO_MOVE_TOKENS = new Set(['(none)', '0000', 'none']);

const UCI_MOVE = /^[a-h][1-8][a-h][1-8][qrbnQRBN]?$/;

export interface ParsedBestMove {
  bestMove: string | null;
  ponder: string | null;
}

function tokenize(line: string): string[] {
  return line.trim().split(/\s+/);
}

function readInt(token: string | undefined): number | null {
  if (token === undefined || !/^-?\d+$/.test(token)) {
    return null;
  }
  return parseInt(token, 10);
}

/**
 * Parse a UCI info line.
 *
 * Example: "info depth 24 seldepth 32 multipv 1 score cp 35 nodes 12345 time 493 pv e2e4 e7e5"
 *
 * Returns null for anything that is not an info line, and for `info string` lines.
 */
export function parseInfoLine(line: string): EngineInfo | null {
  const tokens = tokenize(line);
  if (tokens[0] !== 'info' || tokens[1] === 'string') {
    return null;
  }

  const info: EngineInfo = {
    depth: null,
    multipv: null,
    score: null,
    pv: [],
    nodes: null,
    time: null,
  };

  let i = 1;
  while (i < tokens.length) {
    const token = tokens[i];

    switch (token) {
      case 'depth':
        info.depth = readInt(tokens[++i]);
        break;

      case 'multipv':
        info.multipv = readInt(tokens[++i]);
        break;

      case 'nodes':
        info.nodes = readInt(tokens[++i]);
        break;

      case 'time':
        info.time = readInt(tokens[++i]);
        break;

      case 'score': {
        const kind = tokens[i + 1];
        const value = readInt(tokens[i + 2]);
        if ((kind === 'cp' || kind === 'mate') && value !== null) {
          const score: RawScore = { type: kind, value };
          i += 2;
          const bound = tokens[i + 1];
          if (bound === 'lowerbound' || bound === 'upperbound') {
            score.bound = bound === 'lowerbound' ? 'lower' : 'upper';
            i++;
          }
          info.score = score;
        } else {
          i++;
        }
        break;
      }

      case 'pv':
        // The principal variation runs to the end of the line
        info.pv = tokens.slice(i + 1);
        i = tokens.length;
        break;

      case 'string':
        i = tokens.length;
        break;

      default:
        break;
    }
    i++;
  }

  return info;
}

/**
 * Parse a bestmove line.
 *
 * Example: "bestmove e2e4 ponder e7e5"
 *
 * Returns null when the line is not a bestmove line at all; throws a
 * ProtocolViolation when it is one but carries no usable move.
 */
export function parseBestMove(line: string): ParsedBestMove | null {
  const tokens = tokenize(line);
  if (tokens[0] !== 'bestmove') {
    return null;
  }

  const move = tokens[1];
  if (move === undefined) {
    throw new EngineError('ProtocolViolation', `Malformed bestmove line: "${line.trim()}"`);
  }

  if (NO_MOVE_TOKENS.has(move)) {
    return { bestMove: null, ponder: null };
  }

  if (!UCI_MOVE.test(move)) {
    throw new EngineError('ProtocolViolation', `Unrecognised move in bestmove line: "${move}"`);
  }

  const ponder = tokens[2] === 'ponder' && tokens[3] && UCI_MOVE.test(tokens[3]) ? tokens[3] : null;
  return { bestMove: move.toLowerCase(), ponder };
}

/**
 * Parse "id name Stockfish 16" / "id author ..." handshake lines
 */
export function parseIdLine(line: string): { key: 'name' | 'author'; value: string } | null {
  const match = line.trim().match(/^id\s+(name|author)\s+(.+)$/);
  if (!match) {
    return null;
  }
  return { key: match[1] === 'name' ? 'name' : 'author', value: match[2].trim() };
}

/**
 * Extract the option name from "option name Hash type spin default 16 min 1 max 33554432"
 */
export function parseOptionName(line: string): string | null {
  const match = line.trim().match(/^option\s+name\s+(.+?)\s+type\s+\w+/);
  return match ? match[1] : null;
}
