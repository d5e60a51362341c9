export { EngineSession, DEFAULT_SESSION_OPTIONS } from './EngineSession';
export type { EngineSessionOptions } from './EngineSession';
export { BoundedQueue } from './BoundedQueue';
export { EventChannel } from './EventChannel';
export {
  MATE_SCORE,
  MAX_CONFLATED_MATE,
  normalizeScore,
  flipScore,
  toWhitePerspective,
  formatScore,
} from './score';
export type { FormattedScore, ScoreTone } from './score';
export type {
  SessionState,
  ScoreValue,
  AnalysisRequest,
  AnalysisResult,
  SessionRequest,
  SessionEvent,
  SessionEventListener,
} from './types';
