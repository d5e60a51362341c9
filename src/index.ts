export * from './engines';
export * from './game';
export * from './session';
export { createAnalysisStore } from './store/analysisStore';
export type {
  AnalysisStore,
  AnalysisStoreOptions,
  EngineStatus,
  StatusKind,
  StatusLine,
} from './store/analysisStore';
export { createSessionLogStore } from './store/sessionLogStore';
export type { SessionLogStore, SessionLogEntry, LogCategory } from './store/sessionLogStore';
export { ApiService, ApiRequestError } from './services/ApiService';
