// Engine exports
export type { IChessEngine, EngineIdentity, EngineInfo, RawScore, SearchReport } from './IChessEngine';
export { UciEngine, DEFAULT_UCI_ENGINE_OPTIONS } from './UciEngine';
export type { UciEngineOptions } from './UciEngine';
export { EngineError, isEngineError, describeError } from './EngineError';
export type { EngineErrorCode } from './EngineError';
export { parseInfoLine, parseBestMove, parseIdLine, parseOptionName } from './uciProtocol';
export type { ParsedBestMove } from './uciProtocol';
export { resolveExecutable } from './resolveExecutable';
