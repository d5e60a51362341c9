/**
 * Failure categories surfaced by the engine layer and the session.
 *
 * The first six are reported as session events; `ChannelFull` and
 * `SessionClosed` are thrown to the caller at submission time.
 */
export type EngineErrorCode =
  | 'InvalidExecutable'
  | 'HandshakeTimeout'
  | 'ProtocolViolation'
  | 'ProcessCrashed'
  | 'NotConnected'
  | 'SearchTimeout'
  | 'ChannelFull'
  | 'SessionClosed';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

/**
 * Human-readable cause for any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
