import type { EngineSessionOptions } from '../../src/session/EngineSession';

export interface ServerConfig {
  port: number;
  /** Interface to listen on; loopback unless set. */
  host: string;
  allowedOrigins: string[];
  enginePath: string;
  /** Let clients name the engine executable; otherwise ENGINE_PATH is the only one launched. */
  allowClientEnginePath: boolean;
  autoConnect: boolean;
  analysisTimeSeconds: number;
  handshakeTimeoutMs: number;
  quitGraceMs: number;
  watchdogFactor: number;
  watchdogMarginMs: number;
  logEngineTraffic: boolean;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  return raw === 'true' || raw === '1' || raw === 'yes';
}

/**
 * Read server settings from the environment (after dotenv has loaded .env)
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  const analysisTimeSeconds = readNumber(env, 'ANALYSIS_TIME_SECONDS', 2.0);
  if (analysisTimeSeconds <= 0) {
    throw new Error('ANALYSIS_TIME_SECONDS must be greater than zero');
  }

  const allowedOrigins = (env.ALLOWED_ORIGINS ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  return {
    port: readNumber(env, 'PORT', 3000),
    host: env.HOST?.trim() || '127.0.0.1',
    allowedOrigins: allowedOrigins.length > 0 ? allowedOrigins : ['http://localhost:5173'],
    enginePath: env.ENGINE_PATH?.trim() || 'stockfish',
    allowClientEnginePath: readBoolean(env, 'ALLOW_CLIENT_ENGINE_PATH', false),
    autoConnect: readBoolean(env, 'ENGINE_AUTOCONNECT', false),
    analysisTimeSeconds,
    handshakeTimeoutMs: readNumber(env, 'HANDSHAKE_TIMEOUT_MS', 10000),
    quitGraceMs: readNumber(env, 'QUIT_GRACE_MS', 1000),
    watchdogFactor: readNumber(env, 'WATCHDOG_FACTOR', 3),
    watchdogMarginMs: readNumber(env, 'WATCHDOG_MARGIN_MS', 5000),
    logEngineTraffic: readBoolean(env, 'ENGINE_LOG_TRAFFIC', false),
  };
}

export function sessionOptionsFrom(config: ServerConfig): Partial<EngineSessionOptions> {
  return {
    watchdogFactor: config.watchdogFactor,
    watchdogMarginMs: config.watchdogMarginMs,
    engineOptions: {
      handshakeTimeoutMs: config.handshakeTimeoutMs,
      quitGraceMs: config.quitGraceMs,
      logTraffic: config.logEngineTraffic,
    },
  };
}
