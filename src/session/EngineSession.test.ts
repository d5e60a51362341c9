import { afterAll, afterEach, describe, expect, it } from 'vitest';
import { EngineSession } from './EngineSession';
import type { EngineSessionOptions } from './EngineSession';
import { toWhitePerspective } from './score';
import type { AnalysisResult, SessionEvent } from './types';
import { UciEngine } from '../engines/UciEngine';
import { Board } from '../game/Board';
import { snapshotPosition } from '../game/rules';
import { createNonExecutableFile, createStubEngine, removeStubEngines, waitFor } from '../test/stubEngine';

const NO_WHITE_PAWNS_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/8/RNBQKBNR w KQkq - 0 1';
const BLACK_TO_MOVE_FEN = 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1';
const START_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

const ENGINE_OPTIONS = { handshakeTimeoutMs: 3000, quitGraceMs: 500 };

/**
 * Session whose engine factory records every engine it creates, and which
 * engines were still running at the moment of each creation.
 */
function trackedSession(options: Partial<EngineSessionOptions> = {}) {
  const created: UciEngine[] = [];
  const aliveAtCreation: boolean[][] = [];
  const session = new EngineSession({
    ...options,
    createEngine: (executablePath) => {
      aliveAtCreation.push(created.map((engine) => engine.isAlive()));
      const engine = new UciEngine(executablePath, { ...ENGINE_OPTIONS, ...options.engineOptions });
      created.push(engine);
      return engine;
    },
  });
  return { session, created, aliveAtCreation };
}

async function nextEvents(session: EngineSession, count: number): Promise<SessionEvent[]> {
  const events: SessionEvent[] = [];
  await waitFor(() => {
    let event = session.pollEvent();
    while (event) {
      events.push(event);
      event = session.pollEvent();
    }
    return events.length >= count;
  });
  return events;
}

function resultOf(event: SessionEvent): AnalysisResult {
  if (event.type !== 'analysisCompleted') {
    throw new Error(`Expected analysisCompleted, got ${event.type}`);
  }
  return event.result;
}

describe('EngineSession', () => {
  const sessions: EngineSession[] = [];

  function track<T extends { session: EngineSession }>(tracked: T): T {
    sessions.push(tracked.session);
    return tracked;
  }

  afterEach(async () => {
    await Promise.all(sessions.splice(0).map((session) => session.shutdown()));
  });

  afterAll(async () => {
    await removeStubEngines();
  });

  describe('connect', () => {
    it('fails for a path that does not exist and stays disconnected', async () => {
      const { session, created } = track(trackedSession());

      const requestId = session.connect('/definitely/not/here/stockfish');
      const [event] = await nextEvents(session, 1);

      expect(event).toMatchObject({ type: 'connectFailed', requestId, code: 'InvalidExecutable' });
      expect(session.getState()).toBe('disconnected');
      expect(created).toHaveLength(0);
    });

    it('fails for a file that is not executable', async () => {
      const { session, created } = track(trackedSession());

      session.connect(await createNonExecutableFile());
      const [event] = await nextEvents(session, 1);

      expect(event).toMatchObject({ type: 'connectFailed', code: 'InvalidExecutable' });
      expect(session.getState()).toBe('disconnected');
      expect(created).toHaveLength(0);
    });

    it('connects to a UCI engine and reports its identity', async () => {
      const { session } = track(trackedSession());

      const requestId = session.connect(await createStubEngine());
      const [event] = await nextEvents(session, 1);

      expect(event).toMatchObject({
        type: 'connectSucceeded',
        requestId,
        engine: { name: 'StubFish 1.0', author: 'Test Suite' },
      });
      expect(session.getState()).toBe('idle');
      expect(session.isConnected()).toBe(true);
      expect(session.getEngineIdentity()?.name).toBe('StubFish 1.0');
    });

    it('terminates the live engine before launching the next one', async () => {
      const { session, created, aliveAtCreation } = track(trackedSession());

      session.connect(await createStubEngine());
      session.connect(await createStubEngine());
      const events = await nextEvents(session, 2);

      expect(events.map((e) => e.type)).toEqual(['connectSucceeded', 'connectSucceeded']);
      expect(aliveAtCreation).toEqual([[], [false]]);
      expect(created[0].isAlive()).toBe(false);
      expect(created[1].isAlive()).toBe(true);
    });

    it('keeps the live engine when the new path is rejected', async () => {
      const { session, created } = track(trackedSession());

      session.connect(await createStubEngine());
      session.connect('/definitely/not/here/stockfish');
      const events = await nextEvents(session, 2);

      expect(events.map((e) => e.type)).toEqual(['connectSucceeded', 'connectFailed']);
      expect(session.isConnected()).toBe(true);
      expect(created).toHaveLength(1);
      expect(created[0].isAlive()).toBe(true);
    });

    it('reports a handshake timeout for an engine that never answers uci', async () => {
      const { session, created } = track(trackedSession({ engineOptions: { handshakeTimeoutMs: 200 } }));

      session.connect(await createStubEngine({ handshake: 'silent' }));
      const [event] = await nextEvents(session, 1);

      expect(event).toMatchObject({ type: 'connectFailed', code: 'HandshakeTimeout' });
      expect(session.getState()).toBe('disconnected');
      expect(created[0].isAlive()).toBe(false);
    });
  });

  describe('analyze', () => {
    it('fails with "engine not connected" before any connect and spawns nothing', async () => {
      const { session, created } = track(trackedSession());

      const requestId = session.analyze(snapshotPosition(START_FEN), 0.1);
      const [event] = await nextEvents(session, 1);

      expect(event).toEqual({
        type: 'operationFailed',
        requestId,
        code: 'NotConnected',
        reason: 'engine not connected',
      });
      expect(created).toHaveLength(0);
    });

    it('returns the best move of a stub engine for a 0.1s search', async () => {
      const { session } = track(trackedSession());
      const position = snapshotPosition(NO_WHITE_PAWNS_FEN);

      session.connect(await createStubEngine({ replies: ['bestmove e2e4'] }));
      const requestId = session.analyze(position, 0.1);
      const [, completed] = await nextEvents(session, 2);

      expect(completed).toMatchObject({ type: 'analysisCompleted', requestId });
      expect(resultOf(completed)).toEqual({
        bestMove: 'e2e4',
        ponder: null,
        score: { kind: 'unavailable' },
        perspective: 'w',
        pv: [],
        depth: null,
        fen: position.fen,
      });
    });

    it('keeps centipawns from the side to move, here Black', async () => {
      const { session } = track(trackedSession());

      session.connect(await createStubEngine({ replies: ['info score cp -35 pv d7d5', 'bestmove d7d5'] }));
      session.analyze(snapshotPosition(BLACK_TO_MOVE_FEN), 0.1);
      const [, completed] = await nextEvents(session, 2);
      const result = resultOf(completed);

      // Black is 0.35 pawns worse; from White's side that is +0.35
      expect(result.score).toEqual({ kind: 'cp', value: -35 });
      expect(result.perspective).toBe('b');
      expect(result.bestMove).toBe('d7d5');
      expect(result.pv).toEqual(['d7d5']);
      expect(toWhitePerspective(result.score, result.perspective)).toEqual({ kind: 'cp', value: 35 });
    });

    it('encodes mates with the sign of who is mating', async () => {
      const { session } = track(trackedSession());

      session.connect(await createStubEngine({
        replies: {
          w: ['info depth 7 score mate 3 pv d1h5 g7g6 h5g6', 'bestmove d1h5'],
          b: ['info depth 7 score mate -2 pv e8e7 d1h5', 'bestmove e8e7'],
        },
      }));
      session.analyze(snapshotPosition(START_FEN), 0.1);
      session.analyze(snapshotPosition(BLACK_TO_MOVE_FEN), 0.1);
      const [, white, black] = await nextEvents(session, 3);

      expect(resultOf(white).score).toEqual({ kind: 'mate', moves: 3 });
      expect(resultOf(white).perspective).toBe('w');
      expect(resultOf(black).score).toEqual({ kind: 'mate', moves: -2 });
      expect(resultOf(black).perspective).toBe('b');
    });

    it('reports no best move when the engine has none', async () => {
      const { session } = track(trackedSession());

      session.connect(await createStubEngine({ replies: ['info depth 0 score mate 0', 'bestmove (none)'] }));
      session.analyze(snapshotPosition(START_FEN), 0.1);
      const [, completed] = await nextEvents(session, 2);

      expect(resultOf(completed).bestMove).toBeNull();
      expect(resultOf(completed).score).toEqual({ kind: 'mate', moves: 0 });
    });

    it('answers requests in order and analyses the position as it was when submitted', async () => {
      const { session } = track(trackedSession());
      const board = new Board();

      const connectId = session.connect(await createStubEngine({
        searchDelayMs: 100,
        replies: {
          w: ['info depth 1 score cp 20 pv e2e4', 'bestmove e2e4'],
          b: ['info depth 1 score cp -20 pv e7e5', 'bestmove e7e5'],
        },
      }));

      const snapshotA = board.snapshot();
      const analyzeA = session.analyze(snapshotA, 0.1);
      board.makeMove('e2', 'e4');
      const fenB = board.getFen();
      const analyzeB = session.analyze(board.snapshot(), 0.1);
      // The caller keeps playing while the analyses are still queued
      board.makeMove('e7', 'e5');

      const events = await nextEvents(session, 3);

      expect(events.map((e) => e.requestId)).toEqual([connectId, analyzeA, analyzeB]);
      expect(resultOf(events[1])).toMatchObject({ bestMove: 'e2e4', perspective: 'w', fen: snapshotA.fen });
      expect(resultOf(events[2])).toMatchObject({ bestMove: 'e7e5', perspective: 'b', fen: fenB });
      expect(Object.isFrozen(snapshotA)).toBe(true);
      expect(board.getFen()).not.toBe(fenB);
    });

    it('disconnects when the engine crashes mid-search and stays usable', async () => {
      const { session } = track(trackedSession());

      session.connect(await createStubEngine({ onGo: 'crash' }));
      session.analyze(snapshotPosition(START_FEN), 0.1);
      const [, failed] = await nextEvents(session, 2);

      expect(failed).toMatchObject({ type: 'operationFailed', code: 'ProcessCrashed' });
      expect(session.getState()).toBe('disconnected');

      session.analyze(snapshotPosition(START_FEN), 0.1);
      const [again] = await nextEvents(session, 1);
      expect(again).toMatchObject({ type: 'operationFailed', code: 'NotConnected' });

      session.connect(await createStubEngine());
      const [reconnected] = await nextEvents(session, 1);
      expect(reconnected.type).toBe('connectSucceeded');
    });

    it('restarts an engine that overruns the watchdog', async () => {
      const { session, created } = track(trackedSession({ watchdogFactor: 1, watchdogMarginMs: 200 }));

      session.connect(await createStubEngine({ onGo: 'hang' }));
      session.analyze(snapshotPosition(START_FEN), 0.05);
      const [, failed] = await nextEvents(session, 2);

      expect(failed).toMatchObject({ type: 'operationFailed', code: 'SearchTimeout' });
      if (failed.type === 'operationFailed') {
        expect(failed.reason).toContain('(engine restarted)');
      }
      expect(session.getState()).toBe('idle');
      expect(created).toHaveLength(2);
      expect(created[0].isAlive()).toBe(false);
      expect(created[1].isAlive()).toBe(true);
    });

    it('stays idle and usable after a malformed bestmove', async () => {
      const { session } = track(trackedSession());

      session.connect(await createStubEngine({
        replies: { w: ['bestmove zz'], b: ['info depth 4 score cp 12 pv d7d5', 'bestmove d7d5'] },
      }));
      const broken = session.analyze(snapshotPosition(START_FEN), 0.1);
      const [, failed] = await nextEvents(session, 2);

      expect(failed).toMatchObject({ type: 'operationFailed', requestId: broken, code: 'ProtocolViolation' });
      expect(session.getState()).toBe('idle');
      expect(session.isConnected()).toBe(true);

      session.analyze(snapshotPosition(BLACK_TO_MOVE_FEN), 0.1);
      const [completed] = await nextEvents(session, 1);
      expect(resultOf(completed)).toMatchObject({
        bestMove: 'd7d5',
        score: { kind: 'cp', value: 12 },
        perspective: 'b',
      });
    });

    it('rejects a non-positive time budget at submission', () => {
      const { session } = track(trackedSession());
      expect(() => session.analyze(snapshotPosition(START_FEN), 0)).toThrow(RangeError);
    });
  });

  describe('channel', () => {
    it('refuses requests beyond the queue capacity instead of dropping them', async () => {
      const { session } = track(trackedSession({ requestCapacity: 1 }));
      const position = snapshotPosition(START_FEN);

      // The first request is picked up by the worker straight away
      session.analyze(position, 0.1);
      session.analyze(position, 0.1);
      expect(() => session.analyze(position, 0.1)).toThrow(/queue is full/);

      const events = await nextEvents(session, 2);
      expect(events.map((e) => e.type)).toEqual(['operationFailed', 'operationFailed']);
    });

    it('delivers queued events to a new subscriber, then live ones', async () => {
      const { session } = track(trackedSession());
      const position = snapshotPosition(START_FEN);
      const received: string[] = [];

      const first = session.analyze(position, 0.1);
      // Answered without an engine, so it is queued well within this pause
      await new Promise((resolve) => setTimeout(resolve, 100));

      const unsubscribe = session.subscribe((event) => received.push(event.requestId));
      const second = session.analyze(position, 0.1);
      await waitFor(() => received.length === 2);
      unsubscribe();

      expect(received).toEqual([first, second]);
      expect(session.pollEvent()).toBeUndefined();
    });

    it('hands an event waiting for room to a new subscriber, in order', async () => {
      const { session } = track(trackedSession({ eventCapacity: 1 }));
      const position = snapshotPosition(START_FEN);
      const received: string[] = [];

      const first = session.analyze(position, 0.1);
      const second = session.analyze(position, 0.1);
      // The first answer fills the queue and the second waits for room
      await new Promise((resolve) => setTimeout(resolve, 100));

      const unsubscribe = session.subscribe((event) => received.push(event.requestId));
      const third = session.analyze(position, 0.1);
      await waitFor(() => received.length === 3);
      unsubscribe();

      expect(received).toEqual([first, second, third]);
      expect(session.pollEvent()).toBeUndefined();
    });
  });

  describe('disconnect and shutdown', () => {
    it('disconnect releases the engine and keeps the session open', async () => {
      const { session, created } = track(trackedSession());

      session.connect(await createStubEngine());
      const requestId = session.disconnect();
      const [, disconnected] = await nextEvents(session, 2);

      expect(disconnected).toEqual({ type: 'disconnected', requestId });
      expect(created[0].isAlive()).toBe(false);
      expect(session.getState()).toBe('disconnected');
    });

    it('is idempotent and safe when never connected', async () => {
      const session = new EngineSession();

      const first = session.shutdown();
      const second = session.shutdown();
      expect(second).toBe(first);
      await first;
      await session.shutdown();

      expect(session.getState()).toBe('closed');
      expect(session.drainEvents().map((e) => e.type)).toEqual(['shutdownCompleted']);
      expect(() => session.connect('stockfish')).toThrow(/shut down/);
    });

    it('finishes even when nobody drains a full event queue', async () => {
      const { session } = track(trackedSession({ eventCapacity: 1 }));
      const position = snapshotPosition(START_FEN);

      const first = session.analyze(position, 0.1);
      const second = session.analyze(position, 0.1);
      await new Promise((resolve) => setTimeout(resolve, 100));

      let timer: NodeJS.Timeout | undefined;
      const outcome = await Promise.race([
        session.shutdown().then(() => 'resolved'),
        new Promise<string>((resolve) => {
          timer = setTimeout(() => resolve('timed out'), 2000);
        }),
      ]);
      clearTimeout(timer);

      expect(outcome).toBe('resolved');
      expect(session.drainEvents().map((e) => [e.type, e.requestId])).toEqual([
        ['operationFailed', first],
        ['operationFailed', second],
        ['shutdownCompleted', expect.any(String)],
      ]);
    });

    it('quits a live engine after the pending requests', async () => {
      const { session, created } = track(trackedSession());

      session.connect(await createStubEngine({ ignoreQuit: true }));
      session.analyze(snapshotPosition(START_FEN), 0.1);
      await session.shutdown();

      const events = session.drainEvents();
      expect(events.map((e) => e.type)).toEqual(['connectSucceeded', 'analysisCompleted', 'shutdownCompleted']);
      expect(created[0].isAlive()).toBe(false);
    });
  });
});
