import { describe, expect, it } from 'vitest';
import { createSessionLogStore } from './sessionLogStore';

function clock(start: number) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('sessionLogStore', () => {
  it('ignores entries until logging starts', () => {
    const log = createSessionLogStore();
    log.getState().addLog('analysis', 'dropped');
    expect(log.getState().logs).toEqual([]);
  });

  it('stamps entries relative to the start', () => {
    const time = clock(1000);
    const log = createSessionLogStore(time.now);
    log.getState().startLogging();
    time.advance(65000);
    log.getState().addLog('connection', 'Connected to StubFish', 'abcdef123456');

    expect(log.getState().logs).toEqual([
      { timestamp: 65000, category: 'connection', message: 'Connected to StubFish', requestId: 'abcdef123456' },
    ]);
    expect(log.getState().formatLog([])).toBe('[abcdef12]: Connected to StubFish (1:05)');
  });

  it('filters by category', () => {
    const time = clock(0);
    const log = createSessionLogStore(time.now);
    log.getState().startLogging();
    log.getState().addLog('requests', 'Analyze');
    time.advance(2500);
    log.getState().addLog('errors', 'engine not connected');

    expect(log.getState().getFilteredLogs(['errors']).map((entry) => entry.message)).toEqual([
      'engine not connected',
    ]);
    expect(log.getState().formatLog(['requests', 'errors'])).toBe(
      'Analyze (0:00)\nengine not connected (0:02)'
    );
  });

  it('clears entries and stops logging', () => {
    const log = createSessionLogStore();
    log.getState().startLogging();
    log.getState().addLog('analysis', 'Best move e2e4');
    log.getState().clearLogs();
    log.getState().addLog('analysis', 'ignored');
    expect(log.getState().logs).toEqual([]);
    expect(log.getState().startTime).toBeNull();
  });
});
