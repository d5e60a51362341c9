import { createStore } from 'zustand/vanilla';

export type LogCategory =
  | 'connection'
  | 'analysis'
  | 'requests'
  | 'errors';

export interface SessionLogEntry {
  timestamp: number; // Milliseconds since logging started
  category: LogCategory;
  message: string;
  requestId?: string;
}

interface SessionLogState {
  logs: SessionLogEntry[];
  startTime: number | null;

  // Actions
  startLogging: () => void;
  addLog: (category: LogCategory, message: string, requestId?: string) => void;
  clearLogs: () => void;
  getFilteredLogs: (categories: LogCategory[]) => SessionLogEntry[];
  formatLog: (categories: LogCategory[]) => string;
}

/**
 * Timestamped record of what happened in an analysis session, for a status
 * panel or a bug report.
 */
export const createSessionLogStore = (now: () => number = Date.now) =>
  createStore<SessionLogState>()((set, get) => ({
    logs: [],
    startTime: null,

    startLogging: () => {
      set({
        startTime: now(),
        logs: [],
      });
    },

    addLog: (category: LogCategory, message: string, requestId?: string) => {
      const { startTime } = get();
      if (startTime === null) return;

      const timestamp = now() - startTime;
      set((state) => ({
        logs: [...state.logs, { timestamp, category, message, requestId }],
      }));
    },

    clearLogs: () => {
      set({ logs: [], startTime: null });
    },

    getFilteredLogs: (categories: LogCategory[]) => {
      const { logs } = get();
      if (categories.length === 0) return logs;
      return logs.filter((log) => categories.includes(log.category));
    },

    formatLog: (categories: LogCategory[]) => {
      const filteredLogs = get().getFilteredLogs(categories);

      return filteredLogs.map((log) => {
        const minutes = Math.floor(log.timestamp / 60000);
        const seconds = Math.floor((log.timestamp % 60000) / 1000);
        const timeStr = `${minutes}:${seconds.toString().padStart(2, '0')}`;

        if (log.requestId) {
          return `[${log.requestId.slice(0, 8)}]: ${log.message} (${timeStr})`;
        } else {
          return `${log.message} (${timeStr})`;
        }
      }).join('\n');
    },
  }));

export type SessionLogStore = ReturnType<typeof createSessionLogStore>;
